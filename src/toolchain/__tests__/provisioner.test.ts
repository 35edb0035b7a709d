import crypto from "crypto";
import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { CancelledError, LicenseGateError, ToolchainInstallError } from "../../errors";
import { ArchiveComponent, SdkPackageComponent, ToolchainComponent } from "../catalog";
import { InstallContext, InstallOutcome, InstallerRegistry } from "../installers";
import { ToolchainProvisioner } from "../provisioner";
import { loadState } from "../state";

const PAYLOAD = "payload";
const PAYLOAD_SHA = crypto.createHash("sha256").update(PAYLOAD).digest("hex");
const NOW = new Date("2026-01-01T00:00:00.000Z");

type FakeInstallers = InstallerRegistry & {
  calls: string[];
  maxConcurrent: number;
};

function fakeInstallers(behaviour: { failFirst?: boolean; delayMs?: number } = {}): FakeInstallers {
  let inFlight = 0;
  const fake: FakeInstallers = {
    calls: [],
    maxConcurrent: 0,
    archive: { install: (context) => run(context, true) },
    "sdk-package": { install: (context) => run(context, false) }
  };
  async function run(
    context: InstallContext<ArchiveComponent> | InstallContext<SdkPackageComponent>,
    withArtifact: boolean
  ): Promise<InstallOutcome> {
    fake.calls.push(context.component.id);
    inFlight += 1;
    fake.maxConcurrent = Math.max(fake.maxConcurrent, inFlight);
    try {
      if (behaviour.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, behaviour.delayMs));
      }
      if (behaviour.failFirst && fake.calls.filter((id) => id === context.component.id).length === 1) {
        throw new Error("connection reset");
      }
      const contentDir = path.join(context.stagingDir, "content");
      fs.mkdirSync(path.join(contentDir, "bin"), { recursive: true });
      fs.writeFileSync(path.join(contentDir, "bin", "tool"), context.component.id);
      if (!withArtifact) {
        const licensesDir = path.join(context.stagingDir, "licenses");
        fs.mkdirSync(licensesDir, { recursive: true });
        fs.writeFileSync(path.join(licensesDir, "android-sdk-license"), "test-license-hash");
        return { contentDir, licensesDir };
      }
      const artifact = path.join(context.stagingDir, "download.bin");
      fs.writeFileSync(artifact, PAYLOAD);
      return { contentDir, artifact };
    } finally {
      inFlight -= 1;
    }
  }
  return fake;
}

function archive(id: string, extra: Partial<ArchiveComponent> = {}): ArchiveComponent {
  return {
    id,
    version: "17",
    kind: "archive",
    source: { url: `https://downloads.invalid/${id}.tar.gz`, format: "tar.gz" },
    ...extra
  };
}

const PLATFORM: SdkPackageComponent = {
  id: "platforms-android-34",
  version: "34",
  kind: "sdk-package",
  license: "test-license",
  source: { package: "platforms;android-34" }
};

describe("ToolchainProvisioner", () => {
  let root: string;
  const components: ToolchainComponent[] = [archive("jdk"), PLATFORM];

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "apkforge-toolchain-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function provisioner(installers: InstallerRegistry, acceptLicenses = true, maxAttempts = 3): ToolchainProvisioner {
    return new ToolchainProvisioner({ root, installers, acceptLicenses, maxAttempts, now: () => NOW });
  }

  it("installs missing components once and is a no-op afterwards", async () => {
    const installers = fakeInstallers();
    const first = await provisioner(installers).ensureReady(components);
    const second = await provisioner(installers).ensureReady(components);

    expect(installers.calls).toEqual(["jdk", "platforms-android-34"]);
    expect(second.installed).toEqual(first.installed);
    expect(first.installed.map((record) => [record.id, record.path])).toEqual([
      ["jdk", path.join(root, "components", "jdk", "17")],
      ["platforms-android-34", path.join(root, "android-sdk", "platforms", "android-34")]
    ]);
    expect(fs.readFileSync(path.join(root, "components", "jdk", "17", "bin", "tool"), "utf-8")).toBe("jdk");
    expect(fs.readdirSync(path.join(root, ".staging"))).toEqual([]);
    expect(fs.readFileSync(path.join(root, "android-sdk", "licenses", "android-sdk-license"), "utf-8")).toBe("test-license-hash");
    expect(fs.existsSync(path.join(root, ".provision.lock"))).toBe(false);
  });

  it("provisions one licensed component into an empty root, then does nothing", async () => {
    const installers = fakeInstallers();
    const tools = [archive("cmdline-tools", { license: "test-license" })];
    const state = await provisioner(installers).ensureReady(tools);
    await provisioner(installers).ensureReady(tools);

    expect(state.installed).toHaveLength(1);
    expect(state.licenses).toHaveLength(1);
    expect(installers.calls).toEqual(["cmdline-tools"]);
  });

  it("records archive size and digest", async () => {
    const state = await provisioner(fakeInstallers()).ensureReady([
      archive("jdk", { source: { url: "https://downloads.invalid/jdk.tar.gz", format: "tar.gz", sizeBytes: 7, sha256: PAYLOAD_SHA } })
    ]);

    expect(state.installed[0]).toEqual({
      id: "jdk",
      version: "17",
      path: path.join(root, "components", "jdk", "17"),
      sizeBytes: 7,
      sha256: PAYLOAD_SHA,
      installedAt: "2026-01-01T00:00:00.000Z"
    });
    expect(loadState(root).installed).toEqual(state.installed);
  });

  it("records a non-interactive license acceptance", async () => {
    const state = await provisioner(fakeInstallers()).ensureReady(components);

    expect(state.licenses).toEqual([
      { id: "test-license", component: "platforms-android-34", acceptedAt: "2026-01-01T00:00:00.000Z", method: "non-interactive" }
    ]);
  });

  it("installs nothing when a license has not been accepted", async () => {
    const installers = fakeInstallers();
    const run = provisioner(installers, false);

    await expect(run.ensureReady(components)).rejects.toThrow(
      new LicenseGateError("License test-license for platforms-android-34 has not been accepted. Re-run with --accept-licenses.", "test-license")
    );
    expect(installers.calls).toEqual([]);
    expect(loadState(root).installed).toEqual([]);
    expect(run.status(components).map((entry) => entry.licenseAccepted)).toEqual([true, false]);
  });

  it("records a license confirmed at the prompt", async () => {
    const asked: string[] = [];
    const installers = fakeInstallers();
    const run = new ToolchainProvisioner({
      root,
      installers,
      acceptLicenses: false,
      confirmLicense: async (license, componentId) => {
        asked.push(`${license}:${componentId}`);
        return true;
      },
      now: () => NOW
    });

    const state = await run.ensureReady(components);

    expect(asked).toEqual(["test-license:platforms-android-34"]);
    expect(state.licenses.map((entry) => entry.method)).toEqual(["interactive"]);
    expect(installers.calls).toEqual(["jdk", "platforms-android-34"]);
  });

  it("installs nothing when the prompt is declined", async () => {
    const installers = fakeInstallers();
    const run = new ToolchainProvisioner({ root, installers, acceptLicenses: false, confirmLicense: async () => false, now: () => NOW });

    await expect(run.ensureReady(components)).rejects.toBeInstanceOf(LicenseGateError);
    expect(installers.calls).toEqual([]);
  });

  it("retries a failed attempt", async () => {
    const installers = fakeInstallers({ failFirst: true });
    const state = await provisioner(installers).ensureReady([archive("jdk")]);

    expect(installers.calls).toEqual(["jdk", "jdk"]);
    expect(state.installed.map((record) => record.id)).toEqual(["jdk"]);
  });

  it("gives up after the attempt limit on a checksum mismatch", async () => {
    const installers = fakeInstallers();
    const bad = "0".repeat(64);
    const run = provisioner(installers, true, 2).ensureReady([
      archive("jdk", { source: { url: "https://downloads.invalid/jdk.tar.gz", format: "tar.gz", sha256: bad } })
    ]);

    await expect(run).rejects.toThrow(
      new ToolchainInstallError(`Failed to install jdk 17 after 2 attempts: jdk checksum mismatch: expected ${bad}, got ${PAYLOAD_SHA}`)
    );
    expect(installers.calls).toEqual(["jdk", "jdk"]);
    expect(fs.existsSync(path.join(root, "components", "jdk", "17"))).toBe(false);
    expect(fs.existsSync(path.join(root, ".staging", "jdk@17"))).toBe(false);
  });

  it("reinstalls a component whose directory was removed", async () => {
    const installers = fakeInstallers();
    await provisioner(installers).ensureReady([archive("jdk")]);
    fs.rmSync(path.join(root, "components", "jdk", "17"), { recursive: true, force: true });
    const state = await provisioner(installers).ensureReady([archive("jdk")]);

    expect(installers.calls).toEqual(["jdk", "jdk"]);
    expect(state.installed).toHaveLength(1);
  });

  it("treats a newer installed version as satisfying", async () => {
    const installers = fakeInstallers();
    await provisioner(installers).ensureReady([archive("jdk", { version: "21" })]);
    await provisioner(installers).ensureReady([archive("jdk")]);

    expect(installers.calls).toEqual(["jdk"]);
  });

  it("serializes concurrent calls on one instance", async () => {
    const installers = fakeInstallers({ delayMs: 20 });
    const run = provisioner(installers);
    const pending = Promise.all([run.ensureReady(components), run.ensureReady(components)]);

    await pending;
    expect(installers.maxConcurrent).toBe(1);
    expect(installers.calls).toEqual(["jdk", "platforms-android-34"]);
  });

  it("keeps a slow install exclusive across instances sharing a root", async () => {
    const installers = fakeInstallers({ delayMs: 300 });
    const make = () =>
      new ToolchainProvisioner({ root, installers, acceptLicenses: true, now: () => NOW, lock: { staleMs: 50, retryMs: 20 } });

    const [first, second] = await Promise.all([make().ensureReady(components), make().ensureReady(components)]);

    expect(installers.maxConcurrent).toBe(1);
    expect(installers.calls).toEqual(["jdk", "platforms-android-34"]);
    expect(second.installed).toEqual(first.installed);
  });

  it("stops before installing when cancelled", async () => {
    const installers = fakeInstallers();
    const controller = new AbortController();
    controller.abort();

    await expect(provisioner(installers).ensureReady(components, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(installers.calls).toEqual([]);
  });
});
