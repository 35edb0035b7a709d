import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { Dispatcher, MockAgent, getGlobalDispatcher, setGlobalDispatcher } from "undici";
import { ToolchainInstallError } from "../../errors";
import { silentLog } from "../../platform/activity-log";
import { fakeLauncher } from "../../build/__tests__/fake-launcher";
import { ArchiveComponent, SdkPackageComponent } from "../catalog";
import { createArchiveInstaller, createSdkPackageInstaller } from "../installers";
import { ToolchainState, emptyState } from "../state";

const ORIGIN = "https://downloads.invalid";

const JDK: ArchiveComponent = {
  id: "jdk",
  version: "17",
  kind: "archive",
  source: { url: `${ORIGIN}/jdk.tar.gz`, format: "tar.gz" }
};

const PLATFORM: SdkPackageComponent = {
  id: "platforms-android-34",
  version: "34",
  kind: "sdk-package",
  source: { package: "platforms;android-34" }
};

describe("installers", () => {
  let root: string;
  let stagingDir: string;
  let agent: MockAgent;
  let original: Dispatcher;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "apkforge-installers-"));
    stagingDir = path.join(root, ".staging", "component");
    fs.mkdirSync(stagingDir, { recursive: true });
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  function installedState(...ids: string[]): ToolchainState {
    return {
      ...emptyState(root),
      installed: ids.map((id) => {
        const dir = path.join(root, "components", id, "1");
        fs.mkdirSync(dir, { recursive: true });
        return { id, version: "1", path: dir, installedAt: "2026-01-01T00:00:00.000Z" };
      })
    };
  }

  it("downloads, extracts and unwraps an archive", async () => {
    agent.get(ORIGIN).intercept({ path: "/jdk.tar.gz", method: "GET" }).reply(200, "archive-bytes");
    const fake = fakeLauncher({
      effect: (args) => {
        const target = args[args.indexOf("-C") + 1];
        fs.mkdirSync(path.join(target, "jdk-17", "bin"), { recursive: true });
        fs.writeFileSync(path.join(target, "jdk-17", "bin", "java"), "");
      }
    });
    const outcome = await createArchiveInstaller({ launch: fake.launch }).install({
      component: JDK,
      stagingDir,
      state: emptyState(root),
      log: silentLog
    });

    const artifact = path.join(stagingDir, "download", "jdk-17.tar.gz");
    expect(outcome).toEqual({ contentDir: path.join(stagingDir, "content", "jdk-17"), artifact });
    expect(fs.readFileSync(artifact, "utf-8")).toBe("archive-bytes");
    expect(fake.launches[0].command).toBe("tar");
    expect(fake.launches[0].args).toEqual(["-xzf", artifact, "-C", path.join(stagingDir, "content")]);
  });

  it("fails on an HTTP error without extracting", async () => {
    agent.get(ORIGIN).intercept({ path: "/jdk.tar.gz", method: "GET" }).reply(404, "missing");
    const fake = fakeLauncher({});

    await expect(
      createArchiveInstaller({ launch: fake.launch }).install({ component: JDK, stagingDir, state: emptyState(root), log: silentLog })
    ).rejects.toThrow(new ToolchainInstallError(`Download failed (HTTP 404): ${ORIGIN}/jdk.tar.gz`));
    expect(fake.launches).toEqual([]);
  });

  it("reports a failed extraction", async () => {
    agent.get(ORIGIN).intercept({ path: "/jdk.tar.gz", method: "GET" }).reply(200, "archive-bytes");

    await expect(
      createArchiveInstaller({ launch: fakeLauncher({ code: 2 }).launch }).install({
        component: JDK,
        stagingDir,
        state: emptyState(root),
        log: silentLog
      })
    ).rejects.toThrow("Extracting jdk with tar failed: exit code 2");
  });

  it("installs an SDK package through sdkmanager", async () => {
    const state = installedState("jdk", "cmdline-tools");
    const fake = fakeLauncher({
      effect: () => {
        const dir = path.join(stagingDir, "platforms", "android-34");
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(path.join(dir, "android.jar"), "");
      }
    });
    const outcome = await createSdkPackageInstaller({ launch: fake.launch }).install({
      component: PLATFORM,
      stagingDir,
      state,
      log: silentLog
    });

    expect(outcome).toEqual({
      contentDir: path.join(stagingDir, "platforms", "android-34"),
      licensesDir: path.join(stagingDir, "licenses")
    });
    const [launched] = fake.launches;
    expect(launched.command).toBe(path.join(root, "android-sdk", "cmdline-tools", "latest", "bin", "sdkmanager"));
    expect(launched.args).toEqual([`--sdk_root=${stagingDir}`, "platforms;android-34"]);
    expect(launched.options.env?.JAVA_HOME).toBe(path.join(root, "components", "jdk", "1"));
    expect(launched.options.input).toBe("y\n".repeat(20));
  });

  it("needs the command-line tools first", async () => {
    await expect(
      createSdkPackageInstaller({ launch: fakeLauncher({}).launch }).install({
        component: PLATFORM,
        stagingDir,
        state: installedState("jdk"),
        log: silentLog
      })
    ).rejects.toThrow("platforms-android-34 needs cmdline-tools installed first");
  });
});
