import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { ToolchainState, emptyState } from "../../toolchain/state";
import { build } from "../runner";
import { fakeLauncher } from "./fake-launcher";

const COMPILE_ERROR = "> Task :app:compileDebugKotlin\ne: compile error\n";

describe("build", () => {
  let workdir: string;
  let project: string;
  let toolchain: ToolchainState;

  beforeEach(() => {
    workdir = fs.mkdtempSync(path.join(os.tmpdir(), "apkforge-build-"));
    project = path.join(workdir, "TodoListApp");
    fs.mkdirSync(project);
    const toolRoot = path.join(workdir, "toolchain");
    const jdk = path.join(toolRoot, "components", "jdk", "17");
    const gradle = path.join(toolRoot, "components", "gradle", "8.7");
    fs.mkdirSync(jdk, { recursive: true });
    fs.mkdirSync(gradle, { recursive: true });
    toolchain = {
      ...emptyState(toolRoot),
      installed: [
        { id: "jdk", version: "17", path: jdk, installedAt: "2026-01-01T00:00:00.000Z" },
        { id: "gradle", version: "8.7", path: gradle, installedAt: "2026-01-01T00:00:00.000Z" }
      ]
    };
  });

  afterEach(() => {
    fs.rmSync(workdir, { recursive: true, force: true });
  });

  function dropApk(): string {
    const dir = path.join(project, "app", "build", "outputs", "apk", "debug");
    fs.mkdirSync(dir, { recursive: true });
    const apk = path.join(dir, "app-debug.apk");
    fs.writeFileSync(apk, "apk");
    return apk;
  }

  it("runs gradle from the provisioned toolchain and returns the APK", async () => {
    const fake = fakeLauncher({ stdout: "BUILD SUCCESSFUL\n", effect: dropApk });
    const result = await build(project, toolchain, { launch: fake.launch });

    expect(result).toMatchObject({
      success: true,
      artifactPath: path.join(project, "app", "build", "outputs", "apk", "debug", "app-debug.apk"),
      logExcerpt: "BUILD SUCCESSFUL",
      logPath: path.join(project, "build-logs", "build-1.log"),
      exitCode: 0
    });
    expect(fake.launches).toHaveLength(1);
    const [launched] = fake.launches;
    expect(launched.command).toBe(path.join(workdir, "toolchain", "components", "gradle", "8.7", "bin", "gradle"));
    expect(launched.args).toEqual(["--no-daemon", "-p", project, "assembleDebug"]);
    expect(launched.options.cwd).toBe(project);
    expect(launched.options.env?.JAVA_HOME).toBe(path.join(workdir, "toolchain", "components", "jdk", "17"));
    expect(launched.options.env?.ANDROID_SDK_ROOT).toBe(path.join(workdir, "toolchain", "android-sdk"));
  });

  it("reports a non-zero exit with the log tail", async () => {
    const lines: string[] = [];
    const fake = fakeLauncher({ stderr: COMPILE_ERROR, code: 1 });
    const result = await build(project, toolchain, { launch: fake.launch, onLine: (line) => lines.push(line) });

    expect(result).toMatchObject({
      success: false,
      reason: "exit-code",
      message: "Build failed with exit code 1",
      logExcerpt: "> Task :app:compileDebugKotlin\ne: compile error",
      exitCode: 1
    });
    expect(lines).toEqual(["> Task :app:compileDebugKotlin", "e: compile error"]);
    expect(fs.readFileSync(path.join(project, "build-logs", "build-1.log"), "utf-8")).toBe(COMPILE_ERROR);
  });

  it("fails when gradle exits 0 without an APK", async () => {
    const result = await build(project, toolchain, { launch: fakeLauncher({ stdout: "BUILD SUCCESSFUL\n" }).launch });

    expect(result).toMatchObject({
      success: false,
      reason: "artifact-missing",
      message: "Build exited 0 but no APK was found in app/build/outputs/apk/debug"
    });
  });

  it("numbers build logs per run", async () => {
    await build(project, toolchain, { launch: fakeLauncher({ code: 1 }).launch });
    const second = await build(project, toolchain, { launch: fakeLauncher({ code: 1 }).launch });

    expect(second.logPath).toBe(path.join(project, "build-logs", "build-2.log"));
  });

  it("terminates a build that runs past its timeout", async () => {
    const result = await build(project, toolchain, {
      launch: fakeLauncher({ stdout: "> Configure project\n", hang: true }).launch,
      timeoutMs: 20
    });

    expect(result).toMatchObject({
      success: false,
      reason: "timeout",
      message: "Build exceeded 0s and was terminated",
      logExcerpt: "> Configure project",
      exitCode: null
    });
  });

  it("stops when cancelled", async () => {
    const controller = new AbortController();
    const pending = build(project, toolchain, { launch: fakeLauncher({ hang: true }).launch, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).resolves.toMatchObject({ success: false, reason: "cancelled", message: "Build cancelled" });
  });

  it("reports a spawn error when gradle is not provisioned", async () => {
    const fake = fakeLauncher({});
    const withoutGradle = { ...toolchain, installed: toolchain.installed.filter((entry) => entry.id !== "gradle") };
    const result = await build(project, withoutGradle, { launch: fake.launch });

    expect(result).toMatchObject({
      success: false,
      reason: "spawn-error",
      message: `Build tool could not be started: Toolchain component gradle is not installed under ${path.join(workdir, "toolchain")}`,
      exitCode: null
    });
    expect(fake.launches).toEqual([]);
  });
});
