import fs from "fs";
import path from "path";
import { finished } from "stream/promises";
import { BuildFailureReason, describeError } from "../errors";
import { ActivityLog, silentLog } from "../platform/activity-log";
import { ensureDir } from "../platform/persistence";
import { ProcessLauncher, runProcess } from "../platform/process-exec";
import { gradleBinary, toolchainEnv } from "../toolchain/env";
import { ToolchainState } from "../toolchain/state";
import { findDebugApk, nextBuildLogPath } from "./artifacts";
import { TailBuffer } from "./log-buffer";

export type BuildOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
  task?: string;
  launch?: ProcessLauncher;
  tailLines?: number;
  killGraceMs?: number;
  log?: ActivityLog;
  onLine?: (line: string) => void;
};

type BuildResultBase = {
  logExcerpt: string;
  logPath: string;
  durationMs: number;
  exitCode: number | null;
};

export type BuildResult =
  | (BuildResultBase & { success: true; artifactPath: string })
  | (BuildResultBase & { success: false; reason: BuildFailureReason; message: string });

export type FailedBuild = Extract<BuildResult, { success: false }>;

export const DEFAULT_BUILD_TIMEOUT_MS = 30 * 60 * 1000;

function failureMessage(reason: BuildFailureReason, exitCode: number | null, timeoutMs: number, detail?: string): string {
  switch (reason) {
    case "exit-code":
      return `Build failed with exit code ${exitCode}`;
    case "artifact-missing":
      return "Build exited 0 but no APK was found in app/build/outputs/apk/debug";
    case "timeout":
      return `Build exceeded ${Math.round(timeoutMs / 1000)}s and was terminated`;
    case "cancelled":
      return "Build cancelled";
    case "spawn-error":
      return `Build tool could not be started: ${detail ?? "unknown error"}`;
  }
}

/**
 * Runs `gradle --no-daemon -p <projectRoot> <task>` with the provisioned toolchain.
 * Never throws for build outcomes; every end state is a BuildResult.
 */
export async function build(projectRoot: string, toolchain: ToolchainState, options: BuildOptions = {}): Promise<BuildResult> {
  const root = path.resolve(projectRoot);
  const timeoutMs = options.timeoutMs ?? DEFAULT_BUILD_TIMEOUT_MS;
  const log = options.log ?? silentLog;
  const tail = new TailBuffer(options.tailLines);
  const logPath = nextBuildLogPath(root);
  ensureDir(path.dirname(logPath));
  const logStream = fs.createWriteStream(logPath, { encoding: "utf-8" });
  let logError: unknown = null;
  logStream.on("error", (error) => {
    logError = error;
  });

  const fail = (reason: BuildFailureReason, exitCode: number | null, durationMs: number, detail?: string): BuildResult => ({
    success: false,
    reason,
    message: failureMessage(reason, exitCode, timeoutMs, detail),
    logExcerpt: tail.text(),
    logPath,
    durationMs,
    exitCode
  });

  let command: string;
  let env: NodeJS.ProcessEnv;
  try {
    command = gradleBinary(toolchain);
    env = { ...process.env, ...toolchainEnv(toolchain) };
  } catch (error) {
    logStream.end();
    await finished(logStream).catch(() => undefined);
    return fail("spawn-error", null, 0, describeError(error));
  }

  const args = ["--no-daemon", "-p", root, options.task ?? "assembleDebug"];
  log(`Building ${root}: ${command} ${args.join(" ")}`);
  const onOutput = (chunk: string) => {
    logStream.write(chunk);
    for (const line of tail.push(chunk)) {
      options.onLine?.(line);
    }
  };
  const outcome = await runProcess(command, args, {
    cwd: root,
    env,
    shell: process.platform === "win32",
    timeoutMs,
    killGraceMs: options.killGraceMs,
    signal: options.signal,
    launch: options.launch,
    onStdout: onOutput,
    onStderr: onOutput
  });
  logStream.end();
  await finished(logStream).catch(() => undefined);
  if (logError) {
    log(`Build log ${logPath} is incomplete: ${describeError(logError)}`);
  }

  let result: BuildResult;
  if (outcome.aborted) {
    result = fail("cancelled", outcome.code, outcome.durationMs);
  } else if (outcome.timedOut) {
    result = fail("timeout", outcome.code, outcome.durationMs);
  } else if (outcome.error) {
    result = fail("spawn-error", outcome.code, outcome.durationMs, describeError(outcome.error));
  } else if (outcome.code !== 0) {
    result = fail("exit-code", outcome.code, outcome.durationMs);
  } else {
    const artifactPath = findDebugApk(root);
    result = artifactPath
      ? { success: true, artifactPath, logExcerpt: tail.text(), logPath, durationMs: outcome.durationMs, exitCode: 0 }
      : fail("artifact-missing", 0, outcome.durationMs);
  }
  log(result.success ? `Build succeeded: ${result.artifactPath}` : `Build failed (${result.reason}): ${result.message}`);
  return result;
}
