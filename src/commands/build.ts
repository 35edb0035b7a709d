import fs from "fs";
import path from "path";
import { BuildResult, build } from "../build/runner";
import { BuildPool, defaultPoolSize } from "../build/pool";
import { BuildFailure, printError } from "../errors";
import { ToolchainState } from "../toolchain/state";
import { ensureToolchain } from "./toolchain";
import { Runtime, handleInterrupt, reportFailure, resolveRuntime } from "./runtime";

let sharedPool: BuildPool | null = null;

// One pool per process so concurrent builds share the configured limit.
function buildPool(maxParallel: number): BuildPool {
  const size = defaultPoolSize(maxParallel);
  if (!sharedPool || sharedPool.size !== size) {
    sharedPool = new BuildPool(size);
  }
  return sharedPool;
}

export async function buildProject(runtime: Runtime, projectRoot: string, toolchain: ToolchainState): Promise<BuildResult> {
  const pool = buildPool(runtime.config.build.max_parallel);
  const controller = new AbortController();
  const dispose = handleInterrupt(() => controller.abort());
  try {
    console.log(`Building ${projectRoot} (timeout ${Math.round(runtime.buildTimeoutMs / 1000)}s)...`);
    return await pool.run(() =>
      build(projectRoot, toolchain, {
        timeoutMs: runtime.buildTimeoutMs,
        tailLines: runtime.config.build.log_tail_lines,
        signal: controller.signal,
        log: runtime.log
      })
    );
  } finally {
    dispose();
  }
}

export function reportBuild(result: BuildResult, runtime: Runtime): void {
  if (result.success) {
    console.log(`APK: ${result.artifactPath}`);
    console.log(`Build log: ${result.logPath} (${Math.round(result.durationMs / 1000)}s)`);
    return;
  }
  reportFailure(BuildFailure.fromResult(result), runtime.log);
  if (result.logExcerpt) {
    console.log("--- build log (tail) ---");
    console.log(result.logExcerpt);
  }
}

export async function runBuild(projectDir: string): Promise<void> {
  const runtime = resolveRuntime();
  if (!runtime) {
    process.exitCode = 1;
    return;
  }
  const projectRoot = path.resolve(projectDir);
  if (!fs.existsSync(path.join(projectRoot, "settings.gradle"))) {
    printError("AF-4002", `Not a Gradle project (missing settings.gradle): ${projectRoot}`);
    process.exitCode = 1;
    return;
  }
  try {
    const toolchain = await ensureToolchain(runtime);
    reportBuild(await buildProject(runtime, projectRoot, toolchain), runtime);
  } catch (error) {
    reportFailure(error, runtime.log);
  }
}
