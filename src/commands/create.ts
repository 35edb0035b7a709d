import { printError } from "../errors";
import { buildProject, reportBuild } from "./build";
import { collectGeneratedFiles, generateCode, resolveClient } from "./generate";
import { reportFailure, resolveRuntime } from "./runtime";
import { scaffoldProject } from "./scaffold";
import { ensureToolchain } from "./toolchain";

/** Full chain: generate code, scaffold a project around it, provision the toolchain and build. */
export async function runCreate(prompt: string): Promise<void> {
  if (!prompt.trim()) {
    printError("AF-1501", "Describe the app to create, e.g. apkforge \"a tip calculator\".");
    process.exitCode = 1;
    return;
  }
  const runtime = resolveRuntime();
  if (!runtime) {
    process.exitCode = 1;
    return;
  }
  const client = await resolveClient(runtime);
  if (!client) {
    return;
  }

  const outcome = await generateCode(runtime, client, prompt);
  if (outcome.status !== "done") {
    console.log(`Stopped after generation (${outcome.status}). Task directory: ${outcome.taskDir}`);
    process.exitCode = 1;
    return;
  }

  try {
    const projectRoot = scaffoldProject(runtime, prompt, collectGeneratedFiles(outcome.taskDir));
    const toolchain = await ensureToolchain(runtime);
    reportBuild(await buildProject(runtime, projectRoot, toolchain), runtime);
  } catch (error) {
    reportFailure(error, runtime.log);
  }
}
