import path from "path";
import { describeEvent } from "../agents/events";
import { loadTaskRecord } from "../agents/task-record";
import { printError } from "../errors";
import { GeneratedFile, scaffold } from "../scaffold";
import { deriveProjectName } from "../scaffold/descriptor";
import { collectGeneratedFiles } from "./generate";
import { Runtime, reportFailure, resolveRuntime } from "./runtime";

export function scaffoldProject(runtime: Runtime, prompt: string, files: GeneratedFile[]): string {
  const name = runtime.projectName ?? deriveProjectName(prompt);
  const projectRoot = scaffold(
    {
      name,
      template: runtime.template,
      language: runtime.language,
      minSdk: runtime.minSdk,
      targetSdk: runtime.targetSdk
    },
    files,
    runtime.projectsRoot,
    (event) => console.log(describeEvent(event))
  );
  runtime.log(`Scaffolded ${runtime.template} (${runtime.language}) at ${projectRoot}`);
  console.log(`Project ready: ${projectRoot}`);
  return projectRoot;
}

export function runScaffold(taskDir: string): void {
  const runtime = resolveRuntime();
  if (!runtime) {
    process.exitCode = 1;
    return;
  }
  const dir = path.resolve(taskDir);
  const record = loadTaskRecord(dir);
  const files = collectGeneratedFiles(dir);
  if (files.length === 0) {
    printError("AF-4002", `No generated files found under ${path.join(dir, "generated")}`);
    process.exitCode = 1;
    return;
  }
  try {
    scaffoldProject(runtime, record?.prompt ?? path.basename(dir), files);
  } catch (error) {
    reportFailure(error, runtime.log);
  }
}
