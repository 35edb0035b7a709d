import fs from "fs";
import path from "path";
import { AgentEvent, TerminalStatus, describeEvent } from "../agents/events";
import { TaskRegistry } from "../agents/tasks";
import { printError } from "../errors";
import { resolveProvider } from "../providers";
import { InferenceClient } from "../providers/types";
import { GeneratedFile } from "../scaffold";
import { Runtime, handleInterrupt, orchestratorFactory, resolveRuntime } from "./runtime";

export type GenerateOutcome = {
  status: TerminalStatus;
  taskId: string;
  taskDir: string;
  outputPath?: string;
};

export async function resolveClient(runtime: Runtime): Promise<InferenceClient | null> {
  const resolution = await resolveProvider(runtime.provider, runtime.providerSettings);
  if (!resolution.ok) {
    printError(resolution.reason === "invalid" ? "AF-1506" : "AF-1504", resolution.details);
    process.exitCode = 1;
    return null;
  }
  runtime.log(`Provider selected: ${resolution.selected}`);
  console.log(`Provider: ${resolution.provider.label}`);
  return resolution.provider;
}

export async function generateCode(
  runtime: Runtime,
  client: InferenceClient,
  prompt: string,
  onEvent: (event: AgentEvent) => void = (event) => console.log(describeEvent(event))
): Promise<GenerateOutcome> {
  const registry = new TaskRegistry(runtime.tasksRoot, orchestratorFactory(runtime, client));
  let outputPath: string | undefined;
  const handle = registry.start(prompt, (event) => {
    if (event.kind === "output_file") {
      outputPath = event.path;
    }
    onEvent(event);
  });
  runtime.log(`Task ${handle.id} started in ${handle.dir}`);
  const dispose = handleInterrupt(() => registry.cancelAll());
  try {
    const status = await handle.result;
    runtime.log(`Task ${handle.id} finished: ${status}`);
    return { status, taskId: handle.id, taskDir: handle.dir, outputPath };
  } finally {
    dispose();
  }
}

/** Files a finished task left under its generated/ directory, in name order. */
export function collectGeneratedFiles(taskDir: string): GeneratedFile[] {
  const dir = path.join(taskDir, "generated");
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ name, contents: fs.readFileSync(path.join(dir, name), "utf-8") }));
}

export async function runGenerate(prompt: string): Promise<void> {
  if (!prompt.trim()) {
    printError("AF-1501", "Describe the app to generate, e.g. apkforge generate \"a tip calculator\".");
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
  console.log(`Task directory: ${outcome.taskDir}`);
  if (outcome.status !== "done") {
    process.exitCode = 1;
  }
}
