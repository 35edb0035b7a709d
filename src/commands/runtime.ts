import path from "path";
import { ForgeConfig, ProjectLanguage, ensureConfig, normalizeLanguage, resolveToolchainRoot } from "../config";
import { getFlags } from "../context/flags";
import { AgentOrchestrator } from "../agents/orchestrator";
import { createDefectDetector } from "../agents/review";
import { OrchestratorFactory } from "../agents/tasks";
import { describeError, errorCode, printError } from "../errors";
import { ActivityLog, createActivityLog } from "../platform/activity-log";
import { InferenceClient, GenerationParams } from "../providers/types";
import { ProviderSettings } from "../providers";

export type Runtime = {
  config: ForgeConfig;
  workspaceRoot: string;
  tasksRoot: string;
  projectsRoot: string;
  toolchainRoot: string;
  projectName?: string;
  template: string;
  language: ProjectLanguage;
  minSdk: number;
  targetSdk: number;
  maxDebugIterations: number;
  buildTimeoutMs: number;
  acceptLicenses: boolean;
  provider: string;
  params: GenerationParams;
  providerSettings: ProviderSettings;
  log: ActivityLog;
};

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function resolveRuntime(): Runtime | null {
  const config = ensureConfig();
  const flags = getFlags();
  const language = flags.language ? normalizeLanguage(flags.language) : config.project.language;
  if (!language) {
    printError("AF-1507", `Unsupported language '${flags.language}'. Use kotlin or java.`);
    return null;
  }
  const workspaceRoot = path.resolve(flags.output ?? config.workspace.default_root);
  const maxDebugIterations =
    flags.maxDebugIterations !== undefined && flags.maxDebugIterations >= 0
      ? flags.maxDebugIterations
      : config.pipeline.max_debug_iterations;
  const model = flags.model ?? (config.ai.model || undefined);
  return {
    config,
    workspaceRoot,
    tasksRoot: path.join(workspaceRoot, "tasks"),
    projectsRoot: path.join(workspaceRoot, "projects"),
    toolchainRoot: path.resolve(resolveToolchainRoot(config)),
    projectName: flags.project,
    template: flags.template ?? config.project.template,
    language,
    minSdk: positive(flags.minSdk, config.project.min_sdk),
    targetSdk: positive(flags.targetSdk, config.project.target_sdk),
    maxDebugIterations,
    buildTimeoutMs: positive(flags.buildTimeoutSeconds, config.build.timeout_seconds) * 1000,
    acceptLicenses: flags.acceptLicenses || config.toolchain.accept_licenses,
    provider: flags.provider ?? config.ai.preferred_provider,
    params: {
      contextSize: config.ai.context_size,
      temperature: config.ai.temperature,
      maxTokens: config.ai.max_tokens,
      model
    },
    providerSettings: { endpoint: config.ai.endpoint, model },
    log: createActivityLog(path.join(workspaceRoot, "logs", "apkforge.log"))
  };
}

export function orchestratorFactory(runtime: Runtime, client: InferenceClient): OrchestratorFactory {
  const detectDefects = createDefectDetector(runtime.config.pipeline.defect_markers);
  return ({ taskId, taskDir }) =>
    new AgentOrchestrator({
      taskId,
      taskDir,
      client,
      language: runtime.language,
      params: runtime.params,
      maxDebugIterations: runtime.maxDebugIterations,
      detectDefects,
      inferenceRetries: runtime.config.pipeline.inference_retries,
      retryBaseDelayMs: runtime.config.pipeline.retry_base_delay_ms
    });
}

/** Calls `onInterrupt` on the first Ctrl+C; returns a disposer. */
export function handleInterrupt(onInterrupt: () => void): () => void {
  const listener = () => {
    console.log("Interrupt received, cancelling...");
    onInterrupt();
  };
  process.once("SIGINT", listener);
  return () => {
    process.removeListener("SIGINT", listener);
  };
}

export function reportFailure(error: unknown, log?: ActivityLog): void {
  const code = errorCode(error);
  const message = describeError(error);
  log?.(`[${code}] ${message}`);
  printError(code, message);
  process.exitCode = 1;
}
