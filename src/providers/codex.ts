import { runCommandSync, runProcess } from "../platform/process-exec";
import {
  clampPrompt,
  outcomeToError,
  parseTimeoutMs,
  quoteForShell,
  renderPrompt,
  resolveCommand,
  usesWindowsShell
} from "./shared";
import { AIProvider, CompletionOptions, InferenceRequest, ProviderResult } from "./types";

function codexCommand(): string {
  return resolveCommand(process.env.APKF_CODEX_BIN?.trim() || "codex");
}

export async function codexVersion(): Promise<ProviderResult> {
  const command = codexCommand();
  const result = runCommandSync(command, ["--version"], {
    shell: usesWindowsShell(command),
    timeout: parseTimeoutMs("APKF_AI_VERSION_TIMEOUT_MS", 15000)
  });
  if (result.status !== 0) {
    return { ok: false, output: "", error: result.error?.message || result.stderr || "codex not available" };
  }
  return { ok: true, output: result.stdout.trim() };
}

export async function codexComplete(request: InferenceRequest, options: CompletionOptions = {}): Promise<string> {
  const command = codexCommand();
  const useShell = usesWindowsShell(command);
  const prompt = clampPrompt(renderPrompt(request), "APKF_CODEX_PROMPT_MAX_CHARS");
  const model = request.params.model?.trim();
  const args = ["exec", ...(model ? ["-m", model] : []), useShell ? quoteForShell(prompt) : prompt];
  const timeoutMs = parseTimeoutMs("APKF_AI_EXEC_TIMEOUT_MS", 180000);
  const output = { stdout: "", stderr: "" };
  const outcome = await runProcess(command, args, {
    shell: useShell,
    timeoutMs,
    signal: options.signal,
    onStdout: (chunk) => {
      output.stdout += chunk;
      options.onChunk?.(chunk);
    },
    onStderr: (chunk) => {
      output.stderr += chunk;
    }
  });
  const error = outcomeToError("Codex", outcome, output, timeoutMs);
  if (error) {
    throw error;
  }
  return output.stdout.trim();
}

export const codexProvider: AIProvider = {
  id: "codex",
  label: "Codex",
  version: codexVersion,
  complete: codexComplete
};
