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

function geminiCommand(): string {
  return resolveCommand(process.env.APKF_GEMINI_BIN?.trim() || "gemini");
}

export async function geminiVersion(): Promise<ProviderResult> {
  const command = geminiCommand();
  const result = runCommandSync(command, ["--version"], {
    shell: usesWindowsShell(command),
    timeout: parseTimeoutMs("APKF_AI_VERSION_TIMEOUT_MS", 15000)
  });
  if (result.status !== 0) {
    return { ok: false, output: "", error: result.error?.message || result.stderr || "gemini not available" };
  }
  return { ok: true, output: result.stdout.trim() };
}

export async function geminiComplete(request: InferenceRequest, options: CompletionOptions = {}): Promise<string> {
  const command = geminiCommand();
  const useShell = usesWindowsShell(command);
  const prompt = clampPrompt(renderPrompt(request), "APKF_GEMINI_PROMPT_MAX_CHARS");
  const model = request.params.model?.trim();
  const args = [...(model ? ["-m", model] : []), "--prompt", useShell ? quoteForShell(prompt) : prompt];
  const timeoutMs = parseTimeoutMs("APKF_AI_EXEC_TIMEOUT_MS", 180000);
  const output = { stdout: "", stderr: "" };
  const outcome = await runProcess(command, args, {
    shell: useShell,
    env: { ...process.env, NO_COLOR: "1" },
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
  const error = outcomeToError("Gemini", outcome, output, timeoutMs);
  if (error) {
    throw error;
  }
  return output.stdout.trim();
}

export const geminiProvider: AIProvider = {
  id: "gemini",
  label: "Gemini",
  version: geminiVersion,
  complete: geminiComplete
};
