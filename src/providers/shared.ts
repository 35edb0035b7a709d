import { CancelledError, FatalInferenceError, TransientInferenceError } from "../errors";
import { renderMemory } from "../agents/memory";
import { ROLE_LABELS } from "../agents/roles";
import { RunProcessOutcome } from "../platform/process-exec";
import type { InferenceRequest } from "./types";

const UNRECOVERABLE_PATTERNS = [/terminalquotaerror/i, /exhausted your capacity/i, /command line is too long/i];

const TRANSIENT_PATTERNS = [
  /timed?\s?out/i,
  /etimedout/i,
  /econnreset/i,
  /econnrefused/i,
  /socket hang up/i,
  /temporar(il)?y unavailable/i,
  /service unavailable/i,
  /overloaded/i,
  /rate limit/i,
  /too many requests/i,
  /\b(408|429|500|502|503|504)\b/
];

export function parseTimeoutMs(envName: string, fallback: number): number {
  const raw = Number.parseInt(process.env[envName] ?? "", 10);
  if (!Number.isFinite(raw) || raw <= 0) {
    return fallback;
  }
  return raw;
}

export function resolveCommand(input: string): string {
  if (process.platform !== "win32") {
    return input;
  }
  const looksLikePath = input.includes("\\") || input.includes("/");
  const hasExt = /\.[A-Za-z0-9]+$/.test(input);
  if (!looksLikePath && !hasExt) {
    return `${input}.cmd`;
  }
  return input;
}

export function usesWindowsShell(command: string): boolean {
  return process.platform === "win32" && command.toLowerCase().endsWith(".cmd");
}

export function quoteForShell(arg: string): string {
  return `"${arg.replace(/"/g, '""')}"`;
}

export function clampPrompt(prompt: string, envName: string): string {
  const maxCharsRaw = Number.parseInt(process.env[envName] ?? "", 10);
  const maxChars = Number.isFinite(maxCharsRaw) && maxCharsRaw > 1000 ? maxCharsRaw : 12000;
  if (prompt.length <= maxChars) {
    return prompt;
  }
  return `${prompt.slice(0, maxChars)}\n...[truncated to fit the provider command line]`;
}

// CLI providers take one prompt text, so system prompt and memory are folded into it.
export function renderPrompt(request: InferenceRequest): string {
  const sections: string[] = [];
  if (request.systemPrompt) {
    sections.push(`SYSTEM (${ROLE_LABELS[request.role]}):\n${request.systemPrompt.trim()}`);
  }
  const memory = renderMemory(request.memory);
  if (memory) {
    sections.push(`MEMORY:\n${memory}`);
  }
  sections.push(`TASK:\n${request.userPrompt.trim()}`);
  return sections.join("\n\n");
}

export function classifyFailure(text: string, fallback: string): TransientInferenceError | FatalInferenceError {
  const message = text.trim() || fallback;
  if (UNRECOVERABLE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new FatalInferenceError(message);
  }
  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(message))) {
    return new TransientInferenceError(message);
  }
  return new FatalInferenceError(message);
}

export function outcomeToError(
  label: string,
  outcome: RunProcessOutcome,
  output: { stdout: string; stderr: string },
  timeoutMs: number
): Error | null {
  if (outcome.aborted) {
    return new CancelledError(`${label} call cancelled`);
  }
  if (outcome.timedOut) {
    return new TransientInferenceError(`${label} timed out after ${timeoutMs}ms`);
  }
  if (outcome.error) {
    const code = "code" in outcome.error ? outcome.error.code : undefined;
    if (code === "ENOENT") {
      return new FatalInferenceError(`${label} CLI not found: ${outcome.error.message}`);
    }
    return classifyFailure(outcome.error.message, `${label} failed to start`);
  }
  if (outcome.code !== 0) {
    return classifyFailure([output.stderr, output.stdout].join("\n"), `${label} exited with code ${outcome.code}`);
  }
  return null;
}
