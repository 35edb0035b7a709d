import type { AgentRole } from "../agents/roles";
import type { MemorySnapshot } from "../agents/memory";

export type ProviderId = "gemini" | "codex" | "ollama" | "mock";
export type ProviderPreference = ProviderId | "auto";

export type ProviderResult = {
  ok: boolean;
  output: string;
  error?: string;
};

export type GenerationParams = {
  contextSize: number;
  temperature: number;
  maxTokens: number;
  model?: string;
};

export type InferenceRequest = {
  role: AgentRole;
  systemPrompt?: string;
  userPrompt: string;
  memory: MemorySnapshot;
  params: GenerationParams;
};

export type CompletionOptions = {
  signal?: AbortSignal;
  onChunk?: (text: string) => void;
};

export type InferenceClient = {
  id: string;
  label: string;
  complete: (request: InferenceRequest, options?: CompletionOptions) => Promise<string>;
};

export type AIProvider = InferenceClient & {
  id: ProviderId;
  version: () => ProviderResult | Promise<ProviderResult>;
};
