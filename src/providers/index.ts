import { codexProvider } from "./codex";
import { geminiProvider } from "./gemini";
import { createMockProvider } from "./mock";
import { createOllamaProvider } from "./ollama";
import { AIProvider, ProviderId, ProviderPreference } from "./types";

export type ProviderSettings = {
  endpoint: string;
  model?: string;
  mockDelayMs?: number;
};

const AUTO_ORDER: ProviderId[] = ["gemini", "codex", "ollama"];

export function parseProviderPreference(input?: string): ProviderPreference | null {
  const raw = (input ?? "").trim().toLowerCase();
  if (raw === "auto" || raw === "gemini" || raw === "codex" || raw === "ollama" || raw === "mock") {
    return raw;
  }
  return null;
}

export function buildProviders(settings: ProviderSettings): Record<ProviderId, AIProvider> {
  return {
    gemini: geminiProvider,
    codex: codexProvider,
    ollama: createOllamaProvider({ endpoint: settings.endpoint, defaultModel: settings.model }),
    mock: createMockProvider(settings.mockDelayMs ?? 0)
  };
}

export function listProviders(settings: ProviderSettings): AIProvider[] {
  const providers = buildProviders(settings);
  return [...AUTO_ORDER, "mock" as const].map((id) => providers[id]);
}

export type ProviderResolution =
  | { ok: true; provider: AIProvider; selected: ProviderId; requested: ProviderPreference }
  | { ok: false; requested: string; reason: "invalid" | "unavailable"; details: string };

export async function resolveProvider(requested: string | undefined, settings: ProviderSettings): Promise<ProviderResolution> {
  const normalized = parseProviderPreference(requested);
  if (!normalized) {
    return {
      ok: false,
      requested: requested ?? "",
      reason: "invalid",
      details: "Use one of: gemini, codex, ollama, mock, auto."
    };
  }
  const providers = buildProviders(settings);

  if (normalized === "auto") {
    for (const id of AUTO_ORDER) {
      const status = await providers[id].version();
      if (status.ok) {
        return { ok: true, provider: providers[id], selected: id, requested: normalized };
      }
    }
    return {
      ok: false,
      requested: normalized,
      reason: "unavailable",
      details: "No provider available. Install gemini or codex, start ollama, or use --provider mock."
    };
  }

  const provider = providers[normalized];
  const status = await provider.version();
  if (!status.ok) {
    return {
      ok: false,
      requested: normalized,
      reason: "unavailable",
      details: `${provider.label} not available: ${status.error || "provider unavailable"}`
    };
  }
  return { ok: true, provider, selected: normalized, requested: normalized };
}
