import { request } from "undici";
import { CancelledError, FatalInferenceError, ForgeError, describeError } from "../errors";
import { renderMemory } from "../agents/memory";
import { classifyFailure, parseTimeoutMs } from "./shared";
import { AIProvider, CompletionOptions, InferenceRequest, ProviderResult } from "./types";

export type OllamaSettings = {
  endpoint: string;
  defaultModel?: string;
};

type GenerateChunk = {
  response?: string;
  done?: boolean;
  error?: string;
};

const DEFAULT_MODEL = "qwen2.5-coder:7b";

function parseChunk(line: string): GenerateChunk {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new FatalInferenceError(`Ollama sent malformed stream data: ${describeError(error)}`);
  }
  if (!parsed || typeof parsed !== "object") {
    throw new FatalInferenceError("Ollama sent malformed stream data");
  }
  return {
    response: "response" in parsed && typeof parsed.response === "string" ? parsed.response : undefined,
    done: "done" in parsed && parsed.done === true,
    error: "error" in parsed && typeof parsed.error === "string" ? parsed.error : undefined
  };
}

function buildPrompt(req: InferenceRequest): string {
  const memory = renderMemory(req.memory);
  return memory ? `Previous stage outputs:\n${memory}\n\n${req.userPrompt}` : req.userPrompt;
}

export function createOllamaProvider(settings: OllamaSettings): AIProvider {
  const endpoint = settings.endpoint.replace(/\/+$/, "");

  const version = async (): Promise<ProviderResult> => {
    try {
      const { statusCode, body } = await request(`${endpoint}/api/version`, {
        method: "GET",
        headersTimeout: parseTimeoutMs("APKF_AI_VERSION_TIMEOUT_MS", 5000)
      });
      const text = await body.text();
      if (statusCode >= 400) {
        return { ok: false, output: "", error: `HTTP ${statusCode}` };
      }
      return { ok: true, output: text.trim() };
    } catch (error) {
      return { ok: false, output: "", error: describeError(error) };
    }
  };

  const complete = async (req: InferenceRequest, options: CompletionOptions = {}): Promise<string> => {
    const model = req.params.model?.trim() || settings.defaultModel?.trim() || DEFAULT_MODEL;
    const payload = {
      model,
      system: req.systemPrompt,
      prompt: buildPrompt(req),
      stream: true,
      options: {
        num_ctx: req.params.contextSize,
        temperature: req.params.temperature,
        num_predict: req.params.maxTokens
      }
    };
    let output = "";
    try {
      const { statusCode, body } = await request(`${endpoint}/api/generate`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal: options.signal,
        headersTimeout: parseTimeoutMs("APKF_AI_EXEC_TIMEOUT_MS", 180000),
        bodyTimeout: parseTimeoutMs("APKF_AI_EXEC_TIMEOUT_MS", 180000)
      });
      if (statusCode >= 400) {
        const text = await body.text();
        throw classifyFailure(`HTTP ${statusCode} ${text}`, `HTTP ${statusCode}`);
      }
      const decoder = new TextDecoder("utf-8");
      let pending = "";
      for await (const chunk of body) {
        pending += decoder.decode(chunk, { stream: true });
        const lines = pending.split("\n");
        pending = lines.pop() ?? "";
        for (const line of lines) {
          if (!line.trim()) {
            continue;
          }
          const parsed = parseChunk(line);
          if (parsed.error) {
            throw classifyFailure(parsed.error, "Ollama generation failed");
          }
          if (parsed.response) {
            output += parsed.response;
            options.onChunk?.(parsed.response);
          }
        }
      }
      pending += decoder.decode();
      if (pending.trim()) {
        const parsed = parseChunk(pending);
        output += parsed.response ?? "";
      }
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError("Ollama call cancelled");
      }
      if (error instanceof ForgeError) {
        throw error;
      }
      throw classifyFailure(describeError(error), "Ollama request failed");
    }
    return output.trim();
  };

  return {
    id: "ollama",
    label: "Ollama",
    version,
    complete
  };
}
