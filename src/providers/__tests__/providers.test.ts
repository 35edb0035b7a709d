import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import http from "http";
import { Dispatcher, MockAgent, getGlobalDispatcher, setGlobalDispatcher } from "undici";
import { FatalInferenceError, TransientInferenceError } from "../../errors";
import { resolveProvider } from "../index";
import { mockCompletion } from "../mock";
import { createOllamaProvider } from "../ollama";
import { classifyFailure, renderPrompt } from "../shared";
import type { InferenceRequest } from "../types";

const ENDPOINT = "http://127.0.0.1:11434";

function request(overrides: Partial<InferenceRequest> = {}): InferenceRequest {
  return {
    role: "code",
    systemPrompt: "Be brief.",
    userPrompt: " Build it ",
    memory: [{ index: 0, role: "plan", text: "1. Screen" }],
    params: { contextSize: 2048, temperature: 0.1, maxTokens: 256 },
    ...overrides
  };
}

describe("renderPrompt", () => {
  it("folds system prompt and memory into one text", () => {
    expect(renderPrompt(request())).toBe("SYSTEM (CODER):\nBe brief.\n\nMEMORY:\n[0] PLAN:\n1. Screen\n\nTASK:\nBuild it");
  });
});

describe("classifyFailure", () => {
  it("retries rate limits and server errors", () => {
    expect(classifyFailure("HTTP 429 Too Many Requests", "x")).toBeInstanceOf(TransientInferenceError);
    expect(classifyFailure("socket hang up", "x")).toBeInstanceOf(TransientInferenceError);
  });

  it("treats everything else as fatal", () => {
    expect(classifyFailure("invalid api key", "x")).toBeInstanceOf(FatalInferenceError);
    expect(classifyFailure("  ", "exited with code 2").message).toBe("exited with code 2");
  });
});

describe("mock provider", () => {
  it("answers every review with a clean verdict", () => {
    expect(mockCompletion(request({ role: "review", userPrompt: "Timer" }))).toBe("[REVIEWER] Response to: 'Timer'\nNO DEFECTS");
  });
});

describe("resolveProvider", () => {
  it("rejects unknown provider names", async () => {
    await expect(resolveProvider("bogus", { endpoint: ENDPOINT })).resolves.toMatchObject({ ok: false, reason: "invalid" });
  });

  it("selects the offline provider when asked", async () => {
    await expect(resolveProvider("mock", { endpoint: ENDPOINT })).resolves.toMatchObject({ ok: true, selected: "mock" });
  });
});

describe("ollama provider", () => {
  let agent: MockAgent;
  let original: Dispatcher;

  beforeEach(() => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
  });

  it("concatenates the streamed response", async () => {
    agent
      .get(ENDPOINT)
      .intercept({ path: "/api/generate", method: "POST" })
      .reply(200, '{"response":"Hel"}\n{"response":"lo"}\n{"done":true}\n');
    const chunks: string[] = [];
    const text = await createOllamaProvider({ endpoint: ENDPOINT }).complete(request(), { onChunk: (chunk) => chunks.push(chunk) });

    expect(text).toBe("Hello");
    expect(chunks).toEqual(["Hel", "lo"]);
  });

  it("maps an overloaded server to a transient error", async () => {
    agent.get(ENDPOINT).intercept({ path: "/api/generate", method: "POST" }).reply(503, "busy");

    await expect(createOllamaProvider({ endpoint: ENDPOINT }).complete(request())).rejects.toBeInstanceOf(TransientInferenceError);
  });

  it("maps a stream error to a fatal error", async () => {
    agent
      .get(ENDPOINT)
      .intercept({ path: "/api/generate", method: "POST" })
      .reply(200, '{"error":"model not found"}\n');

    await expect(createOllamaProvider({ endpoint: ENDPOINT }).complete(request())).rejects.toThrow(
      new FatalInferenceError("model not found")
    );
  });

  it("reports its version when reachable", async () => {
    agent.get(ENDPOINT).intercept({ path: "/api/version", method: "GET" }).reply(200, '{"version":"0.3.0"}');

    await expect(createOllamaProvider({ endpoint: ENDPOINT }).version()).resolves.toEqual({
      ok: true,
      output: '{"version":"0.3.0"}'
    });
  });
});

describe("ollama provider over a socket", () => {
  let server: http.Server;

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("keeps characters split across stream chunks intact", async () => {
    const payload = Buffer.from('{"response":"שלום 🙂"}\n{"done":true}\n', "utf-8");
    const cut = payload.indexOf(Buffer.from("🙂", "utf-8")) + 2;
    server = http.createServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/x-ndjson" });
      res.write(payload.subarray(0, cut));
      setTimeout(() => res.end(payload.subarray(cut)), 20);
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server has no port");
    }
    const { port } = address;

    const text = await createOllamaProvider({ endpoint: `http://127.0.0.1:${port}` }).complete(request());

    expect(text).toBe("שלום 🙂");
  });
});
