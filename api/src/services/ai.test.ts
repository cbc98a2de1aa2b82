/**
 * Unit tests for the AI gateway
 *
 * Every provider is driven through an injected fetch; no request leaves
 * the process. Covers wire-format parsing, the Ollama model fallback chain,
 * credential checks and in-band error reporting.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AIGateway,
  buildCandidateModels,
  extractErrorMessage,
  isModelNotFoundError,
  splitSystemPrompt,
} from "./ai.js";
import { aiConfigSchema } from "../lib/validation.js";
import type { FetchLike } from "./ai.js";
import type { AIConfig, ChatMessage } from "../../../shared/types.js";

const baseConfig: AIConfig = {
  provider: "ollama",
  ollama_url: "http://localhost:11434",
  preferred_model: "lyra-coach:latest",
  openai_key: null,
  anthropic_key: null,
};

const hello: ChatMessage[] = [{ role: "user", content: "Hi" }];

function byteStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}

function ndjson(...records: object[]): string {
  return records.map((r) => `${JSON.stringify(r)}\n`).join("");
}

function requestBody(init: RequestInit | undefined): Record<string, unknown> {
  return JSON.parse(String(init?.body));
}

async function drain(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

function gatewayWith(fetch: FetchLike, config: Partial<AIConfig> = {}, env: NodeJS.ProcessEnv = {}) {
  return new AIGateway({ ...baseConfig, ...config }, { fetch, env });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("extractErrorMessage", () => {
  it("prefers error, then message, then detail", () => {
    expect(extractErrorMessage('{"error":"boom","message":"other"}', "fallback")).toBe("boom");
    expect(extractErrorMessage('{"message":"bad request"}', "fallback")).toBe("bad request");
    expect(extractErrorMessage('{"detail":"not allowed"}', "fallback")).toBe("not allowed");
  });

  it("reads the message of a nested error object", () => {
    expect(extractErrorMessage('{"error":{"type":"auth","message":"Invalid API key"}}', "fallback")).toBe(
      "Invalid API key"
    );
  });

  it("falls back to the trimmed body, then the fallback", () => {
    expect(extractErrorMessage("  upstream exploded \n", "fallback")).toBe("upstream exploded");
    expect(extractErrorMessage("", "fallback")).toBe("fallback");
    expect(extractErrorMessage("   ", "fallback")).toBe("fallback");
  });
});

describe("isModelNotFoundError", () => {
  it("needs both 'model' and 'not found', case-insensitively", () => {
    expect(isModelNotFoundError("model 'llama3' not found, try pulling it first")).toBe(true);
    expect(isModelNotFoundError("Model Not Found")).toBe(true);
    expect(isModelNotFoundError("file not found")).toBe(false);
    expect(isModelNotFoundError("model is loading")).toBe(false);
  });
});

describe("buildCandidateModels", () => {
  it("adds :latest forms and the built-in model", () => {
    expect(buildCandidateModels("llama3", "mistral")).toEqual([
      "llama3",
      "llama3:latest",
      "mistral",
      "mistral:latest",
      "lyra-coach:latest",
    ]);
  });

  it("skips blanks and duplicates", () => {
    expect(buildCandidateModels("lyra-coach:latest", "lyra-coach:latest")).toEqual(["lyra-coach:latest"]);
    expect(buildCandidateModels("", "lyra-coach")).toEqual(["lyra-coach", "lyra-coach:latest"]);
  });
});

describe("splitSystemPrompt", () => {
  it("lifts the system message out of the transcript", () => {
    const result = splitSystemPrompt([
      { role: "system", content: "Be brief" },
      { role: "user", content: "Hi" },
    ]);
    expect(result).toEqual({ system: "Be brief", messages: [{ role: "user", content: "Hi" }] });
  });
});

describe("Ollama streaming", () => {
  it("yields message content until done", async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      new Response(
        ndjson(
          { message: { content: "Hello" }, done: false },
          { message: { content: " coach" }, done: false },
          { message: { content: "" }, done: true }
        )
      )
    );

    const chunks = await drain(gatewayWith(fetch).streamChat(hello));

    expect(chunks).toEqual(["Hello", " coach"]);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe("http://localhost:11434/api/chat");
    expect(requestBody(fetch.mock.calls[0][1])).toEqual({
      model: "lyra-coach:latest",
      messages: hello,
      stream: true,
    });
  });

  it("reassembles records split across chunks", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(byteStream(['{"message":{"content":"Hel', 'lo"}}\n{"done":', "true}\n"]))
    );

    expect(await drain(gatewayWith(fetch).streamChat(hello))).toEqual(["Hello"]);
  });

  it("falls back to the next model when one is missing", async () => {
    const fetch = vi.fn<FetchLike>(async (_url, init) => {
      const { model } = requestBody(init);
      if (model === "lyra-coach:latest") {
        return new Response(ndjson({ message: { content: "Fallback answer" }, done: true }));
      }
      return new Response(JSON.stringify({ error: `model '${String(model)}' not found` }), { status: 404 });
    });

    const chunks = await drain(gatewayWith(fetch).streamChat(hello, "llama3"));

    expect(chunks).toEqual(["Fallback answer"]);
    expect(fetch.mock.calls.map(([, init]) => requestBody(init).model)).toEqual([
      "llama3",
      "llama3:latest",
      "lyra-coach:latest",
    ]);
  });

  it("falls back on a not-found error inside the stream", async () => {
    const fetch = vi.fn<FetchLike>(async (_url, init) =>
      requestBody(init).model === "llama3"
        ? new Response(ndjson({ error: "model 'llama3' not found" }))
        : new Response(ndjson({ message: { content: "ok" }, done: true }))
    );

    const chunks = await drain(gatewayWith(fetch).streamChat(hello, "llama3"));

    expect(chunks).toEqual(["ok"]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("reports the last error once every candidate is missing", async () => {
    const fetch = vi.fn<FetchLike>(async (_url, init) => {
      const { model } = requestBody(init);
      return new Response(JSON.stringify({ error: `model '${String(model)}' not found` }), { status: 404 });
    });

    const chunks = await drain(gatewayWith(fetch).streamChat(hello, "llama3"));

    expect(chunks).toEqual(["\n[AI Error: model 'lyra-coach:latest' not found]"]);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("moves past empty responses and reports them when nothing answers", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(""));

    const chunks = await drain(gatewayWith(fetch).streamChat(hello, "llama3"));

    expect(chunks).toEqual(["\n[AI Error: Ollama returned an empty response.]"]);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("stops at the first error that is not a missing model", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(JSON.stringify({ error: "out of memory" }), { status: 500 })
    );

    const chunks = await drain(gatewayWith(fetch).streamChat(hello, "llama3"));

    expect(chunks).toEqual(["\n[AI Error: out of memory]"]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("keeps partial output and appends an in-stream error", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(ndjson({ message: { content: "Partial" } }, { error: "model not found mid-stream" }))
    );

    const chunks = await drain(gatewayWith(fetch).streamChat(hello));

    expect(chunks).toEqual(["Partial", "\n[AI Error: model not found mid-stream]"]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("reads the message of an error object inside the stream", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(ndjson({ error: { message: "GPU lost" } })));

    const chunks = await drain(gatewayWith(fetch).streamChat(hello));

    expect(chunks).toEqual(["\n[AI Error: GPU lost]"]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("reports a refused connection in-band", async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });

    const chunks = await drain(gatewayWith(fetch).streamChat(hello));

    expect(chunks).toEqual(["\n[AI Error: Connection failed. Check that Ollama is running.]"]);
  });
});

describe("timeouts and cancellation", () => {
  // Never answers; rejects once the request is aborted.
  const hanging: FetchLike = (_url, init) =>
    new Promise((_resolve, reject) => {
      const signal = init?.signal;
      const fail = () => reject(new DOMException("This operation was aborted", "AbortError"));
      if (signal?.aborted) fail();
      signal?.addEventListener("abort", fail);
    });

  it("reports a timeout as an error fragment", async () => {
    const gateway = new AIGateway(baseConfig, { fetch: hanging, env: {}, timeoutMs: 20 });

    const chunks = await drain(gateway.streamChat(hello));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatch(/^\n\[AI Error: Ollama request timed out/);
  });

  it("ends silently when the caller aborts", async () => {
    const gateway = new AIGateway(baseConfig, { fetch: hanging, env: {} });
    const controller = new AbortController();
    controller.abort();

    expect(await drain(gateway.streamChat(hello, null, controller.signal))).toEqual([]);
  });

  // Sends one fragment, then stays open until the request is aborted.
  function stalledAfterFirst(onCancel: () => void): FetchLike {
    return async (_url, init) => {
      const signal = init?.signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode(ndjson({ message: { content: "first" } })));
          signal?.addEventListener("abort", () =>
            controller.error(new DOMException("This operation was aborted", "AbortError"))
          );
        },
        cancel() {
          onCancel();
        },
      });
      return new Response(body);
    };
  }

  it("stops quietly when the caller aborts mid-stream", async () => {
    const fetch = vi.fn<FetchLike>(stalledAfterFirst(() => {}));
    const gateway = gatewayWith(fetch);
    const caller = new AbortController();

    const chunks: string[] = [];
    for await (const chunk of gateway.streamChat(hello, null, caller.signal)) {
      chunks.push(chunk);
      caller.abort();
    }

    expect(chunks).toEqual(["first"]);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it("cancels the response body when the consumer stops reading", async () => {
    const onCancel = vi.fn();
    const fetch = vi.fn<FetchLike>(stalledAfterFirst(onCancel));
    const gateway = gatewayWith(fetch);

    const chunks: string[] = [];
    for await (const chunk of gateway.streamChat(hello)) {
      chunks.push(chunk);
      break;
    }

    expect(chunks).toEqual(["first"]);
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });
});

describe("OpenAI streaming", () => {
  it("refuses to call out without a key", async () => {
    const fetch = vi.fn<FetchLike>();

    const chunks = await drain(gatewayWith(fetch, { provider: "openai" }).streamChat(hello, "gpt-4o"));

    expect(chunks).toEqual(["[Error: Missing OpenAI API Key]"]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("parses SSE deltas and stops at [DONE]", async () => {
    const sse = [
      'data: {"choices":[{"delta":{"role":"assistant"}}]}',
      'data: {"choices":[{"delta":{"content":"Hi"}}]}',
      'data: {"choices":[{"delta":{"content":" there"}}]}',
      "data: [DONE]",
      'data: {"choices":[{"delta":{"content":"ignored"}}]}',
    ].join("\n\n");
    const fetch = vi.fn<FetchLike>(async () => new Response(sse));
    const gateway = gatewayWith(fetch, { provider: "openai" }, { OPENAI_API_KEY: "test-secret" });

    const chunks = await drain(gateway.streamChat(hello, "gpt-4o"));

    expect(chunks).toEqual(["Hi", " there"]);
    expect(fetch.mock.calls[0][0]).toBe("https://api.openai.com/v1/chat/completions");
    expect(new Headers(fetch.mock.calls[0][1]?.headers).get("authorization")).toBe("Bearer test-secret");
    expect(requestBody(fetch.mock.calls[0][1])).toEqual({ model: "gpt-4o", messages: hello, stream: true });
  });

  it("prefers the configured key over the environment", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response("data: [DONE]\n"));
    const gateway = gatewayWith(
      fetch,
      { provider: "openai", openai_key: "config-secret" },
      { OPENAI_API_KEY: "env-secret" }
    );

    await drain(gateway.streamChat(hello));

    expect(new Headers(fetch.mock.calls[0][1]?.headers).get("authorization")).toBe("Bearer config-secret");
  });

  it("surfaces HTTP errors from the body", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(JSON.stringify({ error: { message: "Invalid API key" } }), { status: 401 })
    );
    const gateway = gatewayWith(fetch, { provider: "openai", openai_key: "test-secret" });

    expect(await drain(gateway.streamChat(hello))).toEqual(["\n[AI Error: Invalid API key]"]);
  });

  it("ends at an error payload inside the stream", async () => {
    const sse = ['data: {"choices":[{"delta":{"content":"Hi"}}]}', 'data: {"error":{"message":"overloaded"}}'].join(
      "\n"
    );
    const fetch = vi.fn<FetchLike>(async () => new Response(sse));
    const gateway = gatewayWith(fetch, { provider: "openai", openai_key: "test-secret" });

    expect(await drain(gateway.streamChat(hello))).toEqual(["Hi", "\n[AI Error: overloaded]"]);
  });
});

describe("Anthropic streaming", () => {
  it("refuses to call out without a key", async () => {
    const fetch = vi.fn<FetchLike>();

    const chunks = await drain(gatewayWith(fetch, { provider: "anthropic" }).streamChat(hello));

    expect(chunks).toEqual(["[Error: Missing Anthropic API Key]"]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("sends the system prompt separately and reads text deltas", async () => {
    const sse = [
      "event: message_start",
      'data: {"type":"message_start","message":{"id":"msg_1"}}',
      "",
      "event: content_block_delta",
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Bat"}}',
      "",
      "event: content_block_delta",
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":" him second."}}',
      "",
      "event: message_stop",
      'data: {"type":"message_stop"}',
      "",
    ].join("\n");
    const fetch = vi.fn<FetchLike>(async () => new Response(sse));
    const gateway = gatewayWith(fetch, { provider: "anthropic" }, { ANTHROPIC_API_KEY: "test-secret" });

    const chunks = await drain(
      gateway.streamChat(
        [
          { role: "system", content: "Be brief" },
          { role: "user", content: "Who bats second?" },
        ],
        "claude-test"
      )
    );

    expect(chunks).toEqual(["Bat", " him second."]);

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    const headers = new Headers(init?.headers);
    expect(headers.get("x-api-key")).toBe("test-secret");
    expect(headers.get("anthropic-version")).toBe("2023-06-01");
    expect(requestBody(init)).toEqual({
      model: "claude-test",
      messages: [{ role: "user", content: "Who bats second?" }],
      stream: true,
      max_tokens: 4096,
      system: "Be brief",
    });
  });

  it("ends at an error event", async () => {
    const sse = 'event: error\ndata: {"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}\n';
    const fetch = vi.fn<FetchLike>(async () => new Response(sse));
    const gateway = gatewayWith(fetch, { provider: "anthropic", anthropic_key: "test-secret" });

    expect(await drain(gateway.streamChat(hello))).toEqual(["\n[AI Error: Overloaded]"]);
  });
});

describe("AIGateway", () => {
  it("drains a stream with chat()", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(ndjson({ message: { content: "a" } }, { message: { content: "b" }, done: true }))
    );

    expect(await gatewayWith(fetch).chat(hello)).toBe("ab");
  });

  it("checks Ollama by listing tags", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ models: [] })));

    expect(await gatewayWith(fetch).checkConnection()).toBe(true);
    expect(fetch.mock.calls[0][0]).toBe("http://localhost:11434/api/tags");
  });

  it("treats an unreachable Ollama as disconnected", async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });

    expect(await gatewayWith(fetch).checkConnection()).toBe(false);
  });

  it("treats a cloud provider as connected when a key is set", async () => {
    const fetch = vi.fn<FetchLike>();

    expect(await gatewayWith(fetch, { provider: "openai" }).checkConnection()).toBe(false);
    expect(await gatewayWith(fetch, { provider: "openai" }, { OPENAI_API_KEY: "test-secret" }).checkConnection()).toBe(
      true
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it("lists installed model names", async () => {
    const fetch = vi.fn<FetchLike>(
      async () => new Response(JSON.stringify({ models: [{ name: "lyra-coach:latest" }, { name: "llama3:8b" }] }))
    );

    expect(await gatewayWith(fetch).listModels()).toEqual(["lyra-coach:latest", "llama3:8b"]);
  });

  it("hides keys in the config view", () => {
    const gateway = gatewayWith(vi.fn<FetchLike>(), { openai_key: "test-secret" });

    expect(gateway.getConfigView()).toEqual({
      provider: "ollama",
      ollama_url: "http://localhost:11434",
      preferred_model: "lyra-coach:latest",
      openai_key_set: true,
      anthropic_key_set: false,
    });
  });

  it("keeps stored keys unless a settings update names them", () => {
    const gateway = gatewayWith(vi.fn<FetchLike>(), { openai_key: "test-secret" });

    gateway.applySettings(aiConfigSchema.parse({ provider: "openai", preferred_model: "gpt-4o" }));
    expect(gateway.getConfig()).toMatchObject({ provider: "openai", preferred_model: "gpt-4o", openai_key: "test-secret" });

    gateway.applySettings(aiConfigSchema.parse({ provider: "openai", openai_key: null }));
    expect(gateway.getConfig().openai_key).toBeNull();
  });
});
