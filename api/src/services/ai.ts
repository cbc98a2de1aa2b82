/**
 * AI Gateway
 *
 * Routes a chat transcript to the configured provider and normalizes the
 * three streaming wire formats into one lazy stream of text fragments:
 *
 * 1. **Ollama (local)**: newline-delimited JSON over a chunked POST body.
 *    Retries across a list of candidate models when a model is missing.
 * 2. **OpenAI**: server-sent events, `data: {...}` lines ending in `[DONE]`.
 * 3. **Anthropic**: server-sent events with typed payloads
 *    (`content_block_delta`, `message_stop`, `error`).
 *
 * Failures never throw out of a stream. They arrive as a final bracketed
 * fragment (`\n[AI Error: ...]`) so text already sent to the client stays put.
 *
 * @module services/ai
 */

import { DEFAULT_MODEL } from "../config.js";
import type { AIConfigInput } from "../lib/validation.js";
import type { AIConfig, AIConfigView, AIProviderName, ChatMessage } from "../../../shared/types.js";

// ============================================================================
// Configuration
// ============================================================================

const OPENAI_URL = "https://api.openai.com/v1/chat/completions";
const ANTHROPIC_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";
const ANTHROPIC_MAX_TOKENS = 4096;

/** Whole-request budget for a streamed chat, connect through last byte. */
const DEFAULT_TIMEOUT_MS = 60_000;

/** Liveness probe budget for GET /api/tags. */
const PROBE_TIMEOUT_MS = 3_000;

const EMPTY_RESPONSE_ERROR = "Ollama returned an empty response.";

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GatewayOptions {
  /** HTTP client, injectable for tests. Defaults to global fetch. */
  fetch?: FetchLike;
  /** Source of fallback API keys. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface OllamaStatus {
  ollama_url: string;
  connected: boolean;
  models: string[];
}

interface ProviderContext {
  fetch: FetchLike;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
}

/**
 * One way of turning a transcript into a fragment stream.
 */
export interface ChatProvider {
  readonly name: AIProviderName;
  stream(messages: ChatMessage[], model: string, signal?: AbortSignal): AsyncGenerator<string, void>;
  checkConnection(): Promise<boolean>;
}

// ============================================================================
// Shared helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function nonBlankString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

/**
 * Turn a raw provider failure body into the text shown to the user.
 *
 * JSON objects are searched for a non-blank string under `error`, `message`
 * or `detail`, in that order (an `error` object contributes its `message`).
 * Anything else falls back to the trimmed body, then to `fallback`.
 */
export function extractErrorMessage(payload: string, fallback: string): string {
  if (!payload) return fallback;

  const parsed = parseJsonObject(payload);
  if (parsed) {
    for (const key of ["error", "message", "detail"]) {
      const value = parsed[key];
      const direct = nonBlankString(value);
      if (direct) return direct;
      if (key === "error" && isRecord(value)) {
        const nested = nonBlankString(value.message);
        if (nested) return nested;
      }
    }
  }

  return payload.trim() || fallback;
}

export function isModelNotFoundError(errorText: string): boolean {
  const lowered = errorText.toLowerCase();
  return lowered.includes("model") && lowered.includes("not found");
}

export function errorFragment(message: string): string {
  return `\n[AI Error: ${message}]`;
}

/**
 * Split a byte stream into lines, tolerating records cut across chunks.
 * Stopping iteration early cancels the underlying body.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let open = true;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        open = false;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        yield line;
        newline = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer) yield buffer.replace(/\r$/, "");
  } catch (err) {
    open = false;
    throw err;
  } finally {
    // Consumer bailed out mid-stream: drop the connection.
    if (open) await reader.cancel();
    reader.releaseLock();
  }
}

/** Payload of an SSE `data:` line, or null for any other line. */
function sseData(line: string): string | null {
  if (!line.startsWith("data:")) return null;
  return line.slice(5).trim();
}

/**
 * Ties one upstream request to a deadline and to the caller's abort signal.
 */
class UpstreamCall {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly onCallerAbort = () => this.controller.abort();
  timedOut = false;

  constructor(
    timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);

    if (callerSignal?.aborted) this.controller.abort();
    callerSignal?.addEventListener("abort", this.onCallerAbort, { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** The caller went away; nobody is left to read an error. */
  get cancelled(): boolean {
    return this.callerSignal?.aborted ?? false;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener("abort", this.onCallerAbort);
    this.controller.abort();
  }
}

/**
 * Common lifecycle for the HTTP-backed providers: deadline, cancellation,
 * and converting thrown network errors into a terminal error fragment.
 */
abstract class HttpChatProvider implements ChatProvider {
  abstract readonly name: AIProviderName;
  protected abstract readonly label: string;
  protected abstract readonly connectionErrorMessage: string;

  constructor(
    protected readonly config: AIConfig,
    protected readonly ctx: ProviderContext
  ) {}

  protected abstract open(messages: ChatMessage[], model: string, signal: AbortSignal): AsyncGenerator<string, void>;

  abstract checkConnection(): Promise<boolean>;

  async *stream(messages: ChatMessage[], model: string, signal?: AbortSignal): AsyncGenerator<string, void> {
    const call = new UpstreamCall(this.ctx.timeoutMs, signal);
    try {
      yield* this.open(messages, model, call.signal);
    } catch (err) {
      if (call.cancelled) return;
      if (call.timedOut) {
        console.warn(`[AI Gateway] ${this.label} request timed out`);
        yield errorFragment(`${this.label} request timed out after ${Math.round(this.ctx.timeoutMs / 1000)}s.`);
        return;
      }
      console.error(`[AI Gateway] ${this.label} streaming error:`, err);
      yield errorFragment(this.connectionErrorMessage);
    } finally {
      call.dispose();
    }
  }

  protected post(url: string, headers: Record<string, string>, body: unknown, signal: AbortSignal): Promise<Response> {
    return this.ctx.fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });
  }
}

// ============================================================================
// Ollama Implementation
// ============================================================================

/** How one candidate-model attempt ended. */
type AttemptOutcome =
  | { kind: "finished" }
  | { kind: "fallthrough"; error: string | null }
  | { kind: "failed"; error: string };

/**
 * Models to try, in order, without duplicates or blanks: the requested
 * model, its `:latest` form, the preferred model, its `:latest` form, and
 * the built-in coaching model.
 */
export function buildCandidateModels(model: string, preferredModel: string): string[] {
  const withTag = (name: string) => (name && !name.includes(":") ? `${name}:latest` : null);
  const candidates: string[] = [];

  for (const candidate of [model, withTag(model), preferredModel, withTag(preferredModel), DEFAULT_MODEL]) {
    if (candidate && !candidates.includes(candidate)) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

export class OllamaProvider extends HttpChatProvider {
  readonly name = "ollama";
  protected readonly label = "Ollama";
  protected readonly connectionErrorMessage = "Connection failed. Check that Ollama is running.";

  /**
   * Walk the candidate list until a model produces content or fails with
   * something other than "model not found". An empty answer also moves on.
   */
  protected async *open(messages: ChatMessage[], model: string, signal: AbortSignal): AsyncGenerator<string, void> {
    let lastError = EMPTY_RESPONSE_ERROR;

    for (const candidate of buildCandidateModels(model, this.config.preferred_model)) {
      const outcome = yield* this.attempt(messages, candidate, signal);

      if (outcome.kind === "finished") return;
      if (outcome.kind === "failed") {
        yield errorFragment(outcome.error);
        return;
      }
      if (outcome.error) {
        lastError = outcome.error;
        console.warn(`[AI Gateway] Ollama model '${candidate}' unavailable. Trying fallback model.`);
      }
    }

    yield errorFragment(lastError);
  }

  private async *attempt(
    messages: ChatMessage[],
    model: string,
    signal: AbortSignal
  ): AsyncGenerator<string, AttemptOutcome> {
    const response = await this.post(
      `${this.config.ollama_url}/api/chat`,
      { "Content-Type": "application/json" },
      { model, messages, stream: true },
      signal
    );

    if (!response.ok) {
      const error = extractErrorMessage(
        await response.text(),
        `Ollama request failed with status ${response.status}.`
      );
      return isModelNotFoundError(error) ? { kind: "fallthrough", error } : { kind: "failed", error };
    }
    if (!response.body) return { kind: "fallthrough", error: null };

    let contentSent = false;
    for await (const line of readLines(response.body)) {
      if (!line.trim()) continue;
      const record = parseJsonObject(line);
      if (!record) continue;

      if (record.error) {
        const error = extractErrorMessage(line, "Ollama returned an error.");
        if (!contentSent && isModelNotFoundError(error)) return { kind: "fallthrough", error };
        return { kind: "failed", error };
      }

      const message = record.message;
      if (isRecord(message) && typeof message.content === "string" && message.content) {
        contentSent = true;
        yield message.content;
      }
      if (record.done === true) break;
    }

    return contentSent ? { kind: "finished" } : { kind: "fallthrough", error: null };
  }

  async checkConnection(baseUrl: string = this.config.ollama_url): Promise<boolean> {
    try {
      const response = await this.getTags(baseUrl);
      return response.ok;
    } catch {
      return false;
    }
  }

  /** Installed model names, or an empty list when Ollama can't be reached. */
  async listModels(baseUrl: string = this.config.ollama_url): Promise<string[]> {
    try {
      const response = await this.getTags(baseUrl);
      if (!response.ok) return [];
      const data: unknown = await response.json();
      if (!isRecord(data) || !Array.isArray(data.models)) return [];
      return data.models.flatMap((m: unknown) => (isRecord(m) && typeof m.name === "string" ? [m.name] : []));
    } catch (err) {
      console.warn(`[AI Gateway] Could not list Ollama models at ${baseUrl}:`, err);
      return [];
    }
  }

  private async getTags(baseUrl: string): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), PROBE_TIMEOUT_MS);
    try {
      return await this.ctx.fetch(`${baseUrl.replace(/\/+$/, "")}/api/tags`, {
        method: "GET",
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

// ============================================================================
// OpenAI Implementation
// ============================================================================

export class OpenAIProvider extends HttpChatProvider {
  readonly name = "openai";
  protected readonly label = "OpenAI";
  protected readonly connectionErrorMessage = "Failed to get response from OpenAI.";

  private apiKey(): string | null {
    return this.config.openai_key || this.ctx.env.OPENAI_API_KEY || null;
  }

  protected async *open(messages: ChatMessage[], model: string, signal: AbortSignal): AsyncGenerator<string, void> {
    const apiKey = this.apiKey();
    if (!apiKey) {
      yield "[Error: Missing OpenAI API Key]";
      return;
    }

    const response = await this.post(
      OPENAI_URL,
      { Authorization: `Bearer ${apiKey}`, "Content-Type": "application/json" },
      { model, messages, stream: true },
      signal
    );

    if (!response.ok) {
      yield errorFragment(
        extractErrorMessage(await response.text(), `OpenAI request failed with status ${response.status}.`)
      );
      return;
    }
    if (!response.body) return;

    for await (const line of readLines(response.body)) {
      const payload = sseData(line);
      if (payload === null || payload === "") continue;
      if (payload === "[DONE]") return;

      const data = parseJsonObject(payload);
      if (!data) continue;

      if (data.error) {
        yield errorFragment(extractErrorMessage(payload, "OpenAI returned an error."));
        return;
      }

      const choice = Array.isArray(data.choices) ? data.choices[0] : undefined;
      const delta = isRecord(choice) ? choice.delta : undefined;
      if (isRecord(delta) && typeof delta.content === "string" && delta.content) {
        yield delta.content;
      }
    }
  }

  async checkConnection(): Promise<boolean> {
    return Boolean(this.apiKey());
  }
}

// ============================================================================
// Anthropic Implementation
// ============================================================================

/**
 * Anthropic rejects `system` entries inside `messages`; the system prompt
 * travels as a top-level field instead. The last system message wins.
 */
export function splitSystemPrompt(messages: ChatMessage[]): {
  system: string | null;
  messages: ChatMessage[];
} {
  let system: string | null = null;
  const rest: ChatMessage[] = [];
  for (const msg of messages) {
    if (msg.role === "system") system = msg.content;
    else rest.push(msg);
  }
  return { system, messages: rest };
}

export class AnthropicProvider extends HttpChatProvider {
  readonly name = "anthropic";
  protected readonly label = "Anthropic";
  protected readonly connectionErrorMessage = "Failed to get response from Anthropic.";

  private apiKey(): string | null {
    return this.config.anthropic_key || this.ctx.env.ANTHROPIC_API_KEY || null;
  }

  protected async *open(messages: ChatMessage[], model: string, signal: AbortSignal): AsyncGenerator<string, void> {
    const apiKey = this.apiKey();
    if (!apiKey) {
      yield "[Error: Missing Anthropic API Key]";
      return;
    }

    const split = splitSystemPrompt(messages);
    const response = await this.post(
      ANTHROPIC_URL,
      {
        "x-api-key": apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
        "content-type": "application/json",
      },
      {
        model,
        messages: split.messages,
        stream: true,
        max_tokens: ANTHROPIC_MAX_TOKENS,
        ...(split.system ? { system: split.system } : {}),
      },
      signal
    );

    if (!response.ok) {
      yield errorFragment(
        extractErrorMessage(await response.text(), `Anthropic request failed with status ${response.status}.`)
      );
      return;
    }
    if (!response.body) return;

    for await (const line of readLines(response.body)) {
      const payload = sseData(line);
      if (!payload) continue;

      const data = parseJsonObject(payload);
      if (!data) continue;

      if (data.type === "error") {
        yield errorFragment(extractErrorMessage(payload, "Anthropic returned an error."));
        return;
      }
      if (data.type === "message_stop") return;
      if (data.type === "content_block_delta" && isRecord(data.delta) && typeof data.delta.text === "string") {
        if (data.delta.text) yield data.delta.text;
      }
    }
  }

  async checkConnection(): Promise<boolean> {
    return Boolean(this.apiKey());
  }
}

// ============================================================================
// Gateway
// ============================================================================

export class AIGateway {
  private config: AIConfig;
  private readonly ctx: ProviderContext;

  constructor(config: AIConfig, options: GatewayOptions = {}) {
    this.config = { ...config };
    this.ctx = {
      fetch: options.fetch ?? ((input, init) => fetch(input, init)),
      env: options.env ?? process.env,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
  }

  getConfig(): AIConfig {
    return { ...this.config };
  }

  /** Settings as exposed over HTTP; keys are reduced to "is one set". */
  getConfigView(): AIConfigView {
    return {
      provider: this.config.provider,
      ollama_url: this.config.ollama_url,
      preferred_model: this.config.preferred_model,
      openai_key_set: Boolean(this.config.openai_key || this.ctx.env.OPENAI_API_KEY),
      anthropic_key_set: Boolean(this.config.anthropic_key || this.ctx.env.ANTHROPIC_API_KEY),
    };
  }

  updateConfig(config: AIConfig): void {
    this.config = { ...config };
    console.log(`[AI Gateway] Provider set to ${config.provider} (${config.preferred_model})`);
  }

  /**
   * Apply a settings update. Keys left undefined keep their current value;
   * null clears them.
   */
  applySettings(input: AIConfigInput): AIConfigView {
    this.updateConfig({
      provider: input.provider,
      ollama_url: input.ollama_url,
      preferred_model: input.preferred_model,
      openai_key: input.openai_key === undefined ? this.config.openai_key : input.openai_key,
      anthropic_key: input.anthropic_key === undefined ? this.config.anthropic_key : input.anthropic_key,
    });
    return this.getConfigView();
  }

  /** The provider selected by the current configuration. */
  provider(): ChatProvider {
    switch (this.config.provider) {
      case "openai":
        return new OpenAIProvider(this.config, this.ctx);
      case "anthropic":
        return new AnthropicProvider(this.config, this.ctx);
      case "ollama":
        return new OllamaProvider(this.config, this.ctx);
    }
  }

  /** The local provider, whatever the active selection is. */
  local(): OllamaProvider {
    return new OllamaProvider(this.config, this.ctx);
  }

  /**
   * Stream a chat completion. `model` overrides the preferred model.
   * Aborting `signal` stops the upstream read without an error fragment.
   */
  streamChat(messages: ChatMessage[], model?: string | null, signal?: AbortSignal): AsyncGenerator<string, void> {
    const effectiveModel = model || this.config.preferred_model;
    return this.provider().stream(messages, effectiveModel, signal);
  }

  /** Drain {@link streamChat} into one string. */
  async chat(messages: ChatMessage[], model?: string | null): Promise<string> {
    return collect(this.streamChat(messages, model));
  }

  checkConnection(): Promise<boolean> {
    return this.provider().checkConnection();
  }

  listModels(baseUrl?: string): Promise<string[]> {
    return this.local().listModels(baseUrl);
  }

  /** Reachability and installed models of an Ollama server (default: the configured one). */
  async ollamaStatus(baseUrl: string = this.config.ollama_url): Promise<OllamaStatus> {
    const ollama = this.local();
    const connected = await ollama.checkConnection(baseUrl);
    return {
      ollama_url: baseUrl,
      connected,
      models: connected ? await ollama.listModels(baseUrl) : [],
    };
  }
}

export async function collect(stream: AsyncIterable<string>): Promise<string> {
  let text = "";
  for await (const chunk of stream) {
    text += chunk;
  }
  return text;
}
