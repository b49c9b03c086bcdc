import { setTimeout as delay } from 'node:timers/promises';

import { Agent, fetch as undiciFetch, type RequestInit, type Response } from 'undici';

import { asError, isConnRefused, isFetchFailed, makeClientError } from './client/error-utils.js';
import { parseCompletion, parseStreamChunk } from './client/parse.js';
import { resolveModel } from './config.js';
import type {
  ChatCompletionResponse,
  ChatMessage,
  ToolCall,
  ToolSchema,
  UsageBlock,
  WardenConfig,
} from './types.js';

export { ClientError, makeClientError } from './client/error-utils.js';

// Reuses TCP+TLS connections across requests.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
});

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type ChatOptions = {
  model: string;
  messages: ChatMessage[];
  tools?: ToolSchema[];
  temperature?: number;
  max_tokens?: number;
  signal?: AbortSignal;
};

export type ToolCallDeltaEvent = {
  index: number;
  id?: string;
  name?: string;
  argumentsChunk?: string;
  argumentsSoFar: string;
};

export type ChatStreamOptions = ChatOptions & {
  /** Awaited before the next chunk is processed. */
  onToken?: (text: string) => void | Promise<void>;
  onToolCallDelta?: (delta: ToolCallDeltaEvent) => void | Promise<void>;
  readTimeoutMs?: number;
};

/** What the conversation loop needs from a model backend. */
export interface ModelClient {
  chat(opts: ChatOptions): Promise<ChatCompletionResponse>;
  chatStream(opts: ChatStreamOptions): Promise<ChatCompletionResponse>;
}

export type OpenAIClientOptions = {
  fetch?: FetchFn;
  /** Wait between retries; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
  responseTimeoutSec?: number;
  verbose?: boolean;
};

const MAX_ATTEMPTS = 3;

export class OpenAIClient implements ModelClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private responseTimeoutMs = 600_000;
  private readonly verbose: boolean;

  constructor(
    private endpoint: string,
    private readonly apiKey?: string,
    opts: OpenAIClientOptions = {}
  ) {
    this.endpoint = endpoint.replace(/\/+$/, '');
    this.fetchFn =
      opts.fetch ?? ((url, init) => undiciFetch(url, { ...init, dispatcher: pooledAgent }));
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.verbose = opts.verbose ?? false;
    if (opts.responseTimeoutSec) this.setResponseTimeout(opts.responseTimeoutSec);
  }

  setResponseTimeout(seconds: number): void {
    if (Number.isFinite(seconds) && seconds > 0) this.responseTimeoutMs = seconds * 1000;
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) h.Authorization = `Bearer ${this.apiKey}`;
    return h;
  }

  private log(msg: string) {
    if (this.verbose) console.error(`[patchwarden] ${msg}`);
  }

  private buildBody(opts: ChatOptions, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: opts.model,
      // shallow copy so the session's messages are never mutated
      messages: opts.messages.map((m) => ({ ...m })),
      temperature: opts.temperature,
      max_tokens: opts.max_tokens,
      tools: opts.tools?.length ? opts.tools : undefined,
      stream,
    };
    // Ask streaming servers to include usage in the terminal SSE chunk.
    if (stream) body.stream_options = { include_usage: true };
    for (const k of Object.keys(body)) {
      if (body[k] === undefined) delete body[k];
    }
    return body;
  }

  private async post(url: string, body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    return this.fetchFn(url, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
      signal,
    });
  }

  /** Non-streaming chat with retry (connection refused 3x/2s, 429/503 exponential backoff). */
  async chat(opts: ChatOptions): Promise<ChatCompletionResponse> {
    const url = `${this.endpoint}/chat/completions`;
    const body = this.buildBody(opts, false);
    this.log(`→ POST ${url} (${opts.messages.length} messages)`);

    let lastErr: Error = makeClientError('POST /chat/completions failed without response', 503, true);

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const timeoutAc = new AbortController();
      const onCallerAbort = () => timeoutAc.abort();
      opts.signal?.addEventListener('abort', onCallerAbort, { once: true });
      const timer = setTimeout(() => timeoutAc.abort(), this.responseTimeoutMs);

      try {
        const res = await this.post(url, body, timeoutAc.signal);

        if (res.status === 503 || res.status === 429) {
          const backoff = Math.pow(2, attempt + 1) * 1000; // 2s, 4s
          lastErr = makeClientError(
            `POST /chat/completions returned ${res.status}, attempt ${attempt + 1}/${MAX_ATTEMPTS}`,
            res.status,
            true
          );
          await res.text().catch(() => '');
          if (attempt < MAX_ATTEMPTS - 1) {
            this.log(`${res.status} from server, retrying in ${backoff}ms...`);
            await this.sleep(backoff);
            continue;
          }
          throw lastErr;
        }

        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw makeClientError(
            `POST /chat/completions failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
            res.status,
            false
          );
        }

        const raw: unknown = await res.json();
        return parseCompletion(raw);
      } catch (e: unknown) {
        lastErr = asError(e, `POST /chat/completions attempt ${attempt + 1} failed`);
        if (opts.signal?.aborted) throw lastErr;
        if (timeoutAc.signal.aborted) {
          throw makeClientError(
            `Response timeout (${this.responseTimeoutMs}ms) waiting for ${url}`,
            undefined,
            true
          );
        }
        if (isConnRefused(e) || isFetchFailed(e)) {
          if (attempt < MAX_ATTEMPTS - 1) {
            this.log(`Connection error (${lastErr.message}), retrying in 2s (attempt ${attempt + 1}/3)...`);
            await this.sleep(2000);
            continue;
          }
          throw makeClientError(`Cannot reach ${this.endpoint} (${lastErr.message})`, undefined, true);
        }
        throw lastErr;
      } finally {
        clearTimeout(timer);
        opts.signal?.removeEventListener('abort', onCallerAbort);
      }
    }
    throw lastErr;
  }

  /** Streaming chat with retry, read timeout, and 400→non-stream fallback. */
  async chatStream(opts: ChatStreamOptions): Promise<ChatCompletionResponse> {
    const url = `${this.endpoint}/chat/completions`;
    const body = this.buildBody(opts, true);
    const readTimeout = opts.readTimeoutMs ?? 30_000;
    this.log(`→ POST ${url} (stream, ${opts.messages.length} messages)`);

    // The caller still sees the text through onToken.
    const fallbackToNonStream = async (reason: string) => {
      this.log(`${reason}, falling back to non-streaming`);
      const resp = await this.chat(opts);
      const text = resp.choices[0]?.message?.content;
      if (text) await opts.onToken?.(text);
      return resp;
    };

    let lastErr: Error = makeClientError('POST /chat/completions (stream) failed without response', 503, true);

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const ac = new AbortController();
      const onCallerAbort = () => ac.abort();
      opts.signal?.addEventListener('abort', onCallerAbort, { once: true });

      try {
        let res: Response;
        try {
          res = await this.post(url, body, ac.signal);
        } catch (e: unknown) {
          lastErr = asError(e, `POST /chat/completions (stream) attempt ${attempt + 1} failed`);
          if (opts.signal?.aborted) throw lastErr;
          if ((isConnRefused(e) || isFetchFailed(e)) && attempt < MAX_ATTEMPTS - 1) {
            this.log(`Connection error (${lastErr.message}), retrying in 2s (attempt ${attempt + 1}/3)...`);
            await this.sleep(2000);
            continue;
          }
          if (isConnRefused(e) || isFetchFailed(e)) {
            throw makeClientError(`Cannot reach ${this.endpoint} (${lastErr.message})`, undefined, true);
          }
          throw lastErr;
        }

        // Server does not support streaming this request.
        if (res.status === 400) {
          await res.text().catch(() => '');
          return await fallbackToNonStream('HTTP 400 on stream request');
        }

        if (res.status === 503 || res.status === 429) {
          await res.text().catch(() => '');
          lastErr = makeClientError(
            `POST /chat/completions (stream) returned ${res.status}, attempt ${attempt + 1}/${MAX_ATTEMPTS}`,
            res.status,
            true
          );
          if (attempt < MAX_ATTEMPTS - 1) {
            const backoff = Math.pow(2, attempt + 1) * 1000;
            this.log(`${res.status} from server, retrying in ${backoff}ms...`);
            await this.sleep(backoff);
            continue;
          }
          throw lastErr;
        }

        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw makeClientError(
            `POST /chat/completions (stream) failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
            res.status,
            false
          );
        }

        const parsed = await this.readStream(res, opts, readTimeout);
        if (parsed === 'timeout') return await fallbackToNonStream('read timeout with no data');
        return parsed;
      } finally {
        opts.signal?.removeEventListener('abort', onCallerAbort);
      }
    }
    throw lastErr;
  }

  /** Parse an SSE body. Returns 'timeout' when nothing arrived before the read timeout. */
  private async readStream(
    res: Response,
    opts: ChatStreamOptions,
    readTimeout: number
  ): Promise<ChatCompletionResponse | 'timeout'> {
    const reader = res.body?.getReader();
    if (!reader) throw new Error('No response body to read (stream)');

    const decoder = new TextDecoder();
    let buf = '';
    let content = '';
    let finishReason: string | null = null;
    let usage: UsageBlock | undefined;
    let sawData = false;
    const toolArgsByIndex = new Map<number, string>();
    const toolNameByIndex = new Map<number, string>();
    const toolIdByIndex = new Map<number, string>();

    const finalize = (): ChatCompletionResponse => {
      const toolCalls: ToolCall[] = [];
      const indices = [...toolNameByIndex.keys()].sort((a, b) => a - b);
      for (const idx of indices) {
        toolCalls.push({
          id: toolIdByIndex.get(idx) ?? `call_${idx}`,
          type: 'function',
          function: { name: toolNameByIndex.get(idx) ?? '', arguments: toolArgsByIndex.get(idx) ?? '' },
        });
      }
      return {
        id: 'stream',
        choices: [
          {
            index: 0,
            message: {
              role: 'assistant',
              content: content.length ? content : null,
              tool_calls: toolCalls.length ? toolCalls : undefined,
            },
            finish_reason: finishReason,
          },
        ],
        usage,
      };
    };

    const handleData = async (data: string): Promise<boolean> => {
      if (data === '[DONE]') return true;
      let raw: unknown;
      try {
        raw = JSON.parse(data);
      } catch {
        this.log(`skipping malformed SSE payload: ${data.slice(0, 120)}`);
        return false;
      }
      const chunk = parseStreamChunk(raw);
      if (chunk.usage) usage = chunk.usage;
      if (chunk.finishReason) finishReason = chunk.finishReason;
      if (chunk.content) {
        content += chunk.content;
        await opts.onToken?.(chunk.content);
      }
      for (const tc of chunk.toolCalls ?? []) {
        const i = tc.index ?? 0;
        if (tc.id && !toolIdByIndex.has(i)) toolIdByIndex.set(i, tc.id);
        if (tc.function?.name && !toolNameByIndex.has(i)) toolNameByIndex.set(i, tc.function.name);
        if (tc.function?.arguments) {
          toolArgsByIndex.set(i, (toolArgsByIndex.get(i) ?? '') + tc.function.arguments);
        }
        await opts.onToolCallDelta?.({
          index: i,
          id: toolIdByIndex.get(i),
          name: toolNameByIndex.get(i),
          argumentsChunk: tc.function?.arguments,
          argumentsSoFar: toolArgsByIndex.get(i) ?? '',
        });
      }
      return false;
    };

    while (true) {
      // Race reader.read() against a cancellable read timeout.
      const timeoutAc = new AbortController();
      const timeoutPromise = delay(readTimeout, undefined, { signal: timeoutAc.signal })
        .then(() => 'TIMEOUT' as const)
        .catch(() => 'CANCELLED' as const);
      const result = await Promise.race([reader.read(), timeoutPromise]);
      timeoutAc.abort();

      if (result === 'TIMEOUT') {
        await reader.cancel().catch(() => undefined);
        if (!sawData) return 'timeout';
        this.log('read timeout mid-stream, returning partial response');
        return finalize();
      }
      if (result === 'CANCELLED') continue;
      if (result.done) break;

      sawData = true;
      buf += decoder.decode(result.value, { stream: true });

      let idx: number;
      while ((idx = buf.indexOf('\n\n')) !== -1) {
        const frame = buf.slice(0, idx);
        buf = buf.slice(idx + 2);
        for (const line of frame.split('\n')) {
          // Only "data: ..." lines matter (skip event:, id:, comments)
          if (!line.startsWith('data:')) continue;
          if (await handleData(line.slice(5).trim())) {
            await reader.cancel().catch(() => undefined);
            return finalize();
          }
        }
      }
    }

    // Stream ended without [DONE]; flush a trailing frame if any.
    for (const line of buf.split('\n')) {
      if (line.startsWith('data:')) await handleData(line.slice(5).trim());
    }
    return finalize();
  }
}

/**
 * Client that follows `config.current_model`, so a /models switch takes
 * effect on the next request. One pooled OpenAIClient per alias.
 */
export class ModelRouter implements ModelClient {
  private readonly clients = new Map<string, OpenAIClient>();

  constructor(
    private readonly config: WardenConfig,
    private readonly opts: OpenAIClientOptions = {}
  ) {}

  current(): OpenAIClient {
    const alias = this.config.current_model;
    let client = this.clients.get(alias);
    if (!client) {
      const entry = resolveModel(this.config, alias);
      client = new OpenAIClient(entry.base_url, entry.api_key, this.opts);
      this.clients.set(alias, client);
    }
    return client;
  }

  async chat(opts: ChatOptions): Promise<ChatCompletionResponse> {
    return this.current().chat(opts);
  }

  async chatStream(opts: ChatStreamOptions): Promise<ChatCompletionResponse> {
    return this.current().chatStream(opts);
  }
}
