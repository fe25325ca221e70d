import { setTimeout as delay } from 'node:timers/promises';

import { Agent, fetch as undiciFetch } from 'undici';
import { z } from 'zod';

import {
  asError,
  backoffMs,
  isAbortError,
  isConnRefused,
  isConnTimeout,
  isFetchFailed,
  makeClientError,
} from './client/error-utils.js';
import type { ChatCompletionChunk, ModelClient, ModelEvent, ToolCallRequest, Usage } from './types.js';

export { ClientError, makeClientError } from './client/error-utils.js';

// ── Persistent connection pool ───────────────────────────────────────────
// Reuses TCP+TLS connections across requests so each model step skips the handshake.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
  allowH2: true,
  connect: {
    rejectUnauthorized: true,
  },
});

/** The slice of a fetch Response the client reads. */
export type HttpResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  body: AsyncIterable<Uint8Array> | null;
  text(): Promise<string>;
};

export type FetchLike = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<HttpResponse>;

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, { ...init, dispatcher: pooledAgent });

export type StreamChatOptions = Parameters<ModelClient['streamChat']>[0];

export type ClientOptions = {
  endpoint: string;
  apiKey?: string;
  verbose?: boolean;
  /** Seconds to wait for response headers before giving up on an attempt. */
  responseTimeoutSec?: number;
  maxAttempts?: number;
  /** First retry delay; doubles per attempt. */
  retryBaseMs?: number;
  fetch?: FetchLike;
};

// ── SSE parsing ──────────────────────────────────────────────────────────

const ChunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().optional(),
                  id: z.string().optional(),
                  type: z.literal('function').optional(),
                  function: z
                    .object({ name: z.string().optional(), arguments: z.string().optional() })
                    .optional(),
                })
              )
              .optional(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

function parseDataLine(data: string): ChatCompletionChunk {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    throw makeClientError(`malformed stream chunk: ${data.slice(0, 200)}`, undefined, false);
  }
  const parsed = ChunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw makeClientError(`unexpected stream chunk shape: ${data.slice(0, 200)}`, undefined, false);
  }
  return parsed.data;
}

/**
 * Split an SSE byte stream into `data:` payloads and parse each as a chunk.
 * Stops at `data: [DONE]`.
 */
export async function* parseSseStream(body: AsyncIterable<Uint8Array>): AsyncGenerator<ChatCompletionChunk> {
  const decoder = new TextDecoder();
  let buf = '';

  const frames = function* (flush: boolean): Generator<string> {
    while (true) {
      const idx = buf.search(/\r?\n\r?\n/);
      if (idx === -1) break;
      const sep = buf.startsWith('\r\n', idx) ? 4 : 2;
      yield buf.slice(0, idx);
      buf = buf.slice(idx + sep);
    }
    if (flush && buf.trim()) {
      yield buf;
      buf = '';
    }
  };

  const dataOf = (frame: string): string | null => {
    const lines = frame
      .split(/\r?\n/)
      .filter((l) => l.startsWith('data:'))
      .map((l) => l.slice(5).trimStart());
    return lines.length ? lines.join('\n') : null;
  };

  for await (const bytes of body) {
    buf += decoder.decode(bytes, { stream: true });
    for (const frame of frames(false)) {
      const data = dataOf(frame);
      if (data === null) continue;
      if (data === '[DONE]') return;
      yield parseDataLine(data);
    }
  }
  buf += decoder.decode();
  for (const frame of frames(true)) {
    const data = dataOf(frame);
    if (data === null) continue;
    if (data === '[DONE]') return;
    yield parseDataLine(data);
  }
}

/**
 * Turn parsed chunks into model events: text per delta, then complete tool calls in
 * index order, then a single `done`.
 */
export async function* chunksToEvents(chunks: AsyncIterable<ChatCompletionChunk>): AsyncGenerator<ModelEvent> {
  const calls = new Map<number, { id?: string; name: string; args: string }>();
  let finishReason: string | null = null;
  let usage: Usage | undefined;

  for await (const chunk of chunks) {
    if (chunk.usage) usage = chunk.usage;
    for (const choice of chunk.choices ?? []) {
      const delta = choice.delta;
      if (delta?.content) yield { type: 'text', text: delta.content };
      for (const tc of delta?.tool_calls ?? []) {
        const idx = tc.index ?? 0;
        const cur = calls.get(idx) ?? { name: '', args: '' };
        if (tc.id) cur.id = tc.id;
        if (tc.function?.name) cur.name += tc.function.name;
        if (tc.function?.arguments) cur.args += tc.function.arguments;
        calls.set(idx, cur);
      }
      if (choice.finish_reason) finishReason = choice.finish_reason;
    }
  }

  for (const idx of [...calls.keys()].sort((a, b) => a - b)) {
    const c = calls.get(idx);
    if (!c?.name) continue;
    const call: ToolCallRequest = { id: c.id ?? `call_${idx}`, name: c.name, arguments: c.args };
    yield { type: 'tool_call', call };
  }
  yield { type: 'done', finishReason, usage };
}

// ── Client ───────────────────────────────────────────────────────────────

export class OpenAIClient implements ModelClient {
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly verbose: boolean;
  private readonly responseTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: ClientOptions) {
    this.endpoint = opts.endpoint.replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
    this.verbose = opts.verbose ?? false;
    this.responseTimeoutMs = Math.max(5_000, (opts.responseTimeoutSec ?? 600) * 1000);
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.retryBaseMs = opts.retryBaseMs ?? 2_000;
    this.fetchImpl = opts.fetch ?? defaultFetch;
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'text/event-stream' };
    if (this.apiKey) h.Authorization = `Bearer ${this.apiKey}`;
    return h;
  }

  private log(msg: string) {
    if (this.verbose) console.error(`[client] ${msg}`);
  }

  buildBody(opts: StreamChatOptions): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: opts.model,
      messages: opts.messages,
      stream: true,
      stream_options: { include_usage: true },
    };
    if (opts.tools?.length) {
      body.tools = opts.tools;
      body.tool_choice = 'auto';
    }
    if (opts.temperature !== undefined) body.temperature = opts.temperature;
    if (opts.max_tokens !== undefined) body.max_tokens = opts.max_tokens;
    return body;
  }

  /**
   * One attempt. The timeout covers the wait for response headers only. `signal` is the
   * per-stream signal owned by `streamChat`, so on success its listener stays attached and
   * aborting it also stops the body read.
   */
  private async fetchWithConnTimeout(url: string, body: string, signal: AbortSignal): Promise<HttpResponse> {
    const ac = new AbortController();
    const onCallerAbort = () => ac.abort(signal.reason);
    if (signal.aborted) onCallerAbort();
    else signal.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(() => ac.abort(), this.responseTimeoutMs);
    try {
      return await this.fetchImpl(url, { method: 'POST', headers: this.headers(), body, signal: ac.signal });
    } catch (e: unknown) {
      signal.removeEventListener('abort', onCallerAbort);
      // Distinguish connection timeout from caller abort.
      if (ac.signal.aborted && !signal.aborted) {
        throw makeClientError(`Connection timeout (${this.responseTimeoutMs}ms) to ${url}`, undefined, true);
      }
      throw asError(e, `connection failure to ${url}`);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Open the stream, retrying 429/503 and unreachable endpoints with backoff. */
  private async open(opts: StreamChatOptions & { signal: AbortSignal }): Promise<AsyncIterable<Uint8Array>> {
    const url = `${this.endpoint}/chat/completions`;
    const body = JSON.stringify(this.buildBody(opts));
    let lastErr: Error = makeClientError('POST /chat/completions failed without response', 503, true);

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const last = attempt === this.maxAttempts - 1;
      this.log(`→ POST ${url} (attempt ${attempt + 1}/${this.maxAttempts})`);

      let res: HttpResponse;
      try {
        res = await this.fetchWithConnTimeout(url, body, opts.signal);
      } catch (e: unknown) {
        if (opts.signal.aborted || isAbortError(e)) throw asError(e);
        lastErr = asError(e);
        if (isConnTimeout(e) || isConnRefused(e) || isFetchFailed(e)) {
          if (last) {
            throw makeClientError(`Cannot reach ${this.endpoint} (${lastErr.message})`, undefined, true);
          }
          const wait = backoffMs(attempt, this.retryBaseMs);
          this.log(`connection error (${lastErr.message}), retrying in ${wait}ms`);
          await delay(wait, undefined, { signal: opts.signal });
          continue;
        }
        throw lastErr;
      }

      if (res.status === 429 || res.status === 503) {
        const text = await res.text().catch(() => '');
        lastErr = makeClientError(
          `POST /chat/completions returned ${res.status}${text ? `: ${text.slice(0, 500)}` : ''}`,
          res.status,
          true
        );
        if (last) throw lastErr;
        const wait = backoffMs(attempt + 1, this.retryBaseMs);
        this.log(`${res.status} from server, retrying in ${wait}ms`);
        await delay(wait, undefined, { signal: opts.signal });
        continue;
      }

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw makeClientError(
          `POST /chat/completions failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
          res.status,
          false
        );
      }

      if (!res.body) throw makeClientError('No response body to read (stream)', res.status, false);
      return res.body;
    }
    throw lastErr;
  }

  async *streamChat(opts: StreamChatOptions): AsyncGenerator<ModelEvent> {
    const started = Date.now();
    // Lives as long as the stream: the caller's abort reaches the request until the last byte.
    const stream = new AbortController();
    const onCallerAbort = () => stream.abort(opts.signal?.reason);
    if (opts.signal?.aborted) onCallerAbort();
    else opts.signal?.addEventListener('abort', onCallerAbort, { once: true });
    try {
      const body = await this.open({ ...opts, signal: stream.signal });
      let deltas = 0;
      for await (const ev of chunksToEvents(parseSseStream(body))) {
        if (ev.type === 'text') deltas++;
        if (ev.type === 'done') {
          this.log(`← stream done (${ev.finishReason ?? 'no finish reason'}, ${deltas} delta(s), ${Date.now() - started}ms)`);
        }
        yield ev;
      }
    } finally {
      opts.signal?.removeEventListener('abort', onCallerAbort);
      // Releases the connection when the consumer stops early.
      stream.abort(new Error('stream closed'));
    }
  }
}
