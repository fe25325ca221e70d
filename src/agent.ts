/**
 * Agent loop: one user utterance in, a streamed, tool-using model turn out.
 *
 * Every turn boundary is appended to the session store before the loop moves on, so the
 * durable log always mirrors what happened. Tool failures come back as ToolResults; only a
 * SessionStoreError escapes `ask`.
 */

import { buildSystemPrompt } from './agent/prompt.js';
import { enforceContextBudget, estimateToolSchemaTokens, turnsToMessages } from './history.js';
import { SessionStoreError, type SessionStore } from './session/store.js';
import type { ToolRegistry } from './tools/registry.js';
import type {
  ModelClient,
  RedlineConfig,
  ToolCallRequest,
  ToolResult,
  Turn,
  Usage,
} from './types.js';
import { errorMessage, nowIso } from './utils.js';

export type AgentHooks = {
  /** Each text delta as it arrives. */
  onToken?: (text: string) => void;
  onToolCall?: (call: ToolCallRequest) => void;
  onToolResult?: (result: ToolResult, call: ToolCallRequest) => void;
  /** Aborting cancels the turn, same as `cancel()`. */
  signal?: AbortSignal;
};

export type TurnOutcome = {
  /** Text of the final model_text turn ('' when the turn ended without one). */
  text: string;
  cancelled: boolean;
  toolCalls: number;
  steps: number;
  /** Set when the model request failed. */
  error?: string;
  usage?: Usage;
};

export interface AgentSession {
  readonly id: string;
  readonly createdAt: string;
  ask(utterance: string, hooks?: AgentHooks): Promise<TurnOutcome>;
  /** Cancel the running turn. A no-op when idle. */
  cancel(reason?: string): void;
  /** The session's turns, oldest first. */
  history(): readonly Turn[];
  readonly busy: boolean;
}

export type CreateSessionOptions = {
  config: RedlineConfig;
  store: SessionStore;
  sessionId: string;
  /** Owns the mutation pipeline and, through it, the approval gate. */
  registry: ToolRegistry;
  client: ModelClient;
  systemPrompt?: string;
};

/**
 * Next event of the model stream, or null once `signal` aborts. A server that stalls
 * mid-response cannot hold a cancelled turn.
 */
async function nextOrAbort<T>(it: AsyncIterator<T>, signal: AbortSignal): Promise<IteratorResult<T> | null> {
  if (signal.aborted) return null;
  let onAbort = () => {};
  const aborted = new Promise<null>((resolve) => {
    onAbort = () => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([it.next(), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

export function createSession(opts: CreateSessionOptions): AgentSession {
  const { config, store, registry, client } = opts;
  const opened = store.open(opts.sessionId);
  const turns: Turn[] = [...opened.turns];
  const systemPrompt =
    opts.systemPrompt ??
    buildSystemPrompt({
      workspaceRoot: config.workspace_root,
      toolNames: registry.names(),
      approvalMode: config.approval_mode,
    });

  let running: AbortController | null = null;

  const append = (turn: Turn): void => {
    store.append(opened.id, turn);
    turns.push(turn);
  };

  const debug = (msg: string) => {
    if (config.verbose) console.error(msg);
  };

  async function ask(utterance: string, hooks: AgentHooks = {}): Promise<TurnOutcome> {
    if (running) throw new Error('a turn is already running in this session');
    const ac = new AbortController();
    running = ac;
    const onExternalAbort = () => ac.abort(new Error('cancelled by user'));
    if (hooks.signal?.aborted) onExternalAbort();
    else hooks.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const outcome: TurnOutcome = { text: '', cancelled: false, toolCalls: 0, steps: 0 };
    const cancelled = (partial: string): TurnOutcome => {
      if (partial) append({ kind: 'model_text', at: nowIso(), text: partial });
      const reason = ac.signal.reason instanceof Error ? ac.signal.reason.message : 'cancelled by user';
      append({ kind: 'cancelled', at: nowIso(), reason });
      return { ...outcome, cancelled: true };
    };

    try {
      append({ kind: 'user', at: nowIso(), text: utterance });

      const tools = registry.schemas();
      const toolTokens = estimateToolSchemaTokens(tools);

      while (outcome.steps < config.max_iterations) {
        if (ac.signal.aborted) return cancelled('');
        outcome.steps++;

        const messages = enforceContextBudget({
          messages: turnsToMessages(turns, { systemPrompt, maxToolOutputChars: config.max_tool_output_chars }),
          contextWindow: config.context_window,
          maxTokens: config.max_tokens,
          toolSchemaTokens: toolTokens,
          log: debug,
        });

        let text = '';
        let callsThisStep = 0;
        const stream = client.streamChat({
          model: config.model,
          messages,
          tools: tools.length ? tools : undefined,
          temperature: config.temperature,
          max_tokens: config.max_tokens,
          signal: ac.signal,
        });
        try {
          for (;;) {
            const step = await nextOrAbort(stream, ac.signal);
            if (!step || step.done) break;
            const ev = step.value;
            if (ev.type === 'text') {
              text += ev.text;
              hooks.onToken?.(ev.text);
            } else if (ev.type === 'tool_call') {
              if (text) {
                append({ kind: 'model_text', at: nowIso(), text });
                text = '';
              }
              append({ kind: 'tool_call', at: nowIso(), call: ev.call });
              hooks.onToolCall?.(ev.call);
              const result = await registry.dispatch(ev.call, {
                workspaceRoot: config.workspace_root,
                maxOutputChars: config.max_tool_output_chars,
                signal: ac.signal,
              });
              append({ kind: 'tool_result', at: nowIso(), result });
              hooks.onToolResult?.(result, ev.call);
              callsThisStep++;
              outcome.toolCalls++;
            } else {
              outcome.usage = ev.usage;
            }
          }
        } catch (e: unknown) {
          if (e instanceof SessionStoreError) throw e;
          if (ac.signal.aborted) return cancelled(text);
          if (text) append({ kind: 'model_text', at: nowIso(), text });
          return { ...outcome, text, error: errorMessage(e) };
        } finally {
          // Not awaited: a stalled read still holds the generator until its request aborts.
          void stream.return(undefined).catch((e: unknown) => debug(`[agent] closing model stream: ${errorMessage(e)}`));
        }

        if (ac.signal.aborted) return cancelled(text);

        if (callsThisStep === 0) {
          if (text) append({ kind: 'model_text', at: nowIso(), text });
          return { ...outcome, text };
        }
        if (text) append({ kind: 'model_text', at: nowIso(), text });
      }

      const stop =
        `Stopped after ${config.max_iterations} model step(s) without a final answer. ` +
        'Ask again to continue from here.';
      append({ kind: 'model_text', at: nowIso(), text: stop });
      return { ...outcome, text: stop };
    } finally {
      hooks.signal?.removeEventListener('abort', onExternalAbort);
      running = null;
    }
  }

  return {
    id: opened.id,
    createdAt: opened.createdAt,
    ask,
    cancel(reason = 'cancelled by user') {
      running?.abort(new Error(reason));
    },
    history: () => turns,
    get busy() {
      return running !== null;
    },
  };
}
