import { truncateToolOutput } from './tools/output.js';
import type { ChatMessage, ToolCall, Turn } from './types.js';

type AssistantMessage = Extract<ChatMessage, { role: 'assistant' }>;

/**
 * Project the durable turn log onto chat messages for the next model request.
 *
 * A tool call joins the assistant text that directly precedes it, or opens an empty
 * assistant message; a call after a tool result always opens a new one. Calls
 * that never got a result (the turn was cancelled mid-dispatch or the process died) are
 * dropped along with orphaned results, so the request never carries a dangling call id.
 * `cancelled` turns are bookkeeping only and are not sent.
 */
export function turnsToMessages(
  turns: readonly Turn[],
  opts: { systemPrompt?: string; maxToolOutputChars?: number } = {}
): ChatMessage[] {
  const out: ChatMessage[] = [];
  if (opts.systemPrompt) out.push({ role: 'system', content: opts.systemPrompt });
  let open: AssistantMessage | null = null;

  for (const t of turns) {
    switch (t.kind) {
      case 'user':
        out.push({ role: 'user', content: t.text });
        open = null;
        break;
      case 'model_text': {
        const msg: AssistantMessage = { role: 'assistant', content: t.text };
        out.push(msg);
        open = msg;
        break;
      }
      case 'tool_call': {
        if (!open) {
          open = { role: 'assistant', content: '' };
          out.push(open);
        }
        const call: ToolCall = {
          id: t.call.id,
          type: 'function',
          function: { name: t.call.name, arguments: t.call.arguments },
        };
        open.tool_calls = [...(open.tool_calls ?? []), call];
        break;
      }
      case 'tool_result': {
        const content =
          opts.maxToolOutputChars !== undefined
            ? truncateToolOutput(t.result.content, opts.maxToolOutputChars)
            : t.result.content;
        out.push({ role: 'tool', tool_call_id: t.result.callId, content });
        // Calls run one at a time, so the next call starts a new assistant message.
        open = null;
        break;
      }
      case 'cancelled':
        open = null;
        break;
    }
  }

  return pairToolCalls(out);
}

function pairToolCalls(msgs: ChatMessage[]): ChatMessage[] {
  const called = new Set<string>();
  const answered = new Set<string>();
  for (const m of msgs) {
    if (m.role === 'assistant') for (const c of m.tool_calls ?? []) called.add(c.id);
    if (m.role === 'tool') answered.add(m.tool_call_id);
  }

  const out: ChatMessage[] = [];
  for (const m of msgs) {
    if (m.role === 'tool') {
      if (called.has(m.tool_call_id)) out.push(m);
      continue;
    }
    if (m.role === 'assistant' && m.tool_calls) {
      const kept = m.tool_calls.filter((c) => answered.has(c.id));
      if (!kept.length && !m.content) continue;
      out.push(kept.length ? { role: 'assistant', content: m.content, tool_calls: kept } : { role: 'assistant', content: m.content });
      continue;
    }
    out.push(m);
  }
  return out;
}

function messageChars(m: ChatMessage): number {
  let chars = m.content.length + 20;
  if (m.role === 'assistant') {
    for (const t of m.tool_calls ?? []) chars += t.function.name.length + t.function.arguments.length + 30;
  }
  return chars;
}

export function estimateTokensFromMessages(messages: readonly ChatMessage[]): number {
  // crude: chars/4 + overhead per message + tool_calls JSON estimate
  let chars = 0;
  for (const m of messages) chars += messageChars(m);
  return Math.ceil(chars / 4);
}

/** Tokens consumed by tool schemas, estimated from their JSON size. */
export function estimateToolSchemaTokens(tools: readonly unknown[] | undefined): number {
  if (!tools || tools.length === 0) return 0;
  let chars = 0;
  for (const t of tools) chars += JSON.stringify(t).length;
  return Math.ceil(chars / 4);
}

/**
 * Keep the request under `contextWindow - maxTokens - margin`.
 *
 * Drops the oldest tool-call groups first (assistant message plus its tool results), then
 * the oldest plain messages. The system prompt and the last `minTailMessages` messages are
 * always kept.
 */
export function enforceContextBudget(opts: {
  messages: readonly ChatMessage[];
  contextWindow: number;
  maxTokens: number;
  minTailMessages?: number;
  toolSchemaTokens?: number;
  log?: (msg: string) => void;
}): ChatMessage[] {
  const minTail = Math.max(1, opts.minTailMessages ?? 8);
  const safetyMargin = 1024 + (opts.toolSchemaTokens ?? 800);
  const budget = Math.max(1024, opts.contextWindow - opts.maxTokens - safetyMargin);

  const msgs = [...opts.messages];
  const beforeCount = msgs.length;
  const beforeTokens = estimateTokensFromMessages(msgs);
  if (beforeTokens <= budget) return msgs;

  const sysStart = msgs[0]?.role === 'system' ? 1 : 0;
  let current = beforeTokens;
  const drop = (start: number, end: number) => {
    for (const d of msgs.splice(start, end - start)) current -= Math.ceil(messageChars(d) / 4);
  };

  // Phase 1: oldest tool-call groups. A group is dropped whole so no call id is orphaned.
  while (current > budget && msgs.length - sysStart > minTail) {
    const idx = findOldestToolCallGroup(msgs, sysStart, msgs.length - minTail);
    if (idx === -1) break;
    drop(idx, findGroupEnd(msgs, idx));
  }

  // Phase 2: oldest messages of any kind.
  while (current > budget && msgs.length - sysStart > minTail) {
    const end = msgs[sysStart]?.role === 'assistant' ? findGroupEnd(msgs, sysStart) : sysStart + 1;
    drop(sysStart, end);
  }

  // A leading tool message has lost its call; it cannot be sent.
  while (msgs[sysStart]?.role === 'tool') drop(sysStart, sysStart + 1);

  const dropped = beforeCount - msgs.length;
  if (dropped > 0) {
    opts.log?.(`[context] dropped ${dropped} old message(s), ~${beforeTokens - current} tokens freed (budget ${budget})`);
  }
  return msgs;
}

function findOldestToolCallGroup(msgs: ChatMessage[], fromIdx: number, toIdx: number): number {
  for (let i = fromIdx; i < toIdx; i++) {
    const m = msgs[i];
    if (m?.role === 'assistant' && m.tool_calls?.length) return i;
  }
  return -1;
}

/** Exclusive end of the group starting at `startIdx`: the message plus its trailing tool results. */
function findGroupEnd(msgs: ChatMessage[], startIdx: number): number {
  let i = startIdx + 1;
  while (i < msgs.length && msgs[i]?.role === 'tool') i++;
  return i;
}
