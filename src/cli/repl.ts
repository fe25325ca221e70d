/**
 * Interactive loop: read a line, run a command or an agent turn, repeat.
 */

import type { Interface } from 'node:readline/promises';

import type { AgentSession } from '../agent.js';
import { err, previewArgs, type Styler } from '../term.js';
import type { RedlineConfig, ToolCallRequest, ToolResult, Turn } from '../types.js';
import { friendlyError } from './args.js';

export type ReplCommand = 'help' | 'history' | 'session' | 'exit';

/** Whole-line commands; anything else is sent to the model. A leading slash is accepted. */
export function parseReplCommand(line: string): ReplCommand | null {
  const word = line.trim().replace(/^\//, '').toLowerCase();
  if (word === 'help' || word === '?') return 'help';
  if (word === 'history') return 'history';
  if (word === 'session') return 'session';
  if (word === 'exit' || word === 'quit') return 'exit';
  return null;
}

export const REPL_HELP = [
  'Commands:',
  '  help      show this list',
  '  history   print the turns of this session',
  '  session   show the session id and log directory',
  '  exit      leave (also: quit, Ctrl-D)',
  'Anything else is a request, e.g. "replace Hello with Hi in report.docx".',
  'Ctrl-C cancels a running request.',
].join('\n');

function firstLine(text: string, max = 160): string {
  const line = text.split('\n', 1)[0] ?? '';
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}

export function formatToolCall(call: ToolCallRequest, s: Styler): string {
  return s.dim(`→ ${call.name}(${previewArgs(call.arguments)})`);
}

export function formatToolResult(result: ToolResult, s: Styler): string {
  const head = firstLine(result.content);
  return result.ok ? s.dim(`  ✓ ${head}`) : s.yellow(`  ✗ ${head}`);
}

/** Render stored turns the way they looked live. Used on resume and by `history`. */
export function renderTurns(turns: readonly Turn[], s: Styler, showToolCalls: boolean): string {
  const out: string[] = [];
  for (const t of turns) {
    switch (t.kind) {
      case 'user':
        out.push(`${s.cyan('you>')} ${t.text}`);
        break;
      case 'model_text':
        out.push(t.text);
        break;
      case 'tool_call':
        if (showToolCalls) out.push(formatToolCall(t.call, s));
        break;
      case 'tool_result':
        if (showToolCalls) out.push(formatToolResult(t.result, s));
        break;
      case 'cancelled':
        out.push(s.yellow(`[cancelled: ${t.reason}]`));
        break;
    }
  }
  return out.join('\n');
}

export type ReplOptions = {
  session: AgentSession;
  config: RedlineConfig;
  rl: Interface;
  styler: Styler;
  /** Print prior turns before the first prompt. */
  resumed: boolean;
  write?: (s: string) => void;
};

/** Run one request and print its stream. SessionStoreError propagates. */
export async function runTurn(opts: Omit<ReplOptions, 'rl' | 'resumed'>, line: string): Promise<void> {
  const { session, config, styler: s } = opts;
  const write = opts.write ?? ((x: string) => process.stdout.write(x));
  let midLine = false;

  const outcome = await session.ask(line, {
    onToken: (t) => {
      write(t);
      midLine = !t.endsWith('\n');
    },
    onToolCall: (call) => {
      if (!config.show_tool_calls) return;
      write(`${midLine ? '\n' : ''}${formatToolCall(call, s)}\n`);
      midLine = false;
    },
    onToolResult: (result) => {
      if (!config.show_tool_calls) return;
      write(`${formatToolResult(result, s)}\n`);
    },
  });

  if (midLine) write('\n');
  if (outcome.cancelled) write(`${s.yellow('[cancelled]')}\n`);
  if (outcome.error) write(`${err(friendlyError(new Error(outcome.error)), s)}\n`);
}

export async function runRepl(opts: ReplOptions): Promise<void> {
  const { session, config, rl, styler: s } = opts;
  const write = opts.write ?? ((x: string) => process.stdout.write(x));

  if (opts.resumed && session.history().length) {
    write(`${s.dim(`── resumed session ${session.id} ──`)}\n`);
    write(`${renderTurns(session.history(), s, config.show_tool_calls)}\n`);
    write(`${s.dim('──')}\n`);
  }

  rl.on('SIGINT', () => {
    if (session.busy) {
      session.cancel('cancelled by user (Ctrl-C)');
      return;
    }
    write('\n');
    rl.close();
  });

  rl.setPrompt(s.cyan('redline> '));
  rl.prompt();
  for await (const raw of rl) {
    const line = raw.trim();
    if (!line) {
      rl.prompt();
      continue;
    }
    const cmd = parseReplCommand(line);
    if (cmd === 'exit') break;
    if (cmd === 'help') write(`${REPL_HELP}\n`);
    else if (cmd === 'history') write(`${renderTurns(session.history(), s, true)}\n`);
    else if (cmd === 'session') write(`session ${session.id} (created ${session.createdAt})\nlog ${config.db_path}\n`);
    else await runTurn({ session, config, styler: s, write }, line);
    rl.prompt();
  }
  rl.close();
}
