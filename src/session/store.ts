/**
 * Durable session log: one append-only JSONL file per session under the store directory.
 *
 * The first line of `<dir>/<id>.jsonl` is the session header; each later line is one turn
 * with its sequence number. Every `append` writes one line and fsyncs it, so a crash loses at
 * most the turn that was being written. A torn final line from such a crash is dropped on the
 * next open. Every failure surfaces as SessionStoreError, which callers treat as fatal.
 */

import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { Session, Turn } from '../types.js';
import { errorCode, errorMessage, nowIso } from '../utils.js';

export class SessionStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionStoreError';
  }
}

const ToolCallSchema = z.object({ id: z.string(), name: z.string(), arguments: z.string() });
const ToolResultSchema = z.object({ callId: z.string(), ok: z.boolean(), content: z.string() });

const TurnSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('user'), at: z.string(), text: z.string() }),
  z.object({ kind: z.literal('model_text'), at: z.string(), text: z.string() }),
  z.object({ kind: z.literal('tool_call'), at: z.string(), call: ToolCallSchema }),
  z.object({ kind: z.literal('tool_result'), at: z.string(), result: ToolResultSchema }),
  z.object({ kind: z.literal('cancelled'), at: z.string(), reason: z.string() }),
]);

const HeaderLine = z.object({ session: z.string(), created_at: z.string() });
const TurnLine = z.object({ seq: z.number().int(), turn: TurnSchema });

type SessionLog = { createdAt: string; turns: Turn[]; /** Bytes of complete lines. */ size: number };

export class SessionStore {
  private ready = false;
  /** Next sequence number per session seen by this store. */
  private readonly seqs = new Map<string, number>();

  constructor(readonly dbPath: string) {}

  private dir(): string {
    if (this.ready) return this.dbPath;
    try {
      fs.mkdirSync(this.dbPath, { recursive: true });
    } catch (e: unknown) {
      throw new SessionStoreError(`cannot open session store at ${this.dbPath}: ${errorMessage(e)}`, { cause: e });
    }
    this.ready = true;
    return this.dbPath;
  }

  private file(id: string): string {
    return path.join(this.dir(), `${encodeURIComponent(id)}.jsonl`);
  }

  private guard<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (e: unknown) {
      if (e instanceof SessionStoreError) throw e;
      throw new SessionStoreError(`${what} failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  /** Append `line` and flush it to disk before returning. */
  private writeLine(file: string, line: string): void {
    const fd = fs.openSync(file, 'a');
    try {
      fs.writeSync(fd, `${line}\n`);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Parse a session file. Returns null when the session does not exist. */
  private read(id: string): SessionLog | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.file(id), 'utf8');
    } catch (e: unknown) {
      if (errorCode(e) === 'ENOENT') return null;
      throw e;
    }

    const end = raw.lastIndexOf('\n') + 1;
    const lines = raw.slice(0, end).split('\n').slice(0, -1);
    const header = HeaderLine.safeParse(parseJson(lines[0] ?? ''));
    if (!header.success || header.data.session !== id) {
      throw new SessionStoreError(`corrupt session log ${id}: missing header`);
    }

    const turns: Turn[] = [];
    lines.slice(1).forEach((line, seq) => {
      const parsed = TurnLine.safeParse(parseJson(line));
      if (!parsed.success) {
        throw new SessionStoreError(`corrupt turn ${seq} in session ${id}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      if (parsed.data.seq !== seq) {
        throw new SessionStoreError(`corrupt turn ${seq} in session ${id}: sequence ${parsed.data.seq} out of order`);
      }
      turns.push(parsed.data.turn);
    });
    return { createdAt: header.data.created_at, turns, size: Buffer.byteLength(raw.slice(0, end)) };
  }

  /** Load a session, cutting off a torn final line so the next append starts clean. */
  private load(id: string): SessionLog | null {
    const log = this.read(id);
    if (!log) return null;
    const file = this.file(id);
    if (fs.statSync(file).size > log.size) {
      console.error(`[warn] session ${id}: dropped an incomplete final record`);
      fs.truncateSync(file, log.size);
    }
    this.seqs.set(id, log.turns.length);
    return log;
  }

  /** Open a session, creating it when absent. Returns its full turn history. */
  open(id: string): Session {
    if (!id.trim()) throw new SessionStoreError('session id must not be empty');
    return this.guard('open session', () => {
      let log = this.load(id);
      if (!log) {
        const createdAt = nowIso();
        this.writeLine(this.file(id), JSON.stringify({ session: id, created_at: createdAt }));
        this.seqs.set(id, 0);
        log = { createdAt, turns: [], size: 0 };
      }
      return { id, createdAt: log.createdAt, dbPath: this.dbPath, turns: log.turns };
    });
  }

  exists(id: string): boolean {
    return this.guard('look up session', () => fs.existsSync(this.file(id)));
  }

  /** Append one turn. Synchronous and durable once it returns. */
  append(id: string, turn: Turn): void {
    this.guard('append turn', () => {
      let seq = this.seqs.get(id);
      if (seq === undefined) {
        const log = this.load(id);
        if (!log) throw new SessionStoreError(`unknown session: ${id}`);
        seq = log.turns.length;
      }
      this.writeLine(this.file(id), JSON.stringify({ seq, turn }));
      this.seqs.set(id, seq + 1);
    });
  }

  history(id: string): Turn[] {
    return this.guard('read history', () => this.read(id)?.turns ?? []);
  }

  /** Forget cached sequence numbers. Safe to call multiple times. */
  close(): void {
    this.seqs.clear();
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
