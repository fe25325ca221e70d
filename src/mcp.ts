/**
 * MCP filesystem bridge.
 *
 * Spawns `@modelcontextprotocol/server-filesystem` and exposes its tools through the registry.
 * Read-only tools run directly; every other tool is a mutating tool, so its path arguments
 * pass the workspace guard and its call waits for the approval gate like any document edit.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import fs from 'node:fs/promises';

import { z } from 'zod';

import { ToolError } from './tools/tool-error.js';
import type { PlannedChange, ToolDefinition } from './tools/registry.js';
import { errorCode, errorMessage, PKG_VERSION } from './utils.js';

export interface RpcTransport {
  request(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
  notify(method: string, params: Record<string, unknown>): Promise<void>;
  close(): Promise<void>;
}

const JsonRpcResponse = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string()]).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

const ToolListResult = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
      inputSchema: z.record(z.unknown()).optional(),
      annotations: z.object({ readOnlyHint: z.boolean().optional() }).passthrough().optional(),
    })
  ),
});

const ToolCallResult = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .optional(),
  isError: z.boolean().optional(),
});

/** Newline-delimited JSON-RPC over a child process' stdio. */
export class StdioRpcTransport implements RpcTransport {
  private child: ChildProcessWithoutNullStreams;
  private nextId = 1;
  private pending = new Map<
    number,
    { resolve: (v: unknown) => void; reject: (e: Error) => void; timer: NodeJS.Timeout }
  >();
  private buffer = '';
  private closed = false;
  private stderrTail = '';

  constructor(command: string, args: string[]) {
    this.child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

    this.child.stdout.setEncoding('utf8');
    this.child.stdout.on('data', (chunk: string) => {
      this.buffer += chunk;
      this.parseBuffer();
    });

    this.child.stderr.setEncoding('utf8');
    this.child.stderr.on('data', (chunk: string) => {
      this.stderrTail = (this.stderrTail + chunk).slice(-2000);
    });

    this.child.on('error', (err) => {
      this.closed = true;
      this.failAll(new Error(`MCP stdio transport error: ${err.message}`));
    });

    this.child.on('close', (code, signal) => {
      this.closed = true;
      const reason = `MCP stdio transport closed (code=${code ?? 'null'}, signal=${signal ?? 'null'})`;
      const tail = this.stderrTail.trim();
      this.failAll(new Error(tail ? `${reason}; stderr: ${tail}` : reason));
    });
  }

  private failAll(err: Error) {
    for (const [id, p] of this.pending.entries()) {
      clearTimeout(p.timer);
      p.reject(err);
      this.pending.delete(id);
    }
  }

  private write(message: Record<string, unknown>): void {
    if (this.closed) throw new Error('MCP stdio transport is closed');
    this.child.stdin.write(`${JSON.stringify(message)}\n`);
  }

  private parseBuffer() {
    while (true) {
      const nl = this.buffer.indexOf('\n');
      if (nl < 0) return;
      const line = this.buffer.slice(0, nl).trim();
      this.buffer = this.buffer.slice(nl + 1);
      if (!line) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        console.error(`[mcp] ignoring non-JSON line from server: ${line.slice(0, 200)}`);
        continue;
      }
      const msg = JsonRpcResponse.safeParse(raw);
      if (msg.success) this.handle(msg.data);
    }
  }

  private handle(msg: z.infer<typeof JsonRpcResponse>) {
    // Notifications and server requests carry no numeric id we issued.
    if (typeof msg.id !== 'number') return;
    const pending = this.pending.get(msg.id);
    if (!pending) return;
    this.pending.delete(msg.id);
    clearTimeout(pending.timer);
    if (msg.error) {
      pending.reject(new Error(msg.error.message || `MCP error code ${msg.error.code ?? 'unknown'}`));
      return;
    }
    pending.resolve(msg.result ?? null);
  }

  request(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`MCP request timed out: ${method} after ${timeoutMs}ms`));
      }, Math.max(1, timeoutMs));
      this.pending.set(id, { resolve, reject, timer });
      try {
        this.write({ jsonrpc: '2.0', id, method, params });
      } catch (e: unknown) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(e instanceof Error ? e : new Error(String(e)));
      }
    });
  }

  async notify(method: string, params: Record<string, unknown>): Promise<void> {
    this.write({ jsonrpc: '2.0', method, params });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.child.stdin.end();
    this.child.kill('SIGTERM');
  }
}

export type McpTool = {
  /** Name on the server. */
  name: string;
  /** Name in the tool registry (prefixed). */
  registeredName: string;
  description: string;
  inputSchema: Record<string, unknown>;
  readOnly: boolean;
};

/** Server tools known to be read-only, for servers that do not annotate them. */
const KNOWN_READ_ONLY = new Set([
  'read_file',
  'read_text_file',
  'read_media_file',
  'read_multiple_files',
  'list_directory',
  'list_directory_with_sizes',
  'directory_tree',
  'search_files',
  'get_file_info',
  'list_allowed_directories',
]);

function normalizeSchema(schema: Record<string, unknown> | undefined): Record<string, unknown> {
  return schema ?? { type: 'object', properties: {}, additionalProperties: false };
}

function resultText(result: z.infer<typeof ToolCallResult>): string {
  return (result.content ?? [])
    .map((item) => item.text ?? JSON.stringify(item))
    .join('\n')
    .trim();
}

export type McpOptions = {
  /** Directory the server is allowed to touch. */
  root: string;
  callTimeoutMs?: number;
  /** Prefix added to server tool names in the registry. */
  prefix?: string;
  transport?: () => RpcTransport;
};

export class MCPManager {
  private transport: RpcTransport | null = null;
  private tools = new Map<string, McpTool>();
  private warnings: string[] = [];
  private readonly callTimeoutMs: number;
  private readonly prefix: string;

  constructor(private readonly opts: McpOptions) {
    this.callTimeoutMs = Math.max(1000, opts.callTimeoutMs ?? 30_000);
    this.prefix = opts.prefix ?? 'fs_';
  }

  get connected(): boolean {
    return this.transport !== null;
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  listTools(): McpTool[] {
    return [...this.tools.values()];
  }

  /** Connect and list tools. Failures are recorded as warnings; the bridge then stays empty. */
  async init(): Promise<void> {
    this.warnings = [];
    this.tools.clear();
    let transport: RpcTransport | null = null;
    try {
      transport = this.opts.transport
        ? this.opts.transport()
        : new StdioRpcTransport('npx', ['-y', '@modelcontextprotocol/server-filesystem', this.opts.root]);

      await transport.request(
        'initialize',
        {
          protocolVersion: '2024-11-05',
          capabilities: {},
          clientInfo: { name: 'redline', version: PKG_VERSION },
        },
        this.callTimeoutMs
      );
      await transport.notify('notifications/initialized', {});

      const list = ToolListResult.safeParse(await transport.request('tools/list', {}, this.callTimeoutMs));
      if (!list.success) throw new Error('tools/list returned an unexpected shape');

      for (const raw of list.data.tools) {
        const registeredName = `${this.prefix}${raw.name}`;
        if (this.tools.has(registeredName)) {
          this.warnings.push(`[mcp] skipped duplicate tool '${raw.name}'`);
          continue;
        }
        this.tools.set(registeredName, {
          name: raw.name,
          registeredName,
          description: `[mcp:filesystem] ${(raw.description ?? 'filesystem tool').trim()}`,
          inputSchema: normalizeSchema(raw.inputSchema),
          readOnly: raw.annotations?.readOnlyHint ?? KNOWN_READ_ONLY.has(raw.name),
        });
      }
      this.transport = transport;
    } catch (e: unknown) {
      this.warnings.push(`[mcp] filesystem server unavailable: ${errorMessage(e)}`);
      this.tools.clear();
      if (transport) {
        await transport.close().catch((err: unknown) => {
          this.warnings.push(`[mcp] close failed: ${errorMessage(err)}`);
        });
      }
    }
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    if (!this.transport) throw new ToolError('unsupported', 'MCP filesystem server is not connected');
    const raw = await this.transport.request('tools/call', { name, arguments: args }, this.callTimeoutMs);
    const parsed = ToolCallResult.safeParse(raw);
    if (!parsed.success) return JSON.stringify(raw);
    const text = resultText(parsed.data);
    if (parsed.data.isError) throw new ToolError('internal', text || `MCP tool error: ${name}`);
    return text;
  }

  /** Registry definitions for every listed tool. */
  toolDefinitions(): ToolDefinition<unknown>[] {
    return this.listTools().map((t) => (t.readOnly ? this.readTool(t) : this.mutateTool(t)));
  }

  private readTool(t: McpTool): ToolDefinition<unknown> {
    return {
      kind: 'read',
      name: t.registeredName,
      description: t.description,
      schema: z.record(z.unknown()),
      parameters: t.inputSchema,
      run: async (args) => this.callTool(t.name, toRecord(args)),
    };
  }

  private mutateTool(t: McpTool): ToolDefinition<unknown> {
    return {
      kind: 'mutate',
      name: t.registeredName,
      description: `${t.description} Requires user approval.`,
      schema: z.record(z.unknown()),
      parameters: t.inputSchema,
      paths: (args) => mcpPaths(toRecord(args)),
      prepare: async (args, target) => this.plan(t.name, toRecord(args), target),
    };
  }

  private async plan(
    name: string,
    args: Record<string, unknown>,
    target: { inputPath: string; outputPath: string }
  ): Promise<PlannedChange> {
    // The server receives the guarded absolute paths, never the model's raw strings.
    const callArgs = { ...args };
    if (typeof args.source === 'string') {
      callArgs.source = target.inputPath;
      callArgs.destination = target.outputPath;
    } else if (typeof args.path === 'string') {
      callArgs.path = target.inputPath;
    }
    const commit = async () => {
      await this.callTool(name, callArgs);
    };

    if (name === 'write_file') {
      return {
        before: await readTextOrEmpty(target.inputPath),
        after: typeof args.content === 'string' ? args.content : '',
        reason: stringArg(args.description),
        commit,
      };
    }

    if (name === 'edit_file') {
      const before = await readTextOrEmpty(target.inputPath);
      const after = applyEdits(before, args.edits);
      return { before, after, commit };
    }

    return { before: '', after: describeCall(name, callArgs), commit };
  }

  async close(): Promise<void> {
    const t = this.transport;
    this.transport = null;
    if (t) await t.close();
  }
}

function toRecord(v: unknown): Record<string, unknown> {
  if (v && typeof v === 'object' && !Array.isArray(v)) return Object.fromEntries(Object.entries(v));
  return {};
}

function stringArg(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

/** Paths a server tool will touch. Tools without one are pinned to the root. */
export function mcpPaths(args: Record<string, unknown>): { input: string; output?: string } {
  if (typeof args.source === 'string') {
    return { input: args.source, output: typeof args.destination === 'string' ? args.destination : undefined };
  }
  if (typeof args.path === 'string') return { input: args.path };
  return { input: '.' };
}

async function readTextOrEmpty(absPath: string): Promise<string> {
  try {
    return await fs.readFile(absPath, 'utf8');
  } catch (e: unknown) {
    if (errorCode(e) === 'ENOENT') return '';
    throw e;
  }
}

const EditList = z.array(z.object({ oldText: z.string(), newText: z.string() }));

/** Apply `edit_file` edits in order, each to its first occurrence. */
export function applyEdits(text: string, edits: unknown): string {
  const parsed = EditList.safeParse(edits);
  if (!parsed.success) throw new ToolError('invalid_args', 'edits must be a list of {oldText, newText}');
  let out = text;
  for (const e of parsed.data) {
    const idx = out.indexOf(e.oldText);
    if (idx < 0) throw new ToolError('not_found', `Text not found: '${e.oldText}'`);
    out = out.slice(0, idx) + e.newText + out.slice(idx + e.oldText.length);
  }
  return out;
}

function describeCall(name: string, args: Record<string, unknown>): string {
  const lines = [name];
  for (const [k, v] of Object.entries(args)) lines.push(`  ${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return `${lines.join('\n')}\n`;
}
