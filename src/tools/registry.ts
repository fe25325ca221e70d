/**
 * Tool registry: name → definition, argument validation, and dispatch.
 *
 * Read tools run directly. Mutating tools are handed to the MutationPipeline so they
 * always pass the workspace guard and the approval gate before anything is written.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { ToolCallRequest, ToolResult, ToolSchema } from '../types.js';
import type { MutationPipeline } from './mutation.js';
import { truncateToolOutput } from './output.js';
import { ToolError, ValidationError } from './tool-error.js';

export type ToolContext = {
  workspaceRoot: string;
  maxOutputChars: number;
  signal?: AbortSignal;
};

/** What a mutating tool computes before anything touches disk. */
export type PlannedChange = {
  anchor?: string;
  /** Canonical text of the affected content as it is now. */
  before: string;
  /** Canonical text of the same content after the change. */
  after: string;
  /** Extra line appended to the success message, e.g. `Replaced 2 occurrence(s)`. */
  note?: string;
  /** The model's stated reason, shown with the approval prompt. */
  reason?: string;
  /** Write the change. Called at most once, and only after approval. */
  commit(): Promise<void>;
};

type ToolBase = {
  name: string;
  description: string;
  /** Validates raw arguments; its output type is the tool's `A`. */
  schema: z.ZodTypeAny;
  /** Raw JSON schema for tools whose schema was not written in zod (MCP). */
  parameters?: Record<string, unknown>;
};

export type ReadTool<A> = ToolBase & {
  kind: 'read';
  run(args: A, ctx: ToolContext): Promise<string>;
};

export type MutateTool<A> = ToolBase & {
  kind: 'mutate';
  /** The path read from, and the path written to when it differs. */
  paths(args: A): { input: string; output?: string };
  prepare(
    args: A,
    target: { inputPath: string; outputPath: string },
    ctx: ToolContext
  ): Promise<PlannedChange>;
};

export type ToolDefinition<A> = ReadTool<A> | MutateTool<A>;

export function defineReadTool<S extends z.ZodTypeAny>(
  spec: Omit<ReadTool<z.output<S>>, 'kind' | 'schema'> & { schema: S }
): ReadTool<z.output<S>> {
  return { kind: 'read', ...spec };
}

export function defineMutateTool<S extends z.ZodTypeAny>(
  spec: Omit<MutateTool<z.output<S>>, 'kind' | 'schema'> & { schema: S }
): MutateTool<z.output<S>> {
  return { kind: 'mutate', ...spec };
}

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  const json: object = zodToJsonSchema(schema, { $refStrategy: 'none' });
  return Object.fromEntries(Object.entries(json).filter(([k]) => k !== '$schema'));
}

function parseArguments(tool: string, raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    throw new ValidationError(tool, [
      { field: '(arguments)', message: `not valid JSON (${e instanceof Error ? e.message : String(e)})` },
    ]);
  }
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition<unknown>>();
  private frozen = false;

  constructor(private readonly pipeline: MutationPipeline) {}

  register(def: ToolDefinition<unknown>): void {
    if (this.frozen) throw new Error(`tool registry is frozen; cannot register ${def.name}`);
    if (this.tools.has(def.name)) throw new Error(`duplicate tool name: ${def.name}`);
    this.tools.set(def.name, def);
  }

  /** Called once startup registration is finished. */
  freeze(): void {
    this.frozen = true;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition<unknown> | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  isMutating(name: string): boolean {
    return this.tools.get(name)?.kind === 'mutate';
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map((t) => ({
      type: 'function',
      function: {
        name: t.name,
        description: t.description,
        parameters: t.parameters ?? toParameters(t.schema),
      },
    }));
  }

  /**
   * Validate and run one tool call. Never throws: every failure comes back as a
   * ToolResult with `ok: false` and an `ERROR: code=...` body.
   */
  async dispatch(call: ToolCallRequest, ctx: ToolContext): Promise<ToolResult> {
    const fail = (e: unknown): ToolResult => ({
      callId: call.id,
      ok: false,
      content: ToolError.fromError(e).toToolResult(),
    });

    const def = this.tools.get(call.name);
    if (!def) {
      return fail(
        new ToolError('unknown_tool', `unknown tool: ${call.name}`, false, `available: ${this.names().join(', ')}`)
      );
    }

    let args: unknown;
    try {
      const raw = parseArguments(def.name, call.arguments);
      const parsed: z.SafeParseReturnType<unknown, unknown> = def.schema.safeParse(raw);
      if (!parsed.success) throw ValidationError.fromIssues(def.name, parsed.error.issues);
      args = parsed.data;
    } catch (e: unknown) {
      return fail(e);
    }

    try {
      if (def.kind === 'read') {
        const content = await def.run(args, ctx);
        return { callId: call.id, ok: true, content: truncateToolOutput(content, ctx.maxOutputChars) };
      }
      const res = await this.pipeline.run(def, args, call.id, ctx);
      return { ...res, content: truncateToolOutput(res.content, ctx.maxOutputChars) };
    } catch (e: unknown) {
      return fail(e);
    }
  }
}
