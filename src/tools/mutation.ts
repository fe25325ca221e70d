/**
 * Mutation pipeline: guard → plan → diff → approve → commit.
 *
 * Nothing is written unless the gate approves, and an approved change is committed once.
 * Rejection is an ordinary result the model can read, not an error.
 */

import type { ApprovalGate } from '../confirm/gate.js';
import type { ChangeDescriptor, ToolResult } from '../types.js';
import { randomId } from '../utils.js';
import { computeDiff, describesChange } from './diff.js';
import { enforceWithinWorkspace, redactPath } from './path-safety.js';
import type { MutateTool, PlannedChange, ToolContext } from './registry.js';
import { ToolError } from './tool-error.js';

export type MutationEvent = {
  descriptor: ChangeDescriptor;
  /** Set once the write finished (approved changes only). */
  applied: boolean;
};

export class MutationPipeline {
  private busy = false;
  private applied = new WeakSet<ChangeDescriptor>();

  constructor(
    private readonly gate: ApprovalGate,
    private readonly opts: { onSettled?: (ev: MutationEvent) => void } = {}
  ) {}

  async run<A>(tool: MutateTool<A>, args: A, callId: string, ctx: ToolContext): Promise<ToolResult> {
    const fail = (e: unknown): ToolResult => ({
      callId,
      ok: false,
      content: ToolError.fromError(e).toToolResult(),
    });

    if (this.busy) {
      return fail(new ToolError('transient', 'another change is already awaiting approval', true));
    }
    this.busy = true;
    try {
      // 1. Confinement first, before any document is opened.
      let inputPath: string;
      let outputPath: string;
      try {
        const { input, output } = tool.paths(args);
        inputPath = await enforceWithinWorkspace(tool.name, ctx.workspaceRoot, input);
        outputPath = output ? await enforceWithinWorkspace(tool.name, ctx.workspaceRoot, output) : inputPath;
      } catch (e: unknown) {
        return fail(e);
      }

      // 2. Read-only load and in-memory edit.
      let plan: PlannedChange;
      try {
        plan = await tool.prepare(args, { inputPath, outputPath }, ctx);
      } catch (e: unknown) {
        return fail(e);
      }

      const shown = redactPath(outputPath, ctx.workspaceRoot);
      const diff = computeDiff(plan.before, plan.after, {
        label: plan.anchor ? `${shown}#${plan.anchor}` : shown,
      });

      if (!diff.unifiedDiff) {
        return {
          callId,
          ok: true,
          content: `No changes: ${tool.name} would leave ${shown} as it is.${plan.note ? `\n${plan.note}` : ''}`,
        };
      }

      // 3. Diff and approval. The user approves the diff, so it must reproduce `after`.
      if (!describesChange(plan.before, plan.after, diff.unifiedDiff)) {
        return fail(new ToolError('internal', `${tool.name}: the proposed diff does not reproduce the planned change`));
      }
      const descriptor: ChangeDescriptor = {
        id: randomId(),
        tool: tool.name,
        target: { path: inputPath, outputPath, anchor: plan.anchor },
        before: plan.before,
        after: plan.after,
        diff: diff.unifiedDiff,
        summary: diff.summary,
        reason: plan.reason,
        verdict: 'pending',
      };
      const verdict = await this.gate.decide(descriptor, ctx.signal);

      if (verdict !== 'approved') {
        this.opts.onSettled?.({ descriptor, applied: false });
        return {
          callId,
          ok: false,
          content: [
            `Declined: the user rejected the change to ${shown}. Nothing was written.`,
            'Proposed diff:',
            diff.unifiedDiff,
          ].join('\n'),
        };
      }

      // 4. Commit, at most once per descriptor.
      if (this.applied.has(descriptor)) {
        return fail(new ToolError('internal', `change ${descriptor.id} was already applied`));
      }
      this.applied.add(descriptor);
      try {
        await plan.commit();
      } catch (e: unknown) {
        this.opts.onSettled?.({ descriptor, applied: false });
        return fail(e);
      }
      this.opts.onSettled?.({ descriptor, applied: true });

      const lines = [`Applied ${tool.name} to ${shown} (${diff.summary}).`];
      if (plan.note) lines.push(plan.note);
      if (outputPath !== inputPath) lines.push(`Saved as ${shown}; ${redactPath(inputPath, ctx.workspaceRoot)} is unchanged.`);
      return { callId, ok: true, content: lines.join('\n') };
    } finally {
      this.busy = false;
    }
  }
}
