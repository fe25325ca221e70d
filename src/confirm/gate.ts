/**
 * Approval gate: drives a ChangeDescriptor from `pending` to `approved` or `rejected`.
 *
 * Both end states are terminal. Settling an already-settled descriptor is a no-op, so a
 * late answer from the provider can never flip a cancelled (rejected) change to approved.
 */

import type {
  ApprovalMode,
  ChangeDescriptor,
  ConfirmationProvider,
  ConfirmRequest,
  Verdict,
} from '../types.js';
import { errorMessage } from '../utils.js';

/** Move a pending descriptor to a final verdict. Returns false if it was already final. */
export function settle(desc: ChangeDescriptor, verdict: Exclude<Verdict, 'pending'>): boolean {
  if (desc.verdict !== 'pending') return false;
  desc.verdict = verdict;
  return true;
}

function toRequest(desc: ChangeDescriptor): ConfirmRequest {
  return {
    tool: desc.tool,
    summary: desc.summary,
    path: desc.target.outputPath,
    anchor: desc.target.anchor,
    reason: desc.reason,
    diff: desc.diff,
  };
}

export class ApprovalGate {
  constructor(
    readonly mode: ApprovalMode,
    private readonly provider: ConfirmationProvider
  ) {}

  /**
   * Resolve the descriptor's verdict. Never throws: provider failures and
   * cancellation both end in `rejected`.
   */
  async decide(desc: ChangeDescriptor, signal?: AbortSignal): Promise<Verdict> {
    if (desc.verdict !== 'pending') return desc.verdict;

    if (signal?.aborted) {
      settle(desc, 'rejected');
      return desc.verdict;
    }

    if (this.mode === 'off') {
      settle(desc, 'approved');
      return desc.verdict;
    }

    const req = toRequest(desc);

    if (this.mode === 'auto') {
      this.provider.notify?.(req);
      settle(desc, 'approved');
      return desc.verdict;
    }

    const answer = this.provider.confirm(req, signal).catch((e: unknown) => {
      console.error(`[warn] approval prompt failed, treating as rejected: ${errorMessage(e)}`);
      return false;
    });

    let resolveAborted: (v: boolean) => void = () => {};
    const aborted = new Promise<boolean>((resolve) => {
      resolveAborted = resolve;
    });
    const onAbort = () => resolveAborted(false);
    signal?.addEventListener('abort', onAbort, { once: true });
    // The provider may have cancelled the turn while it was being asked.
    if (signal?.aborted) onAbort();

    try {
      const approved = await Promise.race([answer, aborted]);
      settle(desc, approved === true && !signal?.aborted ? 'approved' : 'rejected');
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
    return desc.verdict;
  }
}
