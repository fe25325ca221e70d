/**
 * AutoApproveProvider: approves every change.
 * Used by tests and by callers that gate changes elsewhere.
 */

import type { ConfirmationProvider, ConfirmRequest } from '../types.js';

export class AutoApproveProvider implements ConfirmationProvider {
  readonly seen: ConfirmRequest[] = [];

  async confirm(req: ConfirmRequest): Promise<boolean> {
    this.seen.push(req);
    return true;
  }
}
