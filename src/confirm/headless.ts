/**
 * HeadlessConfirmProvider: for piped/non-interactive use.
 * There is nobody to ask, so every change is declined.
 */

import type { ConfirmationProvider, ConfirmRequest } from '../types.js';

export class HeadlessConfirmProvider implements ConfirmationProvider {
  async confirm(req: ConfirmRequest): Promise<boolean> {
    console.error(
      `[headless] rejected ${req.tool}: ${req.summary} (no TTY; use --auto-approve to apply edits)`
    );
    return false;
  }

  notify(req: ConfirmRequest): void {
    console.error(`[headless] auto-approved ${req.tool}: ${req.summary}`);
  }
}
