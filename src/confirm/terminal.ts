/**
 * TerminalConfirmProvider: interactive readline-based confirmation.
 * Prints the proposed diff in a box and waits for an explicit yes.
 */

import type { ConfirmationProvider, ConfirmRequest } from '../types.js';
import { colorizeUnifiedDiff, makeStyler, type Styler } from '../term.js';

/** The slice of `readline/promises.Interface` this provider needs. */
export interface Questioner {
  question(query: string, options: { signal?: AbortSignal }): Promise<string>;
}

export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === 'y' || a === 'yes';
}

export class TerminalConfirmProvider implements ConfirmationProvider {
  private readonly styler: Styler;
  private readonly write: (s: string) => void;

  constructor(
    private rl: Questioner,
    opts: { styler?: Styler; write?: (s: string) => void } = {}
  ) {
    this.styler = opts.styler ?? makeStyler(false);
    this.write = opts.write ?? ((s) => process.stdout.write(s));
  }

  async confirm(req: ConfirmRequest, signal?: AbortSignal): Promise<boolean> {
    this.write(this.render(req));
    let ans: string;
    try {
      ans = await this.rl.question(`Apply this change? ${this.styler.dim('[y/N]')} `, { signal });
    } catch (e: unknown) {
      // Ctrl-C while the prompt is up.
      if (signal?.aborted) return false;
      throw e;
    }
    const approved = isAffirmative(ans);
    this.write(approved ? this.styler.green('✓ approved\n') : this.styler.yellow('✗ declined\n'));
    return approved;
  }

  notify(req: ConfirmRequest): void {
    this.write(this.render(req));
    this.write(this.styler.dim('(auto-approved)\n'));
  }

  private render(req: ConfirmRequest): string {
    const where = req.anchor ? `${req.path} [${req.anchor}]` : req.path;
    const head = this.boxed(`${req.tool}: ${where}`, req.reason ? `${req.summary} · ${req.reason}` : req.summary);
    const body = req.diff ? colorizeUnifiedDiff(req.diff, this.styler) : this.styler.dim('(no textual changes)');
    return `${head}\n${body}\n`;
  }

  /** Format a boxed header: ┌─ title ─┐ with the summary underneath */
  private boxed(title: string, summary: string): string {
    const maxW = Math.min(process.stdout.columns ?? 80, 80);
    const fit = (s: string) => (s.length > maxW - 6 ? s.slice(0, maxW - 9) + '...' : s);
    const inner = [fit(title), fit(summary)];
    const width = Math.max(...inner.map((l) => l.length)) + 2;
    const border = '─'.repeat(Math.max(width, 20));
    const rows = inner.map((l) => `│ ${l.padEnd(border.length - 1)}│`);
    return [`┌${border}┐`, ...rows.slice(0, 1), this.styler.dim(rows[1] ?? ''), `└${border}┘`].join('\n');
  }
}
