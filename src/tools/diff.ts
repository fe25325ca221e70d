import { applyPatch, createTwoFilesPatch } from 'diff';

export type DiffResult = {
  /** Unified diff text; empty when before and after are identical. */
  unifiedDiff: string;
  /** One-line human summary, e.g. `+2 -1 line(s)`. */
  summary: string;
  added: number;
  removed: number;
};

const CONTEXT_LINES = 3;

/**
 * Line-oriented unified diff of two text snapshots.
 * Pure and deterministic: no I/O, same output for the same input.
 */
export function computeDiff(
  before: string,
  after: string,
  opts: { label?: string; context?: number } = {}
): DiffResult {
  if (before === after) {
    return { unifiedDiff: '', summary: 'no changes', added: 0, removed: 0 };
  }

  const label = opts.label ?? 'document';
  const patch = createTwoFilesPatch(`a/${label}`, `b/${label}`, before, after, undefined, undefined, {
    context: opts.context ?? CONTEXT_LINES,
  });

  // jsdiff prefixes an `Index:` / `====` banner; keep the plain unified form.
  const lines = patch.split('\n');
  const start = lines.findIndex((l) => l.startsWith('--- '));
  const unifiedDiff = (start > 0 ? lines.slice(start) : lines).join('\n');

  let added = 0;
  let removed = 0;
  let inHunk = false;
  for (const line of unifiedDiff.split('\n')) {
    if (line.startsWith('@@')) {
      inHunk = true;
      continue;
    }
    if (!inHunk) continue;
    if (line.startsWith('+')) added++;
    else if (line.startsWith('-')) removed++;
  }

  return { unifiedDiff, summary: summarize(before, after, added, removed), added, removed };
}

function summarize(before: string, after: string, added: number, removed: number): string {
  if (before === '') return `create: +${added} line(s)`;
  if (after === '') return `delete: -${removed} line(s)`;
  return `+${added} -${removed} line(s)`;
}

/** Apply a diff produced by `computeDiff` back onto its `before` text. */
export function applyDiff(before: string, unifiedDiff: string): string {
  if (unifiedDiff === '') return before;
  const out = applyPatch(before, unifiedDiff);
  if (out === false) throw new Error('diff does not apply to the given text');
  return out;
}

/** True when `unifiedDiff` turns `before` into exactly `after`. */
export function describesChange(before: string, after: string, unifiedDiff: string): boolean {
  try {
    return applyDiff(before, unifiedDiff) === after;
  } catch {
    return false;
  }
}
