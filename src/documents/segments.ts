/**
 * Directed search over any supported document.
 *
 * A document is cut into segments addressed by selectors: PDF pages, DOCX paragraphs and
 * XLSX rows, each split further when longer than SEGMENT_MAX_CHARS. Search ranks segments
 * for a query; retrieval returns the full text of chosen selectors and their neighbours.
 */

import path from 'node:path';

import { ToolError } from '../tools/tool-error.js';
import { countOccurrences, DocxDocument } from './docx.js';
import { readPdfText } from './pdf.js';
import { XlsxWorkbook } from './xlsx.js';

const SEGMENT_MAX_CHARS = 1200;
const SEGMENT_OVERLAP = 200;
/** Retrieval stops adding segments once less than this much budget is left. */
const MIN_REMAINING_CHARS = 200;

export type FileKind = 'pdf' | 'docx' | 'xlsx';

export type Selector =
  | { page: number; segment: number }
  | { paragraph: number; segment: number }
  | { sheet: string; row: number; segment: number };

export type Segment = { selector: Selector; location: string; text: string };

export type SearchMode = 'hybrid' | 'exact' | 'terms';

export type SegmentStats = { phrase_hits: number; term_hits: number; unique_terms_matched: number };

export type SearchHit = { score: number; selector: Selector; location: string; snippet: string; stats: SegmentStats };

const WORD_RE = /[\p{L}\p{N}_]+/gu;

export function fileKind(absPath: string): FileKind {
  const ext = path.extname(absPath).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.docx') return 'docx';
  if (ext === '.xlsx' || ext === '.xlsm') return 'xlsx';
  throw new ToolError(
    'unsupported',
    `${path.basename(absPath)}: expected .pdf, .docx or .xlsx file, got "${ext || '(no extension)'}"`
  );
}

function selectorKey(sel: Selector): string {
  if ('page' in sel) return `page ${sel.page}#${sel.segment}`;
  if ('paragraph' in sel) return `paragraph ${sel.paragraph}#${sel.segment}`;
  return `${sel.sheet}!${sel.row}#${sel.segment}`;
}

/** Collapse whitespace and cut into overlapping windows, preferring to break between words. */
export function splitSegments(text: string, max = SEGMENT_MAX_CHARS, overlap = SEGMENT_OVERLAP): string[] {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (!flat) return [];
  if (flat.length <= max) return [flat];
  const out: string[] = [];
  let start = 0;
  for (;;) {
    let end = Math.min(flat.length, start + max);
    if (end < flat.length) {
      const space = flat.lastIndexOf(' ', end);
      if (space > start + max / 2) end = space;
    }
    out.push(flat.slice(start, end).trim());
    if (end >= flat.length) return out;
    start = Math.max(end - overlap, start + 1);
  }
}

function unitSegments(
  text: string,
  selector: (segment: number) => Selector,
  location: string
): Segment[] {
  const parts = splitSegments(text);
  return parts.map((t, i) => ({
    selector: selector(i + 1),
    location: parts.length > 1 ? `${location}, segment ${i + 1}` : location,
    text: t,
  }));
}

/** Every segment of a document, in reading order. `sheetName` limits a workbook to one sheet. */
export async function loadSegments(absPath: string, sheetName?: string): Promise<{ kind: FileKind; segments: Segment[] }> {
  const kind = fileKind(absPath);
  const segments: Segment[] = [];
  if (kind === 'pdf') {
    const doc = await readPdfText(absPath);
    doc.pages.forEach((text, i) => {
      segments.push(...unitSegments(text, (segment) => ({ page: i + 1, segment }), `page ${i + 1}`));
    });
  } else if (kind === 'docx') {
    const doc = await DocxDocument.load(absPath);
    for (const p of doc.paragraphs()) {
      segments.push(...unitSegments(p.text, (segment) => ({ paragraph: p.index, segment }), `paragraph ${p.index}`));
    }
  } else {
    const wb = await XlsxWorkbook.load(absPath);
    for (const r of wb.rowTexts(sheetName)) {
      segments.push(...unitSegments(r.text, (segment) => ({ sheet: r.sheet, row: r.row, segment }), `${r.sheet} row ${r.row}`));
    }
  }
  return { kind, segments };
}

export function queryTerms(query: string): string[] {
  return [...new Set(query.toLowerCase().match(WORD_RE) ?? [])];
}

export function segmentStats(text: string, phrase: string, terms: string[]): SegmentStats {
  const lower = text.toLowerCase();
  const counts = new Map<string, number>();
  for (const w of lower.match(WORD_RE) ?? []) counts.set(w, (counts.get(w) ?? 0) + 1);
  let termHits = 0;
  let unique = 0;
  for (const t of terms) {
    const c = counts.get(t) ?? 0;
    termHits += c;
    if (c > 0) unique++;
  }
  return { phrase_hits: countOccurrences(lower, phrase), term_hits: termHits, unique_terms_matched: unique };
}

/**
 * exact: phrase occurrences only. terms: distinct and total term matches.
 * hybrid: both, plus a term density bonus capped at 5.
 */
export function scoreSegment(stats: SegmentStats, length: number, mode: SearchMode): number {
  switch (mode) {
    case 'exact':
      return stats.phrase_hits * 25;
    case 'terms':
      return stats.unique_terms_matched * 6 + stats.term_hits * 1.5;
    case 'hybrid': {
      if (!stats.phrase_hits && !stats.unique_terms_matched) return 0;
      const density = length ? (stats.term_hits / length) * 1000 : 0;
      return stats.phrase_hits * 20 + stats.unique_terms_matched * 5 + stats.term_hits + Math.min(density, 5);
    }
  }
}

/** Context around the first phrase match, else the first term match, else the start. */
export function snippet(text: string, phrase: string, terms: string[], context = 120): string {
  const lower = text.toLowerCase();
  let at = phrase ? lower.indexOf(phrase) : -1;
  let len = phrase.length;
  if (at === -1) {
    len = 0;
    for (const t of terms) {
      const i = lower.indexOf(t);
      if (i !== -1 && (at === -1 || i < at)) {
        at = i;
        len = t.length;
      }
    }
  }
  if (at === -1) at = 0;
  const start = Math.max(0, at - context);
  const end = Math.min(text.length, at + len + context);
  return `${start > 0 ? '…' : ''}${text.slice(start, end)}${end < text.length ? '…' : ''}`;
}

export function directedSearch(
  segments: Segment[],
  query: string,
  opts: { mode: SearchMode; topK: number; context?: number }
): { matched: number; hits: SearchHit[] } {
  const phrase = query.toLowerCase().replace(/\s+/g, ' ').trim();
  const terms = queryTerms(query);
  const scored: SearchHit[] = [];
  for (const seg of segments) {
    const stats = segmentStats(seg.text, phrase, terms);
    const score = scoreSegment(stats, seg.text.length, opts.mode);
    if (score <= 0) continue;
    scored.push({
      score: Math.round(score * 10_000) / 10_000,
      selector: seg.selector,
      location: seg.location,
      snippet: snippet(seg.text, phrase, terms, opts.context),
      stats,
    });
  }
  // Stable sort keeps reading order among equal scores.
  scored.sort((a, b) => b.score - a.score);
  return { matched: scored.length, hits: scored.slice(0, opts.topK) };
}

export type Retrieved = { selector: Selector; location: string; text: string };

/**
 * Full text for each selector plus `neighborhood` segments either side in reading order.
 * Duplicates are returned once. Output stops at `maxChars`; the last segment may be cut.
 */
export function retrieveSegments(
  segments: Segment[],
  selectors: Selector[],
  opts: { neighborhood: number; maxChars: number }
): { results: Retrieved[]; truncated: boolean; missing: Selector[] } {
  const position = new Map(segments.map((s, i) => [selectorKey(s.selector), i]));
  const seen = new Set<number>();
  const order: number[] = [];
  const missing: Selector[] = [];
  for (const sel of selectors) {
    const at = position.get(selectorKey(sel));
    if (at === undefined) {
      missing.push(sel);
      continue;
    }
    const from = Math.max(0, at - opts.neighborhood);
    const to = Math.min(segments.length - 1, at + opts.neighborhood);
    for (let i = from; i <= to; i++) {
      if (seen.has(i)) continue;
      seen.add(i);
      order.push(i);
    }
  }

  const results: Retrieved[] = [];
  let remaining = opts.maxChars;
  let truncated = false;
  for (const i of order) {
    const seg = segments[i];
    if (!seg) continue;
    if (remaining < MIN_REMAINING_CHARS) {
      truncated = true;
      break;
    }
    let text = seg.text;
    if (text.length > remaining) {
      text = `${text.slice(0, remaining - 1)}…`;
      truncated = true;
    }
    remaining -= text.length;
    results.push({ selector: seg.selector, location: seg.location, text });
  }
  return { results, truncated, missing };
}
