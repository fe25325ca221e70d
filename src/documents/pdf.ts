/** Read-only PDF access: text, metadata and tables. PDFs are never edited by this tool set. */

import fs from 'node:fs/promises';

import { extractText, getDocumentProxy, getMeta } from 'unpdf';

import { ToolError } from '../tools/tool-error.js';
import { errorCode, errorMessage } from '../utils.js';

export type PdfText = { totalPages: number; pages: string[] };

export type PdfMetadata = { pages: number; info: Record<string, string> };

type PDFDocumentProxy = Awaited<ReturnType<typeof getDocumentProxy>>;

const INFO_KEYS = ['Title', 'Author', 'Subject', 'Keywords', 'Creator', 'Producer', 'CreationDate', 'ModDate'];

async function withPdf<T>(absPath: string, fn: (pdf: PDFDocumentProxy) => Promise<T>): Promise<T> {
  const data = new Uint8Array(await fs.readFile(absPath));
  let pdf: PDFDocumentProxy;
  try {
    pdf = await getDocumentProxy(data);
  } catch (e: unknown) {
    if (errorCode(e) === 'ENOENT') throw e;
    throw new ToolError('unsupported', `could not parse PDF: ${errorMessage(e)}`);
  }
  try {
    return await fn(pdf);
  } finally {
    await pdf.destroy();
  }
}

export async function readPdfText(absPath: string): Promise<PdfText> {
  return withPdf(absPath, async (pdf) => {
    const { totalPages, text } = await extractText(pdf, { mergePages: false });
    return { totalPages, pages: text };
  });
}

export async function readPdfMetadata(absPath: string): Promise<PdfMetadata> {
  return withPdf(absPath, async (pdf) => {
    const { info } = await getMeta(pdf);
    const out: Record<string, string> = {};
    for (const key of INFO_KEYS) {
      const v: unknown = info[key];
      if (typeof v === 'string' && v.trim()) out[key] = v.trim();
    }
    return { pages: pdf.numPages, info: out };
  });
}

// ── Tables ───────────────────────────────────────────────────────────────

/** A text run with its page coordinates (PDF units, origin bottom-left). */
export type PositionedText = { str: string; x: number; y: number; width: number };

export type PdfTable = { page: number; tableIndex: number; rows: number; columns: number; data: string[][] };

/** Runs on the same baseline (within `tolerance`), top line first, each sorted left to right. */
export function groupLines(items: PositionedText[], tolerance = 2): PositionedText[][] {
  const sorted = items.filter((it) => it.str.trim()).sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: Array<{ y: number; items: PositionedText[] }> = [];
  for (const it of sorted) {
    const last = lines.at(-1);
    if (last && Math.abs(last.y - it.y) <= tolerance) last.items.push(it);
    else lines.push({ y: it.y, items: [it] });
  }
  return lines.map((l) => l.items.sort((a, b) => a.x - b.x));
}

/** Merge runs of one line into cells; a horizontal gap wider than `gap` starts a new cell. */
export function lineCells(line: PositionedText[], gap = 10): string[] {
  const cells: Array<{ end: number; parts: string[] }> = [];
  for (const it of line) {
    const cur = cells.at(-1);
    if (cur && it.x - cur.end <= gap) {
      cur.parts.push(it.str.trim());
      cur.end = Math.max(cur.end, it.x + it.width);
    } else {
      cells.push({ end: it.x + it.width, parts: [it.str.trim()] });
    }
  }
  return cells.map((c) => c.parts.join(' '));
}

/**
 * Tables are runs of at least two consecutive lines that split into the same number
 * (two or more) of cells.
 */
export function detectTables(items: PositionedText[]): string[][][] {
  const tables: string[][][] = [];
  let run: string[][] = [];
  const flush = () => {
    if (run.length >= 2) tables.push(run);
    run = [];
  };
  for (const line of groupLines(items)) {
    const cells = lineCells(line);
    if (cells.length < 2) {
      flush();
      continue;
    }
    if (run.length && run[0]?.length !== cells.length) flush();
    run.push(cells);
  }
  flush();
  return tables;
}

async function pageItems(pdf: PDFDocumentProxy, pageNumber: number): Promise<PositionedText[]> {
  const page = await pdf.getPage(pageNumber);
  const content = await page.getTextContent();
  const out: PositionedText[] = [];
  for (const item of content.items) {
    if (!('str' in item)) continue;
    out.push({ str: item.str, x: Number(item.transform[4]), y: Number(item.transform[5]), width: item.width });
  }
  return out;
}

/** Tables on one page (1-based), or on every page when `pageNumber` is omitted. */
export async function readPdfTables(absPath: string, pageNumber?: number): Promise<{ totalPages: number; tables: PdfTable[] }> {
  return withPdf(absPath, async (pdf) => {
    const pages = pageNumber ? [pageNumber] : Array.from({ length: pdf.numPages }, (_, i) => i + 1);
    const tables: PdfTable[] = [];
    for (const page of pages) {
      if (page < 1 || page > pdf.numPages) continue;
      detectTables(await pageItems(pdf, page)).forEach((data, i) => {
        tables.push({ page, tableIndex: i + 1, rows: data.length, columns: data[0]?.length ?? 0, data });
      });
    }
    return { totalPages: pdf.numPages, tables };
  });
}

/** Pages `startPage..startPage+maxPages-1` (1-based), clamped to the document. */
export function pageWindow(
  doc: PdfText,
  startPage: number,
  maxPages: number
): { from: number; to: number; text: string } {
  const from = Math.min(Math.max(1, startPage), Math.max(1, doc.totalPages));
  const to = Math.min(doc.totalPages, from + Math.max(1, maxPages) - 1);
  const parts: string[] = [];
  for (let p = from; p <= to; p++) {
    parts.push(`--- Page ${p} ---\n${(doc.pages[p - 1] ?? '').trim()}`);
  }
  return { from, to, text: parts.join('\n\n') };
}

export type PageHit = { page: number; snippet: string };

/** Case-insensitive substring search; one hit per occurrence with surrounding context. */
export function searchPages(
  pages: string[],
  query: string,
  opts: { caseSensitive?: boolean; context?: number; limit?: number } = {}
): PageHit[] {
  const ctx = opts.context ?? 80;
  const limit = opts.limit ?? 50;
  const needle = opts.caseSensitive ? query : query.toLowerCase();
  const hits: PageHit[] = [];
  if (!needle) return hits;
  pages.forEach((raw, i) => {
    const text = raw.replace(/\s+/g, ' ');
    const hay = opts.caseSensitive ? text : text.toLowerCase();
    let at = hay.indexOf(needle);
    while (at !== -1 && hits.length < limit) {
      const start = Math.max(0, at - ctx);
      const end = Math.min(text.length, at + needle.length + ctx);
      const snippet = `${start > 0 ? '…' : ''}${text.slice(start, end).trim()}${end < text.length ? '…' : ''}`;
      hits.push({ page: i + 1, snippet });
      at = hay.indexOf(needle, at + needle.length);
    }
  });
  return hits;
}
