import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import ExcelJS from 'exceljs';
import JSZip from 'jszip';

import { DEFAULTS } from '../src/config.js';
import type { ConfirmationProvider, ConfirmRequest, RedlineConfig } from '../src/types.js';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

export type ParaSpec = string | { text: string; style?: string } | { runs: string[] };

function run(text: string): string {
  return `<w:r><w:t xml:space="preserve">${text.replace(/&/g, '&amp;').replace(/</g, '&lt;')}</w:t></w:r>`;
}

export function paragraphXml(p: ParaSpec): string {
  if (typeof p === 'string') return `<w:p>${run(p)}</w:p>`;
  if ('runs' in p) return `<w:p>${p.runs.map(run).join('')}</w:p>`;
  const props = p.style ? `<w:pPr><w:pStyle w:val="${p.style}"/></w:pPr>` : '';
  return `<w:p>${props}${run(p.text)}</w:p>`;
}

export function documentXml(body: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<w:document xmlns:w="${W_NS}"><w:body>${body}<w:sectPr/></w:body></w:document>`
  );
}

/** A minimal .docx: content types plus word/document.xml (and comments when given). */
export async function makeDocx(paragraphs: ParaSpec[], opts: { commentsXml?: string; bodyXml?: string } = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>'
  );
  zip.file('word/document.xml', documentXml(opts.bodyXml ?? paragraphs.map(paragraphXml).join('')));
  if (opts.commentsXml) zip.file('word/comments.xml', opts.commentsXml);
  return zip.generateAsync({ type: 'nodebuffer' });
}

/** Budget sheet with a SUM formula, plus a second sheet. */
export async function makeBudgetXlsx(file: string): Promise<void> {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet('Budget');
  ws.addRow(['Item', 'Cost']);
  ws.addRow(['Paper', 12]);
  ws.addRow(['Ink', 30]);
  ws.getCell('B4').value = { formula: 'SUM(B2:B3)', date1904: false };
  wb.addWorksheet('Notes').getCell('A1').value = 'Reviewed';
  await wb.xlsx.writeFile(file);
}

export type PdfRun = { x: number; y: number; text: string };

/** A minimal text PDF: one Helvetica run per entry, placed at (x, y) on a Letter page. */
export function makePdf(pages: PdfRun[][]): Buffer {
  const objects: string[] = [];
  const pageRefs: number[] = [];
  // 1 catalog, 2 page tree, 3 font; pages and their content streams follow.
  pages.forEach((runs, i) => {
    const pageId = 4 + i * 2;
    pageRefs.push(pageId);
    const ops = runs.map((r) => `BT /F1 12 Tf ${r.x} ${r.y} Td (${r.text.replace(/([\\()])/g, '\\$1')}) Tj ET`).join('\n');
    objects[pageId] =
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${pageId + 1} 0 R >>`;
    objects[pageId + 1] = `<< /Length ${Buffer.byteLength(ops)} >>\nstream\n${ops}\nendstream`;
  });
  objects[1] = '<< /Type /Catalog /Pages 2 0 R >>';
  objects[2] = `<< /Type /Pages /Kids [${pageRefs.map((id) => `${id} 0 R`).join(' ')}] /Count ${pages.length} >>`;
  objects[3] = '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>';

  let out = '%PDF-1.4\n';
  const offsets: number[] = [];
  for (let id = 1; id < objects.length; id++) {
    offsets[id] = Buffer.byteLength(out);
    out += `${id} 0 obj\n${objects[id] ?? 'null'}\nendobj\n`;
  }
  const xref = Buffer.byteLength(out);
  out += `xref\n0 ${objects.length}\n0000000000 65535 f \n`;
  for (let id = 1; id < objects.length; id++) out += `${String(offsets[id] ?? 0).padStart(10, '0')} 00000 n \n`;
  out += `trailer\n<< /Size ${objects.length} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`;
  return Buffer.from(out, 'latin1');
}

export async function makeWorkspace(prefix = 'redline-test-'): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(workspaceRoot: string, overrides: Partial<RedlineConfig> = {}): RedlineConfig {
  return {
    ...DEFAULTS,
    endpoint: 'http://model.test/v1',
    model: 'test-model',
    db_path: path.join(workspaceRoot, '.sessions'),
    workspace_root: workspaceRoot,
    mcp_filesystem: false,
    max_iterations: 5,
    ...overrides,
  };
}

/** Answers from a fixed script; records every request it was shown. */
export class ScriptedProvider implements ConfirmationProvider {
  readonly seen: ConfirmRequest[] = [];
  readonly notified: ConfirmRequest[] = [];

  constructor(private readonly answers: boolean[]) {}

  async confirm(req: ConfirmRequest): Promise<boolean> {
    this.seen.push(req);
    return this.answers.shift() ?? false;
  }

  notify(req: ConfirmRequest): void {
    this.notified.push(req);
  }
}

export type Deferred<T> = { promise: Promise<T>; resolve: (v: T) => void };

export function deferred<T>(): Deferred<T> {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
