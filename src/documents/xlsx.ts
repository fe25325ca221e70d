import fs from 'node:fs/promises';

import ExcelJS from 'exceljs';

import { ToolError } from '../tools/tool-error.js';
import { errorMessage } from '../utils.js';

export type CellInput = string | number | boolean | null;

export type SheetRow = { row: number; values: string[] };

const CELL_RE = /^([A-Z]{1,3})([1-9]\d*)$/;

export function columnIndex(letters: string): number {
  let n = 0;
  for (const ch of letters.toUpperCase()) n = n * 26 + (ch.charCodeAt(0) - 64);
  return n;
}

export function columnLetters(index: number): string {
  let n = index;
  let out = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

export function parseCellRef(ref: string): { col: number; row: number; address: string } {
  const m = CELL_RE.exec(ref.trim().toUpperCase());
  if (!m) throw new ToolError('invalid_args', `invalid cell reference: "${ref}"`, false, 'use A1 notation, e.g. B2');
  const col = columnIndex(m[1]);
  const row = Number(m[2]);
  return { col, row, address: `${columnLetters(col)}${row}` };
}

/** Render a stored cell value the way the canonical snapshot and read tools show it. */
export function formatCellValue(v: ExcelJS.CellValue): string {
  if (v === null || v === undefined) return '';
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (v instanceof Date) return v.toISOString();
  if ('sharedFormula' in v) {
    // Cells that share a formula expose their own translated copy when exceljs has one.
    return `=${'formula' in v && typeof v.formula === 'string' ? v.formula : v.sharedFormula}`;
  }
  if ('formula' in v) return `=${v.formula}`;
  if ('richText' in v) return v.richText.map((r) => r.text).join('');
  if ('hyperlink' in v) return v.text;
  if ('error' in v) return String(v.error);
  return '';
}

export type FormulaResult = { sheet: string; cell: string; formula: string; result?: string; error?: string };

export type TableValue = string | number | boolean | Date | null;

/** Plain value of a cell for analysis. */
export function tableValue(v: ExcelJS.CellValue): TableValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || v instanceof Date) return v;
  if ('formula' in v || 'sharedFormula' in v) {
    const r = 'result' in v ? v.result : undefined;
    if (r === undefined || (typeof r === 'object' && !(r instanceof Date))) return null;
    return r;
  }
  return formatCellValue(v) || null;
}

/**
 * Store a value the way the model sent it. Only a string starting with `=` changes
 * meaning (it becomes a formula); numerals sent as strings stay text, so `"02134"` keeps
 * its leading zero.
 */
export function coerceInput(v: CellInput): ExcelJS.CellValue {
  if (typeof v !== 'string') return v;
  const s = v.trim();
  if (s.startsWith('=') && s.length > 1) return { formula: s.slice(1), date1904: false };
  return v;
}

export class XlsxWorkbook {
  private constructor(private readonly wb: ExcelJS.Workbook) {}

  static async load(absPath: string): Promise<XlsxWorkbook> {
    return XlsxWorkbook.fromBuffer(await fs.readFile(absPath));
  }

  static async fromBuffer(data: Buffer): Promise<XlsxWorkbook> {
    const wb = new ExcelJS.Workbook();
    try {
      await wb.xlsx.load(data);
    } catch (e: unknown) {
      throw new ToolError('unsupported', `could not read workbook: ${errorMessage(e)}`);
    }
    return new XlsxWorkbook(wb);
  }

  sheetNames(): string[] {
    return this.wb.worksheets.map((ws) => ws.name);
  }

  /** Named sheet, or the active/first sheet when `name` is empty. */
  sheet(name?: string): ExcelJS.Worksheet {
    if (name) {
      const ws = this.wb.getWorksheet(name);
      if (!ws) {
        throw new ToolError('not_found', `sheet not found: "${name}"`, false, `available: ${this.sheetNames().join(', ')}`);
      }
      return ws;
    }
    const active = this.wb.views?.[0]?.activeTab;
    const ws = (typeof active === 'number' ? this.wb.worksheets[active] : undefined) ?? this.wb.worksheets[0];
    if (!ws) throw new ToolError('not_found', 'workbook has no worksheets');
    return ws;
  }

  readRows(sheetName: string | undefined, startRow: number, maxRows: number): { sheet: string; rows: SheetRow[]; lastRow: number } {
    const ws = this.sheet(sheetName);
    const rows: SheetRow[] = [];
    const endRow = startRow + maxRows - 1;
    ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber < startRow || rowNumber > endRow) return;
      const values: string[] = [];
      for (let c = 1; c <= row.cellCount; c++) values.push(formatCellValue(row.getCell(c).value));
      rows.push({ row: rowNumber, values });
    });
    return { sheet: ws.name, rows, lastRow: ws.actualRowCount === 0 ? 0 : ws.lastRow?.number ?? 0 };
  }

  formulas(sheetName?: string): Array<{ sheet: string; cell: string; formula: string }> {
    const sheets = sheetName ? [this.sheet(sheetName)] : this.wb.worksheets;
    const out: Array<{ sheet: string; cell: string; formula: string }> = [];
    for (const ws of sheets) {
      ws.eachRow({ includeEmpty: false }, (row) => {
        row.eachCell({ includeEmpty: false }, (cell) => {
          const v = cell.value;
          if (v && typeof v === 'object' && !(v instanceof Date) && ('formula' in v || 'sharedFormula' in v)) {
            out.push({ sheet: ws.name, cell: cell.address, formula: formatCellValue(v) });
          }
        });
      });
    }
    return out;
  }

  /** Formula cells with their cached results; `result` is undefined when never calculated. */
  formulaResults(): FormulaResult[] {
    const out: FormulaResult[] = [];
    for (const ws of this.wb.worksheets) {
      ws.eachRow({ includeEmpty: false }, (row) => {
        row.eachCell({ includeEmpty: false }, (cell) => {
          const v = cell.value;
          if (!v || typeof v !== 'object' || v instanceof Date || !('formula' in v || 'sharedFormula' in v)) return;
          const result = 'result' in v ? v.result : undefined;
          out.push({
            sheet: ws.name,
            cell: cell.address,
            formula: formatCellValue(v),
            result: result === undefined ? undefined : formatCellValue(result),
            error: typeof result === 'object' && result !== null && 'error' in result ? String(result.error) : undefined,
          });
        });
      });
    }
    return out;
  }

  /**
   * A sheet as a table: the first row holds the column names, every later row is a record.
   * Formula cells contribute their cached result.
   */
  table(sheetName?: string): { sheet: string; columns: string[]; rows: TableValue[][] } {
    const ws = this.sheet(sheetName);
    let width = 0;
    ws.eachRow({ includeEmpty: false }, (row) => {
      width = Math.max(width, row.cellCount);
    });
    const header = ws.getRow(1);
    const columns = Array.from({ length: width }, (_, i) => formatCellValue(header.getCell(i + 1).value) || `column_${i + 1}`);
    const rows: TableValue[][] = [];
    ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber === 1) return;
      rows.push(Array.from({ length: width }, (_, i) => tableValue(row.getCell(i + 1).value)));
    });
    return { sheet: ws.name, columns, rows };
  }

  /** One `A1: value | B1: value` line per non-empty row; long values are cut at `maxValue` chars. */
  rowTexts(sheetName?: string, maxValue = 180): Array<{ sheet: string; row: number; text: string }> {
    const sheets = sheetName ? [this.sheet(sheetName)] : this.wb.worksheets;
    const out: Array<{ sheet: string; row: number; text: string }> = [];
    for (const ws of sheets) {
      ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        const parts: string[] = [];
        row.eachCell({ includeEmpty: false }, (cell) => {
          const v = formatCellValue(cell.value);
          if (v) parts.push(`${cell.address}: ${v.length > maxValue ? `${v.slice(0, maxValue - 1)}…` : v}`);
        });
        if (parts.length) out.push({ sheet: ws.name, row: rowNumber, text: parts.join(' | ') });
      });
    }
    return out;
  }

  search(
    query: string,
    opts: { sheet?: string; caseSensitive?: boolean; limit?: number } = {}
  ): Array<{ sheet: string; cell: string; row: number; value: string }> {
    const sheets = opts.sheet ? [this.sheet(opts.sheet)] : this.wb.worksheets;
    const needle = opts.caseSensitive ? query : query.toLowerCase();
    const limit = opts.limit ?? 100;
    const out: Array<{ sheet: string; cell: string; row: number; value: string }> = [];
    for (const ws of sheets) {
      ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        row.eachCell({ includeEmpty: false }, (cell) => {
          if (out.length >= limit) return;
          const value = formatCellValue(cell.value);
          const hay = opts.caseSensitive ? value : value.toLowerCase();
          if (hay.includes(needle)) out.push({ sheet: ws.name, cell: cell.address, row: rowNumber, value });
        });
      });
    }
    return out;
  }

  /** Canonical snapshot of the given cells: one `Sheet!A1 = value` line each. */
  snapshot(sheetName: string, addresses: string[]): string {
    const ws = this.sheet(sheetName);
    return addresses.map((a) => `${ws.name}!${a} = ${formatCellValue(ws.getCell(a).value)}\n`).join('');
  }

  setCell(sheetName: string, address: string, value: ExcelJS.CellValue): void {
    this.sheet(sheetName).getCell(address).value = value;
  }

  async toBuffer(): Promise<Buffer> {
    return Buffer.from(await this.wb.xlsx.writeBuffer());
  }
}

/** Addresses covered by a block of values whose top-left corner is `start`. */
export function rangeAddresses(start: string, values: CellInput[][]): { addresses: string[]; range: string } {
  const origin = parseCellRef(start);
  const addresses: string[] = [];
  let width = 0;
  values.forEach((row, r) => {
    width = Math.max(width, row.length);
    row.forEach((_, c) => addresses.push(`${columnLetters(origin.col + c)}${origin.row + r}`));
  });
  const end = `${columnLetters(origin.col + Math.max(width, 1) - 1)}${origin.row + Math.max(values.length, 1) - 1}`;
  return { addresses, range: `${origin.address}:${end}` };
}
