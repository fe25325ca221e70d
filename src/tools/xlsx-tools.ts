import path from 'node:path';

import { z } from 'zod';

import { analyze } from '../documents/analysis.js';
import { atomicWrite } from '../documents/atomic.js';
import type { FormulaEngine } from '../documents/recalc.js';
import {
  coerceInput,
  parseCellRef,
  rangeAddresses,
  XlsxWorkbook,
  type CellInput,
  type FormulaResult,
} from '../documents/xlsx.js';
import { resolveReadPath, requireExtension } from './files.js';
import { toJson } from './output.js';
import { defineMutateTool, defineReadTool, type PlannedChange } from './registry.js';
import { ToolError } from './tool-error.js';

const XLSX = ['.xlsx', '.xlsm'];

const filePath = z.string().min(1).describe('Path to the .xlsx file, relative to the workspace root');
const sheet = z.string().optional().describe('Sheet name; the active sheet when omitted');
const outputPath = z
  .string()
  .min(1)
  .optional()
  .describe('Write the edited workbook here instead of overwriting file_path');
const description = z.string().optional().describe('Why this change is needed; shown to the user');
const cellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

async function loadWorkbook(absPath: string): Promise<XlsxWorkbook> {
  requireExtension(absPath, XLSX);
  return XlsxWorkbook.load(absPath);
}

export const getSheetNames = defineReadTool({
  name: 'get_sheet_names',
  description: 'List the worksheets in an Excel workbook.',
  schema: z.object({ file_path: filePath }),
  async run(args, ctx) {
    const wb = await loadWorkbook(resolveReadPath(ctx, args.file_path));
    return toJson(wb.sheetNames());
  },
});

export const readSheet = defineReadTool({
  name: 'read_sheet',
  description:
    'Read rows of a worksheet as tab-separated values, paginated by start_row/max_rows. ' +
    'Formulas are shown as =FORMULA.',
  schema: z.object({
    file_path: filePath,
    sheet,
    start_row: z.number().int().min(1).default(1),
    max_rows: z.number().int().min(1).max(5000).default(100),
  }),
  async run(args, ctx) {
    const wb = await loadWorkbook(resolveReadPath(ctx, args.file_path));
    const { sheet: name, rows, lastRow } = wb.readRows(args.sheet, args.start_row, args.max_rows);
    const lines = [`Sheet "${name}" rows ${args.start_row}-${args.start_row + args.max_rows - 1} (last row ${lastRow})`];
    for (const r of rows) lines.push(`${r.row}\t${r.values.join('\t')}`);
    const next = args.start_row + args.max_rows;
    if (next <= lastRow) lines.push(`… continue with start_row=${next}`);
    return lines.join('\n');
  },
});

export const getFormulas = defineReadTool({
  name: 'get_formulas',
  description: 'List every formula cell in a workbook (or one sheet).',
  schema: z.object({ file_path: filePath, sheet }),
  async run(args, ctx) {
    const wb = await loadWorkbook(resolveReadPath(ctx, args.file_path));
    const formulas = wb.formulas(args.sheet);
    if (!formulas.length) return 'No formulas found.';
    return formulas.map((f) => `${f.sheet}!${f.cell} ${f.formula}`).join('\n');
  },
});

export const searchSheet = defineReadTool({
  name: 'search_sheet',
  description: 'Find cells whose displayed value contains the query. Returns cell references and row numbers.',
  schema: z.object({
    file_path: filePath,
    query: z.string().min(1),
    sheet,
    case_sensitive: z.boolean().default(false),
    max_results: z.number().int().min(1).max(1000).default(100),
  }),
  async run(args, ctx) {
    const wb = await loadWorkbook(resolveReadPath(ctx, args.file_path));
    const hits = wb.search(args.query, {
      sheet: args.sheet,
      caseSensitive: args.case_sensitive,
      limit: args.max_results,
    });
    if (!hits.length) return `No matches for "${args.query}".`;
    return toJson({ query: args.query, matches: hits.length, results: hits });
  },
});

export const analyzeData = defineReadTool({
  name: 'analyze_data',
  description:
    'Treat a sheet as a table (first row = column names) and report summary statistics ' +
    '(count, mean, std, quartiles per numeric column), column types (info), the first 10 rows (head) or its shape.',
  schema: z.object({
    file_path: filePath,
    sheet,
    analysis_type: z.enum(['summary', 'info', 'head', 'shape']).default('summary'),
  }),
  async run(args, ctx) {
    const wb = await loadWorkbook(resolveReadPath(ctx, args.file_path));
    const table = wb.table(args.sheet);
    if (!table.columns.length) return `Sheet "${table.sheet}" is empty.`;
    return toJson({ sheet: table.sheet, analysis: args.analysis_type, ...analyze(table, args.analysis_type) });
  },
});

/**
 * Shared plan for every cell edit: snapshot the touched cells, apply the values to the
 * in-memory workbook, snapshot again.
 */
async function planCellEdits(
  target: { inputPath: string; outputPath: string },
  sheetName: string | undefined,
  edits: Array<{ address: string; value: CellInput }>,
  anchorFor: (sheet: string) => string,
  reason: string | undefined
): Promise<PlannedChange> {
  const wb = await loadWorkbook(target.inputPath);
  requireExtension(target.outputPath, XLSX);
  const ws = wb.sheet(sheetName);
  const addresses = edits.map((e) => e.address);
  const before = wb.snapshot(ws.name, addresses);
  for (const e of edits) wb.setCell(ws.name, e.address, coerceInput(e.value));
  const after = wb.snapshot(ws.name, addresses);
  return {
    anchor: anchorFor(ws.name),
    before,
    after,
    note: `Updated ${edits.length} cell(s) in ${path.basename(target.outputPath)}; formulas are recalculated when the workbook is next opened.`,
    reason,
    commit: async () => atomicWrite(target.outputPath, await wb.toBuffer()),
  };
}

export const updateXlsxCell = defineMutateTool({
  name: 'update_xlsx_cell',
  description:
    'Set one cell value. JSON numbers and booleans are stored as such, strings stay text ("02134" keeps its zero), ' +
    'and a string starting with = is stored as a formula. ' +
    'The user sees the old and new value and must approve.',
  schema: z.object({
    file_path: filePath,
    cell: z.string().min(2).describe('A1-style reference, e.g. B2'),
    new_value: cellValue,
    sheet,
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const ref = parseCellRef(args.cell);
    return planCellEdits(
      target,
      args.sheet,
      [{ address: ref.address, value: args.new_value }],
      (ws) => `${ws}!${ref.address}`,
      args.description
    );
  },
});

export const addXlsxFormula = defineMutateTool({
  name: 'add_xlsx_formula',
  description: 'Write a formula into a cell (a leading = is optional). Requires user approval.',
  schema: z.object({
    file_path: filePath,
    cell: z.string().min(2),
    formula: z.string().min(1),
    sheet,
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const ref = parseCellRef(args.cell);
    const formula = args.formula.trim().startsWith('=') ? args.formula.trim() : `=${args.formula.trim()}`;
    return planCellEdits(
      target,
      args.sheet,
      [{ address: ref.address, value: formula }],
      (ws) => `${ws}!${ref.address}`,
      args.description
    );
  },
});

export const updateXlsxRange = defineMutateTool({
  name: 'update_xlsx_range',
  description:
    'Write a block of values whose top-left corner is start_cell. values is an array of rows, ' +
    'e.g. [["Name","Qty"],["Bolts",40]]. Requires user approval.',
  schema: z.object({
    file_path: filePath,
    start_cell: z.string().min(2),
    values: z.array(z.array(cellValue)).min(1),
    sheet,
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const { addresses, range } = rangeAddresses(args.start_cell, args.values);
    if (!addresses.length) throw new ToolError('invalid_args', 'values contains no cells');
    const flat = args.values.flat();
    const edits = addresses.map((address, i) => ({ address, value: flat[i] ?? null }));
    return planCellEdits(target, args.sheet, edits, (ws) => `${ws}!${range}`, args.description);
  },
});

/** One line per formula cell: the formula and its cached result. */
function formulaSnapshot(results: FormulaResult[]): string {
  return results.map((r) => `${r.sheet}!${r.cell} = ${r.formula} -> ${r.result ?? '(not calculated)'}\n`).join('');
}

function errorSummary(results: FormulaResult[]): string {
  const byError = new Map<string, string[]>();
  for (const r of results) {
    if (!r.error) continue;
    byError.set(r.error, [...(byError.get(r.error) ?? []), `${r.sheet}!${r.cell}`]);
  }
  if (!byError.size) return 'no formula errors';
  return [...byError].map(([err, cells]) => `${err} at ${cells.join(', ')}`).join('; ');
}

export function recalculateFormulas(engine: FormulaEngine) {
  return defineMutateTool({
    name: 'recalculate_formulas',
    description:
      'Recalculate every formula with a spreadsheet engine and store the results in the workbook, ' +
      'so readers without one see current values. Reports formula errors such as #DIV/0!. Requires user approval.',
    schema: z.object({
      file_path: filePath,
      timeout: z.number().int().min(1).max(600).default(30).describe('Seconds to wait for the engine'),
      output_path: outputPath,
      description,
    }),
    paths: (args) => ({ input: args.file_path, output: args.output_path }),
    async prepare(args, target, ctx) {
      const current = await loadWorkbook(target.inputPath);
      requireExtension(target.outputPath, XLSX);
      const bytes = await engine.recalculate(target.inputPath, { timeoutMs: args.timeout * 1000, signal: ctx.signal });
      const recalculated = await XlsxWorkbook.fromBuffer(bytes);
      const before = current.formulaResults();
      const after = recalculated.formulaResults();
      return {
        anchor: 'formulas',
        before: formulaSnapshot(before),
        after: formulaSnapshot(after),
        note: `Recalculated ${after.length} formula(s) with ${engine.name}: ${errorSummary(after)}.`,
        reason: args.description,
        commit: () => atomicWrite(target.outputPath, bytes),
      };
    },
  });
}

export function xlsxTools(engine: FormulaEngine) {
  return [
    getSheetNames,
    readSheet,
    getFormulas,
    searchSheet,
    analyzeData,
    updateXlsxCell,
    addXlsxFormula,
    updateXlsxRange,
    recalculateFormulas(engine),
  ];
}
