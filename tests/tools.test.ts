import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, beforeEach, describe, it } from 'node:test';

import ExcelJS from 'exceljs';

import { ApprovalGate } from '../src/confirm/gate.js';
import { DocxDocument } from '../src/documents/docx.js';
import { LibreOfficeEngine, type FormulaEngine } from '../src/documents/recalc.js';
import { XlsxWorkbook } from '../src/documents/xlsx.js';
import { extractDocxText } from '../src/tools/docx-tools.js';
import { buildRegistry, documentTools } from '../src/tools/index.js';
import { MutationPipeline } from '../src/tools/mutation.js';
import type { ToolRegistry } from '../src/tools/registry.js';
import type { ToolResult } from '../src/types.js';
import { makeBudgetXlsx, makeDocx, makePdf, makeWorkspace, removeDir, ScriptedProvider } from './fixtures.js';

let ws: string;
const dirs: string[] = [];

beforeEach(async () => {
  ws = await makeWorkspace();
  dirs.push(ws);
  await fs.writeFile(path.join(ws, 'report.docx'), await makeDocx(['Hello world', 'Second line']));
  await makeBudgetXlsx(path.join(ws, 'budget.xlsx'));
  await fs.writeFile(path.join(ws, 'notes.txt'), 'plain text\n');
});

after(async () => {
  for (const d of dirs) await removeDir(d);
});

function setup(
  answers: boolean[] = [],
  formulaEngine?: FormulaEngine
): { registry: ToolRegistry; provider: ScriptedProvider } {
  const provider = new ScriptedProvider(answers);
  const registry = buildRegistry(new MutationPipeline(new ApprovalGate('prompt', provider)), undefined, { formulaEngine });
  return { registry, provider };
}

let seq = 0;
function call(registry: ToolRegistry, name: string, args: Record<string, unknown>): Promise<ToolResult> {
  seq++;
  return registry.dispatch(
    { id: `call_${seq}`, name, arguments: JSON.stringify(args) },
    { workspaceRoot: ws, maxOutputChars: 50_000 }
  );
}

async function docxText(name: string): Promise<string> {
  return (await DocxDocument.load(path.join(ws, name))).text();
}

describe('document tool set', () => {
  it('registers every document tool once', () => {
    const { registry } = setup();
    assert.deepEqual(registry.names(), documentTools().map((t) => t.name));
    assert.deepEqual(
      registry.names().filter((n) => registry.isMutating(n)),
      [
        'replace_docx_text',
        'insert_docx_text',
        'delete_docx_text',
        'add_docx_comment',
        'update_xlsx_cell',
        'add_xlsx_formula',
        'update_xlsx_range',
        'recalculate_formulas',
      ]
    );
    assert.throws(() => registry.register(extractDocxText), /frozen/);
  });
});

describe('docx tools', () => {
  it('extracts numbered paragraphs', async () => {
    const res = await call(setup().registry, 'extract_docx_text', { file_path: 'report.docx' });
    assert.deepEqual(res, {
      callId: `call_${seq}`,
      ok: true,
      content: 'report.docx: 2 paragraph(s)\n[0] Hello world\n[1] Second line',
    });
  });

  it('pages long documents', async () => {
    const res = await call(setup().registry, 'extract_docx_text', { file_path: 'report.docx', max_paragraphs: 1 });
    assert.equal(
      res.content,
      'report.docx: 2 paragraph(s)\n[0] Hello world\n… 1 more paragraph(s); continue with start_paragraph=1'
    );
  });

  it('reports a document without headings', async () => {
    const res = await call(setup().registry, 'get_docx_structure', { file_path: 'report.docx' });
    assert.equal(res.content, 'No headings found (the document uses no Heading styles).');
    const comments = await call(setup().registry, 'get_docx_comments', { file_path: 'report.docx' });
    assert.equal(comments.content, 'No comments found.');
  });

  it('searches paragraphs', async () => {
    const res = await call(setup().registry, 'search_docx_text', { file_path: 'report.docx', query: 'SECOND' });
    assert.deepEqual(JSON.parse(res.content), {
      query: 'SECOND',
      matches: 1,
      results: [{ paragraph: 1, text: 'Second line' }],
    });
    const none = await call(setup().registry, 'search_docx_text', { file_path: 'report.docx', query: 'absent' });
    assert.equal(none.content, 'No matches for "absent".');
  });

  it('replaces Hello with Hi after approval', async () => {
    const { registry, provider } = setup([true]);
    const res = await call(registry, 'replace_docx_text', {
      file_path: 'report.docx',
      old_text: 'Hello',
      new_text: 'Hi',
      description: 'friendlier greeting',
    });
    assert.equal(res.ok, true);
    assert.equal(res.content, 'Applied replace_docx_text to report.docx (+1 -1 line(s)).\nReplaced 1 occurrence(s) in report.docx.');
    assert.equal(await docxText('report.docx'), 'Hi world\nSecond line\n');

    const shown = provider.seen[0];
    assert.equal(shown?.reason, 'friendlier greeting');
    assert.ok(shown?.diff.includes('-Hello world\n+Hi world'));
  });

  it('leaves the file byte-identical when rejected', async () => {
    const original = await fs.readFile(path.join(ws, 'report.docx'));
    const { registry } = setup([false]);
    const res = await call(registry, 'replace_docx_text', { file_path: 'report.docx', old_text: 'Hello', new_text: 'Hi' });
    assert.equal(res.ok, false);
    assert.match(res.content, /^Declined: the user rejected the change to report.docx\. Nothing was written\./);
    assert.deepEqual(await fs.readFile(path.join(ws, 'report.docx')), original);
  });

  it('reports text that is not there without asking', async () => {
    const { registry, provider } = setup([true]);
    const res = await call(registry, 'replace_docx_text', { file_path: 'report.docx', old_text: 'Absent', new_text: 'x' });
    assert.equal(
      res.content,
      "ERROR: code=not_found retryable=false\nmsg=Text not found: 'Absent'\nhint=use search_docx_text to locate the exact wording"
    );
    assert.equal(provider.seen.length, 0);
  });

  it('saves to output_path and keeps the original', async () => {
    const { registry } = setup([true]);
    const res = await call(registry, 'delete_docx_text', {
      file_path: 'report.docx',
      text_to_delete: ' world',
      output_path: 'out/edited.docx',
    });
    assert.equal(
      res.content,
      `Applied delete_docx_text to ${path.join('out', 'edited.docx')} (+1 -1 line(s)).\n` +
        'Deleted 1 occurrence(s) from edited.docx.\n' +
        `Saved as ${path.join('out', 'edited.docx')}; report.docx is unchanged.`
    );
    assert.equal(await docxText('report.docx'), 'Hello world\nSecond line\n');
    assert.equal(await docxText('out/edited.docx'), 'Hello\nSecond line\n');
  });

  it('inserts paragraphs at the end and text into a paragraph', async () => {
    const { registry, provider } = setup([true, true]);
    const end = await call(registry, 'insert_docx_text', { file_path: 'report.docx', new_text: 'Third line' });
    assert.equal(end.content, 'Applied insert_docx_text to report.docx (+1 -0 line(s)).\nInserted text in report.docx.');
    assert.equal(provider.seen[0]?.anchor, 'end');

    const inside = await call(registry, 'insert_docx_text', {
      file_path: 'report.docx',
      new_text: ' (edited)',
      paragraph_index: 1,
    });
    assert.equal(inside.ok, true);
    assert.equal(provider.seen[1]?.anchor, 'paragraph 1');
    assert.equal(await docxText('report.docx'), 'Hello world\nSecond line (edited)\nThird line\n');
  });

  it('blocks edits outside the workspace', async () => {
    const { registry, provider } = setup([true]);
    const res = await call(registry, 'replace_docx_text', {
      file_path: '/work/../etc/passwd',
      old_text: 'root',
      new_text: 'x',
    });
    assert.equal(
      res.content,
      `ERROR: code=blocked retryable=false\nmsg=replace_docx_text: BLOCKED — "/work/../etc/passwd" is outside the workspace root "${ws}"\nhint=use a path inside the workspace root`
    );
    assert.equal(provider.seen.length, 0);
  });

  it('checks the file type', async () => {
    const res = await call(setup().registry, 'extract_docx_text', { file_path: 'notes.txt' });
    assert.equal(res.content, 'ERROR: code=unsupported retryable=false\nmsg=notes.txt: expected .docx file, got ".txt"');
  });

  it('reports missing files as not_found', async () => {
    const res = await call(setup().registry, 'extract_docx_text', { file_path: 'missing.docx' });
    assert.equal(res.ok, false);
    assert.match(res.content, /^ERROR: code=not_found retryable=false\nmsg=ENOENT/);
  });
});

describe('xlsx tools', () => {
  it('lists sheet names', async () => {
    const res = await call(setup().registry, 'get_sheet_names', { file_path: 'budget.xlsx' });
    assert.equal(res.content, '[\n  "Budget",\n  "Notes"\n]');
  });

  it('reads rows as tab-separated text', async () => {
    const res = await call(setup().registry, 'read_sheet', { file_path: 'budget.xlsx' });
    assert.equal(
      res.content,
      'Sheet "Budget" rows 1-100 (last row 4)\n1\tItem\tCost\n2\tPaper\t12\n3\tInk\t30\n4\t\t=SUM(B2:B3)'
    );
    const page = await call(setup().registry, 'read_sheet', { file_path: 'budget.xlsx', max_rows: 2 });
    assert.equal(page.content, 'Sheet "Budget" rows 1-2 (last row 4)\n1\tItem\tCost\n2\tPaper\t12\n… continue with start_row=3');
  });

  it('lists formulas and searches cells', async () => {
    const formulas = await call(setup().registry, 'get_formulas', { file_path: 'budget.xlsx' });
    assert.equal(formulas.content, 'Budget!B4 =SUM(B2:B3)');
    const hits = await call(setup().registry, 'search_sheet', { file_path: 'budget.xlsx', query: 'paper' });
    assert.deepEqual(JSON.parse(hits.content), {
      query: 'paper',
      matches: 1,
      results: [{ sheet: 'Budget', cell: 'A2', row: 2, value: 'Paper' }],
    });
  });

  it('updates a cell after approval', async () => {
    const { registry, provider } = setup([true]);
    const res = await call(registry, 'update_xlsx_cell', { file_path: 'budget.xlsx', cell: 'b2', new_value: '15' });
    assert.equal(
      res.content,
      'Applied update_xlsx_cell to budget.xlsx (+1 -1 line(s)).\n' +
        'Updated 1 cell(s) in budget.xlsx; formulas are recalculated when the workbook is next opened.'
    );
    assert.equal(provider.seen[0]?.anchor, 'Budget!B2');
    assert.ok(provider.seen[0]?.diff.includes('-Budget!B2 = 12\n+Budget!B2 = 15'));
    const wb = await XlsxWorkbook.load(path.join(ws, 'budget.xlsx'));
    assert.equal(wb.snapshot('Budget', ['B2']), 'Budget!B2 = 15\n');
  });

  it('stores text that looks numeric as text and JSON numbers as numbers', async () => {
    const { registry } = setup([true]);
    const res = await call(registry, 'update_xlsx_range', {
      file_path: 'budget.xlsx',
      sheet: 'Notes',
      start_cell: 'A2',
      values: [['02134', 42, '1e5']],
    });
    assert.equal(res.ok, true);
    const notes = (await XlsxWorkbook.load(path.join(ws, 'budget.xlsx'))).sheet('Notes');
    assert.equal(notes.getCell('A2').value, '02134');
    assert.equal(notes.getCell('B2').value, 42);
    assert.equal(notes.getCell('C2').value, '1e5');
  });

  it('writes formulas and ranges', async () => {
    const { registry, provider } = setup([true, true]);
    const formula = await call(registry, 'add_xlsx_formula', { file_path: 'budget.xlsx', cell: 'C4', formula: 'B4*2' });
    assert.equal(formula.ok, true);
    const range = await call(registry, 'update_xlsx_range', {
      file_path: 'budget.xlsx',
      sheet: 'Notes',
      start_cell: 'A2',
      values: [['Owner', 'Ops'], ['Due', '2026-03-01']],
    });
    assert.equal(range.ok, true);
    assert.equal(provider.seen[1]?.anchor, 'Notes!A2:B3');

    const wb = await XlsxWorkbook.load(path.join(ws, 'budget.xlsx'));
    assert.equal(wb.snapshot('Budget', ['C4']), 'Budget!C4 = =B4*2\n');
    assert.equal(wb.snapshot('Notes', ['A2', 'B2', 'A3', 'B3']), 'Notes!A2 = Owner\nNotes!B2 = Ops\nNotes!A3 = Due\nNotes!B3 = 2026-03-01\n');
  });

  it('rejects a bad cell reference', async () => {
    const res = await call(setup([true]).registry, 'update_xlsx_cell', { file_path: 'budget.xlsx', cell: 'B0', new_value: 1 });
    assert.equal(
      res.content,
      'ERROR: code=invalid_args retryable=false\nmsg=invalid cell reference: "B0"\nhint=use A1 notation, e.g. B2'
    );
  });
});

describe('pdf tools', () => {
  it('only reads .pdf files', async () => {
    const res = await call(setup().registry, 'extract_pdf_text', { file_path: 'report.docx' });
    assert.equal(res.content, 'ERROR: code=unsupported retryable=false\nmsg=report.docx: expected .pdf file, got ".docx"');
  });

  it('offers no PDF editing tools', () => {
    const { registry } = setup();
    assert.deepEqual(
      registry.names().filter((n) => n.includes('pdf')),
      ['extract_pdf_text', 'get_pdf_metadata', 'search_pdf_text', 'extract_pdf_tables']
    );
  });

  it('extracts tables as rows of cells', async () => {
    await fs.writeFile(
      path.join(ws, 'sales.pdf'),
      makePdf([
        [
          { x: 72, y: 700, text: 'Region' },
          { x: 300, y: 700, text: 'Units' },
          { x: 72, y: 680, text: 'North' },
          { x: 300, y: 680, text: '120' },
        ],
      ])
    );
    const res = await call(setup().registry, 'extract_pdf_tables', { file_path: 'sales.pdf' });
    assert.deepEqual(JSON.parse(res.content), [
      {
        page: 1,
        tableIndex: 1,
        rows: 2,
        columns: 2,
        data: [
          ['Region', 'Units'],
          ['North', '120'],
        ],
      },
    ]);

    const past = await call(setup().registry, 'extract_pdf_tables', { file_path: 'sales.pdf', page_number: 5 });
    assert.equal(past.content, 'ERROR: code=invalid_args retryable=false\nmsg=page_number 5 is past the last page (1)');
  });

  it('says so when a PDF has no tables', async () => {
    await fs.writeFile(path.join(ws, 'memo.pdf'), makePdf([[{ x: 72, y: 700, text: 'Just a memo' }]]));
    const res = await call(setup().registry, 'extract_pdf_tables', { file_path: 'memo.pdf' });
    assert.equal(res.content, 'No tables found in PDF.');
  });
});

describe('add_docx_comment', () => {
  it('attaches a comment through the approval gate', async () => {
    const { registry, provider } = setup([true]);
    const res = await call(registry, 'add_docx_comment', {
      file_path: 'report.docx',
      search_text: 'Second',
      comment_text: 'Needs a source',
    });
    assert.equal(res.content, 'Applied add_docx_comment to report.docx (+1 -0 line(s)).\nAdded comment 0 to paragraph 1 of report.docx.');
    assert.equal(provider.seen[0]?.anchor, 'paragraph 1');
    assert.ok(provider.seen[0]?.diff.includes('\n+[comment 0 @ paragraph 1] Reviewer: Needs a source'));
    assert.equal(await docxText('report.docx'), 'Hello world\nSecond line\n');

    const comments = await (await DocxDocument.load(path.join(ws, 'report.docx'))).comments();
    assert.deepEqual(
      comments.map((c) => [c.id, c.author, c.text, c.paragraph]),
      [['0', 'Reviewer', 'Needs a source', 1]]
    );
  });

  it('writes nothing when declined', async () => {
    const original = await fs.readFile(path.join(ws, 'report.docx'));
    const res = await call(setup([false]).registry, 'add_docx_comment', {
      file_path: 'report.docx',
      search_text: 'Hello',
      comment_text: 'Too casual',
    });
    assert.equal(res.ok, false);
    assert.deepEqual(await fs.readFile(path.join(ws, 'report.docx')), original);
  });
});

/** Stands in for a spreadsheet engine: stores fixed results for formula cells. */
class FixedResultEngine implements FormulaEngine {
  readonly name = 'test engine';
  calls = 0;

  constructor(private readonly results: Record<string, number>) {}

  async recalculate(inputPath: string): Promise<Buffer> {
    this.calls++;
    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(inputPath);
    for (const [address, result] of Object.entries(this.results)) {
      const cell = wb.worksheets[0]?.getCell(address);
      const v = cell?.value;
      if (cell && v && typeof v === 'object' && 'formula' in v && typeof v.formula === 'string') {
        cell.value = { formula: v.formula, result, date1904: false };
      }
    }
    return Buffer.from(await wb.xlsx.writeBuffer());
  }
}

describe('recalculate_formulas', () => {
  async function makeCalcXlsx(): Promise<void> {
    const wb = new ExcelJS.Workbook();
    const sheet = wb.addWorksheet('Sheet1');
    sheet.getCell('A1').value = 10;
    sheet.getCell('A2').value = { formula: 'A1*2', date1904: false };
    sheet.getCell('A3').value = { formula: 'A2+1', date1904: false };
    await wb.xlsx.writeFile(path.join(ws, 'calc.xlsx'));
  }

  it('stores recalculated results after approval', async () => {
    await makeCalcXlsx();
    const engine = new FixedResultEngine({ A2: 20, A3: 21 });
    const { registry, provider } = setup([true], engine);
    const res = await call(registry, 'recalculate_formulas', { file_path: 'calc.xlsx' });
    assert.equal(
      res.content,
      'Applied recalculate_formulas to calc.xlsx (+2 -2 line(s)).\nRecalculated 2 formula(s) with test engine: no formula errors.'
    );
    assert.equal(engine.calls, 1);
    assert.ok(
      provider.seen[0]?.diff.includes(
        '-Sheet1!A2 = =A1*2 -> (not calculated)\n-Sheet1!A3 = =A2+1 -> (not calculated)\n+Sheet1!A2 = =A1*2 -> 20\n+Sheet1!A3 = =A2+1 -> 21'
      )
    );
    const results = (await XlsxWorkbook.load(path.join(ws, 'calc.xlsx'))).formulaResults();
    assert.deepEqual(
      results.map((r) => [r.cell, r.result]),
      [
        ['A2', '20'],
        ['A3', '21'],
      ]
    );
  });

  it('reports a missing engine without touching the workbook', async () => {
    await makeCalcXlsx();
    const original = await fs.readFile(path.join(ws, 'calc.xlsx'));
    const { registry, provider } = setup([true], new LibreOfficeEngine('/nonexistent/soffice-for-tests'));
    const res = await call(registry, 'recalculate_formulas', { file_path: 'calc.xlsx' });
    assert.equal(
      res.content,
      'ERROR: code=unsupported retryable=false\n' +
        'msg=formula engine not available: /nonexistent/soffice-for-tests was not found\n' +
        'hint=install LibreOffice or set soffice_path (REDLINE_SOFFICE_PATH)'
    );
    assert.equal(provider.seen.length, 0);
    assert.deepEqual(await fs.readFile(path.join(ws, 'calc.xlsx')), original);
  });
});

describe('analyze_data', () => {
  it('summarises numeric and text columns', async () => {
    const res = await call(setup().registry, 'analyze_data', { file_path: 'budget.xlsx', sheet: 'Budget' });
    const out = JSON.parse(res.content);
    assert.equal(out.sheet, 'Budget');
    assert.equal(out.analysis, 'summary');
    assert.deepEqual(out.Item, { count: 2, unique: 2, top: 'Paper', freq: 1 });
    assert.equal(out.Cost.count, 2);
    assert.equal(out.Cost.mean, 21);
    assert.ok(Math.abs(out.Cost.std - 12.7279) < 1e-4);
    assert.deepEqual([out.Cost.min, out.Cost['25%'], out.Cost['50%'], out.Cost['75%'], out.Cost.max], [12, 16.5, 21, 25.5, 30]);
  });

  it('reports shape, column types and the first rows', async () => {
    const { registry } = setup();
    const shape = await call(registry, 'analyze_data', { file_path: 'budget.xlsx', sheet: 'Budget', analysis_type: 'shape' });
    assert.deepEqual(JSON.parse(shape.content), {
      sheet: 'Budget',
      analysis: 'shape',
      rows: 3,
      columns: 2,
      column_names: ['Item', 'Cost'],
    });
    const info = await call(registry, 'analyze_data', { file_path: 'budget.xlsx', sheet: 'Budget', analysis_type: 'info' });
    assert.deepEqual(JSON.parse(info.content).columns, [
      { name: 'Item', type: 'text', non_null: 2 },
      { name: 'Cost', type: 'number', non_null: 2 },
    ]);
    const head = await call(registry, 'analyze_data', { file_path: 'budget.xlsx', sheet: 'Budget', analysis_type: 'head' });
    assert.deepEqual(JSON.parse(head.content).rows, [
      { Item: 'Paper', Cost: 12 },
      { Item: 'Ink', Cost: 30 },
      { Item: null, Cost: null },
    ]);
  });
});

describe('directed search tools', () => {
  it('ranks passages and hands hits to retrieval', async () => {
    const { registry } = setup();
    const found = await call(registry, 'directed_search_document', { file_path: 'report.docx', query: 'second line' });
    const out = JSON.parse(found.content);
    assert.deepEqual(out, {
      query: 'second line',
      file_path: 'report.docx',
      file_type: 'docx',
      mode: 'hybrid',
      top_k: 10,
      segments_scanned: 2,
      segments_matched: 1,
      hits: [
        {
          score: 37,
          selector: { paragraph: 1, segment: 1 },
          location: 'paragraph 1',
          snippet: 'Second line',
          stats: { phrase_hits: 1, term_hits: 2, unique_terms_matched: 2 },
        },
      ],
      tip: 'Pass these hits (or their selectors) to retrieve_document_segments to read the full text.',
    });

    const read = await call(registry, 'retrieve_document_segments', {
      file_path: 'report.docx',
      selectors: out.hits,
      neighborhood: 1,
    });
    assert.deepEqual(JSON.parse(read.content), {
      file_path: 'report.docx',
      file_type: 'docx',
      selectors_requested: 1,
      segments_returned: 2,
      neighborhood: 1,
      truncated: false,
      results: [
        { selector: { paragraph: 0, segment: 1 }, location: 'paragraph 0', text: 'Hello world' },
        { selector: { paragraph: 1, segment: 1 }, location: 'paragraph 1', text: 'Second line' },
      ],
    });
  });

  it('reads workbook rows by sheet and row', async () => {
    const res = await call(setup().registry, 'retrieve_document_segments', {
      file_path: 'budget.xlsx',
      selectors: [{ sheet: 'Budget', row: 2 }, { sheet: 'Budget', row: 40 }],
    });
    const out = JSON.parse(res.content);
    assert.deepEqual(out.results, [{ selector: { sheet: 'Budget', row: 2, segment: 1 }, location: 'Budget row 2', text: 'A2: Paper | B2: 12' }]);
    assert.deepEqual(out.missing, [{ sheet: 'Budget', row: 40, segment: 1 }]);
  });

  it('only searches supported document types', async () => {
    const res = await call(setup().registry, 'directed_search_document', { file_path: 'notes.txt', query: 'plain' });
    assert.equal(res.content, 'ERROR: code=unsupported retryable=false\nmsg=notes.txt: expected .pdf, .docx or .xlsx file, got ".txt"');
  });
});
