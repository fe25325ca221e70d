import path from 'node:path';

import { z } from 'zod';

import { pageWindow, readPdfMetadata, readPdfTables, readPdfText, searchPages } from '../documents/pdf.js';
import { resolveReadPath, requireExtension } from './files.js';
import { toJson } from './output.js';
import { defineReadTool } from './registry.js';
import { ToolError } from './tool-error.js';

const PDF = ['.pdf'];

const filePath = z.string().min(1).describe('Path to the .pdf file, relative to the workspace root');

function pdfPath(ctx: Parameters<typeof resolveReadPath>[0], p: string): string {
  const abs = resolveReadPath(ctx, p);
  requireExtension(abs, PDF);
  return abs;
}

export const extractPdfText = defineReadTool({
  name: 'extract_pdf_text',
  description:
    'Extract text from a range of PDF pages (1-based). Page through long documents with start_page/max_pages, ' +
    'or use search_pdf_text first to find the pages you need.',
  schema: z.object({
    file_path: filePath,
    start_page: z.number().int().min(1).default(1),
    max_pages: z.number().int().min(1).max(200).default(20),
  }),
  async run(args, ctx) {
    const abs = pdfPath(ctx, args.file_path);
    const doc = await readPdfText(abs);
    if (doc.totalPages === 0) return `${path.basename(abs)}: no pages`;
    const win = pageWindow(doc, args.start_page, args.max_pages);
    const lines = [`${path.basename(abs)}: pages ${win.from}-${win.to} of ${doc.totalPages}`, '', win.text];
    if (win.to < doc.totalPages) lines.push('', `… continue with start_page=${win.to + 1}`);
    return lines.join('\n');
  },
});

export const getPdfMetadata = defineReadTool({
  name: 'get_pdf_metadata',
  description: 'Page count and document info (title, author, dates) of a PDF.',
  schema: z.object({ file_path: filePath }),
  async run(args, ctx) {
    const meta = await readPdfMetadata(pdfPath(ctx, args.file_path));
    return toJson(meta);
  },
});

export const searchPdfText = defineReadTool({
  name: 'search_pdf_text',
  description: 'Find a phrase across all pages of a PDF. Returns page numbers with surrounding context.',
  schema: z.object({
    file_path: filePath,
    query: z.string().min(1),
    case_sensitive: z.boolean().default(false),
    max_results: z.number().int().min(1).max(500).default(50),
  }),
  async run(args, ctx) {
    const doc = await readPdfText(pdfPath(ctx, args.file_path));
    const hits = searchPages(doc.pages, args.query, {
      caseSensitive: args.case_sensitive,
      limit: args.max_results,
    });
    if (!hits.length) return `No matches for "${args.query}" in ${doc.totalPages} page(s).`;
    const pages = [...new Set(hits.map((h) => h.page))];
    return toJson({ query: args.query, matches: hits.length, pages, results: hits });
  },
});

export const extractPdfTables = defineReadTool({
  name: 'extract_pdf_tables',
  description:
    'Extract tables from a PDF by aligning text into rows and columns. Works on text-based tables; ' +
    'scanned pages have no text to align. Limit to one page with page_number (1-based).',
  schema: z.object({
    file_path: filePath,
    page_number: z.number().int().min(1).optional(),
  }),
  async run(args, ctx) {
    const { totalPages, tables } = await readPdfTables(pdfPath(ctx, args.file_path), args.page_number);
    if (args.page_number !== undefined && args.page_number > totalPages) {
      throw new ToolError('invalid_args', `page_number ${args.page_number} is past the last page (${totalPages})`);
    }
    if (!tables.length) return 'No tables found in PDF.';
    return toJson(tables);
  },
});

export const PDF_TOOLS = [extractPdfText, getPdfMetadata, searchPdfText, extractPdfTables];
