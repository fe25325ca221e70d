import path from 'node:path';

import { z } from 'zod';

import { directedSearch, loadSegments, retrieveSegments, type Selector } from '../documents/segments.js';
import { resolveReadPath } from './files.js';
import { toJson } from './output.js';
import { defineReadTool } from './registry.js';

const filePath = z.string().min(1).describe('Path to a .pdf, .docx or .xlsx file, relative to the workspace root');
const sheetName = z.string().optional().describe('Workbooks only: search one sheet instead of all');
const segment = z.number().int().min(1).default(1);

const SelectorSchema = z.union([
  z.object({ page: z.number().int().min(1), segment }),
  z.object({ paragraph: z.number().int().min(0), segment }),
  z.object({ sheet: z.string().min(1), row: z.number().int().min(1), segment }),
]);

/** A bare selector, or a hit from directed_search_document carrying one. */
const SelectorInput = z.union([SelectorSchema, z.object({ selector: SelectorSchema })]);

function toSelector(input: z.output<typeof SelectorInput>): Selector {
  return 'selector' in input ? input.selector : input;
}

export const directedSearchDocument = defineReadTool({
  name: 'directed_search_document',
  description:
    'Rank the passages of a PDF, Word or Excel file for a query and return the best hits with snippets and ' +
    'selectors (page, paragraph or sheet row). mode: hybrid (phrase + terms), exact (whole phrase only) or ' +
    'terms (any query word). Pass hits to retrieve_document_segments to read the full passages.',
  schema: z.object({
    file_path: filePath,
    query: z.string().min(1),
    mode: z.enum(['hybrid', 'exact', 'terms']).default('hybrid'),
    top_k: z.number().int().min(1).max(50).default(10),
    context_chars: z.number().int().min(20).max(1000).default(120),
    sheet_name: sheetName,
  }),
  async run(args, ctx) {
    const abs = resolveReadPath(ctx, args.file_path);
    const { kind, segments } = await loadSegments(abs, args.sheet_name);
    const { matched, hits } = directedSearch(segments, args.query, {
      mode: args.mode,
      topK: args.top_k,
      context: args.context_chars,
    });
    return toJson({
      query: args.query,
      file_path: path.basename(abs),
      file_type: kind,
      mode: args.mode,
      top_k: args.top_k,
      segments_scanned: segments.length,
      segments_matched: matched,
      hits,
      tip: hits.length
        ? 'Pass these hits (or their selectors) to retrieve_document_segments to read the full text.'
        : 'No matches; try mode "terms" or fewer words.',
    });
  },
});

export const retrieveDocumentSegments = defineReadTool({
  name: 'retrieve_document_segments',
  description:
    'Read the full text of passages found by directed_search_document. selectors takes hits as returned, or ' +
    'bare selectors like {"page":3,"segment":1}, {"paragraph":12} or {"sheet":"Q1","row":8}. ' +
    'neighborhood adds that many passages before and after each one.',
  schema: z.object({
    file_path: filePath,
    selectors: z.array(SelectorInput).min(1).max(50),
    neighborhood: z.number().int().min(0).max(3).default(0),
    max_chars: z.number().int().min(1000).max(30_000).default(12_000),
    sheet_name: sheetName,
  }),
  async run(args, ctx) {
    const abs = resolveReadPath(ctx, args.file_path);
    const { kind, segments } = await loadSegments(abs, args.sheet_name);
    const { results, truncated, missing } = retrieveSegments(segments, args.selectors.map(toSelector), {
      neighborhood: args.neighborhood,
      maxChars: args.max_chars,
    });
    return toJson({
      file_path: path.basename(abs),
      file_type: kind,
      selectors_requested: args.selectors.length,
      segments_returned: results.length,
      neighborhood: args.neighborhood,
      truncated,
      results,
      ...(missing.length ? { missing } : {}),
    });
  },
});

export const SEARCH_TOOLS = [directedSearchDocument, retrieveDocumentSegments];
