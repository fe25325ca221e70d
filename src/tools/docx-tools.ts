import path from 'node:path';

import { z } from 'zod';

import { atomicWrite } from '../documents/atomic.js';
import { DocxDocument } from '../documents/docx.js';
import { resolveReadPath, requireExtension } from './files.js';
import { toJson } from './output.js';
import { defineMutateTool, defineReadTool } from './registry.js';
import { ToolError } from './tool-error.js';

const DOCX = ['.docx'];

const filePath = z.string().min(1).describe('Path to the .docx file, relative to the workspace root');
const outputPath = z
  .string()
  .min(1)
  .optional()
  .describe('Write the edited document here instead of overwriting file_path');
const description = z.string().optional().describe('Why this change is needed; shown to the user');

async function loadDocx(absPath: string): Promise<DocxDocument> {
  requireExtension(absPath, DOCX);
  return DocxDocument.load(absPath);
}

export const extractDocxText = defineReadTool({
  name: 'extract_docx_text',
  description:
    'Extract paragraph text from a Word document. Each line is prefixed with its paragraph index ' +
    '(usable as paragraph_index for insert_docx_text). Table cells are included in reading order.',
  schema: z.object({
    file_path: filePath,
    start_paragraph: z.number().int().min(0).default(0),
    max_paragraphs: z.number().int().min(1).max(5000).default(500),
  }),
  async run(args, ctx) {
    const abs = resolveReadPath(ctx, args.file_path);
    const doc = await loadDocx(abs);
    const paras = doc.paragraphs();
    const slice = paras.slice(args.start_paragraph, args.start_paragraph + args.max_paragraphs);
    const lines = [`${path.basename(abs)}: ${paras.length} paragraph(s)`];
    for (const p of slice) lines.push(`[${p.index}] ${p.text}`);
    const last = args.start_paragraph + slice.length;
    if (last < paras.length) {
      lines.push(`… ${paras.length - last} more paragraph(s); continue with start_paragraph=${last}`);
    }
    return lines.join('\n');
  },
});

export const getDocxStructure = defineReadTool({
  name: 'get_docx_structure',
  description: 'List the heading outline (Title, Heading 1-9) of a Word document with paragraph indexes.',
  schema: z.object({ file_path: filePath }),
  async run(args, ctx) {
    const doc = await loadDocx(resolveReadPath(ctx, args.file_path));
    const headings = doc.headings();
    if (!headings.length) return 'No headings found (the document uses no Heading styles).';
    return headings.map((h) => `${'  '.repeat(Math.max(0, h.level - 1))}[${h.index}] ${h.text}`).join('\n');
  },
});

export const getDocxComments = defineReadTool({
  name: 'get_docx_comments',
  description: 'Read review comments in a Word document with author and date.',
  schema: z.object({ file_path: filePath }),
  async run(args, ctx) {
    const doc = await loadDocx(resolveReadPath(ctx, args.file_path));
    const comments = await doc.comments();
    if (!comments.length) return 'No comments found.';
    return toJson(comments);
  },
});

export const searchDocxText = defineReadTool({
  name: 'search_docx_text',
  description:
    'Find paragraphs containing a phrase. Returns paragraph indexes and text; use it before editing large documents.',
  schema: z.object({
    file_path: filePath,
    query: z.string().min(1),
    case_sensitive: z.boolean().default(false),
    max_results: z.number().int().min(1).max(500).default(50),
  }),
  async run(args, ctx) {
    const doc = await loadDocx(resolveReadPath(ctx, args.file_path));
    const needle = args.case_sensitive ? args.query : args.query.toLowerCase();
    const hits = doc
      .paragraphs()
      .filter((p) => (args.case_sensitive ? p.text : p.text.toLowerCase()).includes(needle))
      .slice(0, args.max_results)
      .map((p) => ({ paragraph: p.index, style: p.style, text: p.text }));
    if (!hits.length) return `No matches for "${args.query}".`;
    return toJson({ query: args.query, matches: hits.length, results: hits });
  },
});

function commitDocx(doc: DocxDocument, outPath: string) {
  return async () => atomicWrite(outPath, await doc.toBuffer());
}

export const replaceDocxText = defineMutateTool({
  name: 'replace_docx_text',
  description:
    'Replace every occurrence of old_text with new_text in a Word document. ' +
    'The user sees a diff and must approve before the file is written.',
  schema: z.object({
    file_path: filePath,
    old_text: z.string().min(1),
    new_text: z.string(),
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const doc = await loadDocx(target.inputPath);
    requireExtension(target.outputPath, DOCX);
    const { doc: next, count } = doc.replaceText(args.old_text, args.new_text);
    if (count === 0) {
      throw new ToolError('not_found', `Text not found: '${args.old_text}'`, false, 'use search_docx_text to locate the exact wording');
    }
    return {
      before: doc.text(),
      after: next.text(),
      note: `Replaced ${count} occurrence(s) in ${path.basename(target.outputPath)}.`,
      reason: args.description,
      commit: commitDocx(next, target.outputPath),
    };
  },
});

export const insertDocxText = defineMutateTool({
  name: 'insert_docx_text',
  description:
    'Insert text into a Word document: appended to paragraph paragraph_index, or as new paragraph(s) ' +
    'at the end when paragraph_index is -1. Requires user approval of the diff.',
  schema: z.object({
    file_path: filePath,
    new_text: z.string().min(1),
    paragraph_index: z.number().int().min(-1).default(-1),
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const doc = await loadDocx(target.inputPath);
    requireExtension(target.outputPath, DOCX);
    const atEnd = args.paragraph_index === -1;
    const next = atEnd ? doc.appendParagraphs(args.new_text) : doc.appendToParagraph(args.paragraph_index, args.new_text);
    return {
      anchor: atEnd ? 'end' : `paragraph ${args.paragraph_index}`,
      before: doc.text(),
      after: next.text(),
      note: `Inserted text in ${path.basename(target.outputPath)}.`,
      reason: args.description,
      commit: commitDocx(next, target.outputPath),
    };
  },
});

export const deleteDocxText = defineMutateTool({
  name: 'delete_docx_text',
  description: 'Delete every occurrence of text_to_delete from a Word document. Requires user approval of the diff.',
  schema: z.object({
    file_path: filePath,
    text_to_delete: z.string().min(1),
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const doc = await loadDocx(target.inputPath);
    requireExtension(target.outputPath, DOCX);
    const { doc: next, count } = doc.replaceText(args.text_to_delete, '');
    if (count === 0) {
      throw new ToolError('not_found', `Text not found: '${args.text_to_delete}'`, false, 'use search_docx_text to locate the exact wording');
    }
    return {
      before: doc.text(),
      after: next.text(),
      note: `Deleted ${count} occurrence(s) from ${path.basename(target.outputPath)}.`,
      reason: args.description,
      commit: commitDocx(next, target.outputPath),
    };
  },
});

/** Paragraph text followed by one line per review comment, so a new comment shows up in the diff. */
export async function reviewSnapshot(doc: DocxDocument): Promise<string> {
  const lines = (await doc.comments()).map((c) => {
    const where = c.paragraph === undefined ? '' : ` @ paragraph ${c.paragraph}`;
    return `[comment ${c.id}${where}] ${c.author}: ${c.text.replace(/\n/g, ' / ')}\n`;
  });
  return doc.text() + lines.join('');
}

export const addDocxComment = defineMutateTool({
  name: 'add_docx_comment',
  description:
    'Attach a review comment to the first paragraph containing search_text, as Word does with Review > New Comment. ' +
    'The document text is not changed. Requires user approval.',
  schema: z.object({
    file_path: filePath,
    search_text: z.string().min(1),
    comment_text: z.string().min(1),
    author: z.string().min(1).default('Reviewer'),
    output_path: outputPath,
    description,
  }),
  paths: (args) => ({ input: args.file_path, output: args.output_path }),
  async prepare(args, target) {
    const doc = await loadDocx(target.inputPath);
    requireExtension(target.outputPath, DOCX);
    const date = new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
    const { doc: next, id, paragraph } = await doc.addComment(args.search_text, {
      text: args.comment_text,
      author: args.author,
      date,
    });
    return {
      anchor: `paragraph ${paragraph}`,
      before: await reviewSnapshot(doc),
      after: await reviewSnapshot(next),
      note: `Added comment ${id} to paragraph ${paragraph} of ${path.basename(target.outputPath)}.`,
      reason: args.description,
      commit: commitDocx(next, target.outputPath),
    };
  },
});

export const DOCX_TOOLS = [
  extractDocxText,
  getDocxStructure,
  getDocxComments,
  searchDocxText,
  replaceDocxText,
  insertDocxText,
  deleteDocxText,
  addDocxComment,
];
