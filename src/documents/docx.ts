/**
 * Minimal WordprocessingML access over the zip container.
 *
 * Works on `word/document.xml` as text: paragraphs (`<w:p>`) in document order,
 * including those inside tables, and their `<w:t>` text nodes. Edits rewrite text
 * nodes in place so run formatting survives wherever the match sits inside one run.
 */

import fs from 'node:fs/promises';

import JSZip from 'jszip';

import { ToolError } from '../tools/tool-error.js';

const DOCUMENT_PART = 'word/document.xml';
const COMMENTS_PART = 'word/comments.xml';
const CONTENT_TYPES_PART = '[Content_Types].xml';
const DOCUMENT_RELS_PART = 'word/_rels/document.xml.rels';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const COMMENTS_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.comments+xml';
const COMMENTS_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/comments';

const PARAGRAPH_RE = /<w:p(?:\s[^>]*)?\/>|<w:p(?:\s[^>]*)?>[\s\S]*?<\/w:p>/g;
const TEXT_NODE_RE = /(<w:t(?:\s[^>]*)?>)([\s\S]*?)(<\/w:t>)/g;
const TEXT_OR_TAB_RE = /<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>|<w:tab\/>/g;
const STYLE_RE = /<w:pStyle\s+w:val="([^"]*)"/;
const COMMENT_RE = /<w:comment\s([^>]*)>([\s\S]*?)<\/w:comment>/g;
const COMMENT_MARK_RE = /<w:comment(?:RangeStart|Reference)\s[^>]*?w:id="([^"]*)"/g;
const XML_DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export type DocxParagraph = {
  index: number;
  text: string;
  style?: string;
  start: number;
  end: number;
  xml: string;
};

export type DocxHeading = { index: number; level: number; text: string };

export type DocxComment = { id: string; author: string; date?: string; text: string; paragraph?: number };

export function decodeXml(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#\d+|amp|lt|gt|quot|apos);/gi, (m, ent: string) => {
    const e = ent.toLowerCase();
    if (e === 'amp') return '&';
    if (e === 'lt') return '<';
    if (e === 'gt') return '>';
    if (e === 'quot') return '"';
    if (e === 'apos') return "'";
    const code = e.startsWith('#x') ? parseInt(e.slice(2), 16) : parseInt(e.slice(1), 10);
    return Number.isFinite(code) ? String.fromCodePoint(code) : m;
  });
}

export function encodeXml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function encodeAttr(s: string): string {
  return encodeXml(s).replace(/"/g, '&quot;');
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let n = 0;
  let at = haystack.indexOf(needle);
  while (at !== -1) {
    n++;
    at = haystack.indexOf(needle, at + needle.length);
  }
  return n;
}

function attr(attrs: string, name: string): string | undefined {
  const m = new RegExp(`${name}="([^"]*)"`).exec(attrs);
  return m ? decodeXml(m[1]) : undefined;
}

function preserveSpace(openTag: string): string {
  return /xml:space=/.test(openTag) ? openTag : openTag.replace('<w:t', '<w:t xml:space="preserve"');
}

function paragraphText(pXml: string): string {
  let out = '';
  for (const m of pXml.matchAll(TEXT_OR_TAB_RE)) {
    out += m[1] === undefined ? '\t' : decodeXml(m[1]);
  }
  return out;
}

/** Replace the decoded text of each `<w:t>` node, in order, with `texts[i]`. */
function rewriteTextNodes(pXml: string, texts: string[]): string {
  let i = 0;
  return pXml.replace(TEXT_NODE_RE, (whole, open: string, _inner: string, close: string) => {
    const next = texts[i++];
    if (next === undefined) return whole;
    return `${preserveSpace(open)}${encodeXml(next)}${close}`;
  });
}

/**
 * Replace every occurrence of `oldText` in one paragraph.
 * Occurrences inside a single text node are replaced there. If any occurrence spans
 * several runs, the paragraph text is rebuilt into its first text node.
 */
export function replaceInParagraph(
  pXml: string,
  oldText: string,
  newText: string
): { xml: string; count: number } {
  const nodes = [...pXml.matchAll(TEXT_NODE_RE)].map((m) => decodeXml(m[2]));
  const joined = nodes.join('');
  const total = countOccurrences(joined, oldText);
  if (total === 0) return { xml: pXml, count: 0 };

  const inNodes = nodes.reduce((sum, t) => sum + countOccurrences(t, oldText), 0);
  if (inNodes === total) {
    return { xml: rewriteTextNodes(pXml, nodes.map((t) => t.split(oldText).join(newText))), count: total };
  }

  const rebuilt = nodes.map((_, i) => (i === 0 ? joined.split(oldText).join(newText) : ''));
  return { xml: rewriteTextNodes(pXml, rebuilt), count: total };
}

function runXml(text: string): string {
  return `<w:r><w:t xml:space="preserve">${encodeXml(text)}</w:t></w:r>`;
}

export class DocxDocument {
  private cached?: DocxParagraph[];

  private constructor(
    private readonly zip: JSZip,
    readonly xml: string,
    /** Parts other than the main document that an edit replaced; written by `toBuffer`. */
    private readonly parts: ReadonlyMap<string, string> = new Map()
  ) {}

  static async fromBuffer(data: Uint8Array): Promise<DocxDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (e: unknown) {
      throw new ToolError('unsupported', `not a DOCX (zip) file: ${e instanceof Error ? e.message : String(e)}`);
    }
    const part = zip.file(DOCUMENT_PART);
    if (!part) throw new ToolError('unsupported', `not a DOCX file: missing ${DOCUMENT_PART}`);
    return new DocxDocument(zip, await part.async('string'));
  }

  static async load(absPath: string): Promise<DocxDocument> {
    return DocxDocument.fromBuffer(await fs.readFile(absPath));
  }

  paragraphs(): DocxParagraph[] {
    if (this.cached) return this.cached;
    const out: DocxParagraph[] = [];
    for (const m of this.xml.matchAll(PARAGRAPH_RE)) {
      const start = m.index ?? 0;
      const xml = m[0];
      out.push({
        index: out.length,
        text: paragraphText(xml),
        style: STYLE_RE.exec(xml)?.[1],
        start,
        end: start + xml.length,
        xml,
      });
    }
    this.cached = out;
    return out;
  }

  /** Canonical snapshot: one paragraph per line. */
  text(): string {
    return this.paragraphs()
      .map((p) => `${p.text}\n`)
      .join('');
  }

  headings(): DocxHeading[] {
    const out: DocxHeading[] = [];
    for (const p of this.paragraphs()) {
      if (!p.style) continue;
      const m = /^heading\s*(\d)$/i.exec(p.style);
      if (m) out.push({ index: p.index, level: Number(m[1]), text: p.text });
      else if (/^title$/i.test(p.style)) out.push({ index: p.index, level: 0, text: p.text });
    }
    return out;
  }

  private async part(name: string): Promise<string | undefined> {
    return this.parts.get(name) ?? this.zip.file(name)?.async('string');
  }

  /** Paragraph index of each comment id marked in the body. */
  private commentAnchors(): Map<string, number> {
    const out = new Map<string, number>();
    for (const p of this.paragraphs()) {
      for (const m of p.xml.matchAll(COMMENT_MARK_RE)) {
        if (!out.has(m[1])) out.set(m[1], p.index);
      }
    }
    return out;
  }

  async comments(): Promise<DocxComment[]> {
    const xml = await this.part(COMMENTS_PART);
    if (xml === undefined) return [];
    const anchors = this.commentAnchors();
    const out: DocxComment[] = [];
    for (const m of xml.matchAll(COMMENT_RE)) {
      const attrs = m[1];
      const body = [...m[2].matchAll(PARAGRAPH_RE)].map((p) => paragraphText(p[0])).join('\n');
      const id = attr(attrs, 'w:id') ?? String(out.length);
      out.push({
        id,
        author: attr(attrs, 'w:author') ?? 'unknown',
        date: attr(attrs, 'w:date'),
        text: body,
        paragraph: anchors.get(id),
      });
    }
    return out;
  }

  private withXml(xml: string, parts: ReadonlyMap<string, string> = this.parts): DocxDocument {
    return new DocxDocument(this.zip, xml, parts);
  }

  private splice(replacements: Map<number, string>): string {
    let out = '';
    let pos = 0;
    for (const p of this.paragraphs()) {
      const next = replacements.get(p.index);
      if (next === undefined) continue;
      out += this.xml.slice(pos, p.start) + next;
      pos = p.end;
    }
    return out + this.xml.slice(pos);
  }

  replaceText(oldText: string, newText: string): { doc: DocxDocument; count: number } {
    const replacements = new Map<number, string>();
    let count = 0;
    for (const p of this.paragraphs()) {
      const res = replaceInParagraph(p.xml, oldText, newText);
      if (res.count > 0) {
        replacements.set(p.index, res.xml);
        count += res.count;
      }
    }
    if (count === 0) return { doc: this, count };
    return { doc: this.withXml(this.splice(replacements)), count };
  }

  /** Add `text` as a new run at the end of paragraph `index`. */
  appendToParagraph(index: number, text: string): DocxDocument {
    const paras = this.paragraphs();
    const p = paras[index];
    if (!p) {
      throw new ToolError(
        'not_found',
        `Paragraph index ${index} out of range (0-${paras.length - 1})`,
        false,
        'use extract_docx_text to see paragraph numbers'
      );
    }
    const xml = p.xml.endsWith('/>')
      ? p.xml.replace(/\/>$/, `>${runXml(text)}</w:p>`)
      : p.xml.replace(/<\/w:p>$/, `${runXml(text)}</w:p>`);
    return this.withXml(this.splice(new Map([[index, xml]])));
  }

  /** Append one paragraph per line of `text` at the end of the body. */
  appendParagraphs(text: string): DocxDocument {
    const bodyEnd = this.xml.lastIndexOf('</w:body>');
    if (bodyEnd === -1) throw new ToolError('unsupported', 'document has no <w:body>');
    const sect = this.xml.lastIndexOf('<w:sectPr', bodyEnd);
    const lastBlock = Math.max(this.xml.lastIndexOf('</w:p>', bodyEnd), this.xml.lastIndexOf('</w:tbl>', bodyEnd));
    const at = sect > lastBlock ? sect : bodyEnd;
    const paras = text
      .split(/\r?\n/)
      .map((line) => `<w:p>${runXml(line)}</w:p>`)
      .join('');
    return this.withXml(this.xml.slice(0, at) + paras + this.xml.slice(at));
  }

  /**
   * Attach a review comment to the first paragraph containing `searchText`. The comment
   * spans the whole paragraph; comments.xml and its relationship are created when missing.
   */
  async addComment(
    searchText: string,
    comment: { text: string; author: string; date: string }
  ): Promise<{ doc: DocxDocument; id: string; paragraph: number }> {
    const target = this.paragraphs().find((p) => p.text.includes(searchText));
    if (!target) {
      throw new ToolError('not_found', `Text not found: '${searchText}'`, false, 'use search_docx_text to locate the exact wording');
    }

    const existing = await this.part(COMMENTS_PART);
    const ids = [...(existing ?? '').matchAll(COMMENT_RE)].map((m) => Number(attr(m[1], 'w:id')));
    const id = String(Math.max(-1, ...ids.filter(Number.isFinite)) + 1);
    const entry =
      `<w:comment w:id="${id}" w:author="${encodeAttr(comment.author)}" w:date="${encodeAttr(comment.date)}">` +
      `<w:p>${runXml(comment.text)}</w:p></w:comment>`;
    if (existing !== undefined && !/<\/w:comments>\s*$/.test(existing)) {
      throw new ToolError('unsupported', `cannot extend ${COMMENTS_PART}: no closing </w:comments>`);
    }
    const commentsXml =
      existing === undefined
        ? `${XML_DECL}<w:comments xmlns:w="${W_NS}">${entry}</w:comments>`
        : existing.replace(/<\/w:comments>\s*$/, `${entry}</w:comments>`);

    const parts = new Map(this.parts);
    parts.set(COMMENTS_PART, commentsXml);

    const types = await this.part(CONTENT_TYPES_PART);
    if (types === undefined) throw new ToolError('unsupported', `not a DOCX file: missing ${CONTENT_TYPES_PART}`);
    if (!types.includes('PartName="/word/comments.xml"')) {
      parts.set(
        CONTENT_TYPES_PART,
        types.replace('</Types>', `<Override PartName="/word/comments.xml" ContentType="${COMMENTS_TYPE}"/></Types>`)
      );
    }

    const rels =
      (await this.part(DOCUMENT_RELS_PART)) ??
      `${XML_DECL}<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>`;
    if (!rels.includes(`Type="${COMMENTS_REL}"`)) {
      const used = [...rels.matchAll(/Id="rId(\d+)"/g)].map((m) => Number(m[1]));
      const rid = `rId${Math.max(0, ...used) + 1}`;
      parts.set(
        DOCUMENT_RELS_PART,
        rels.replace('</Relationships>', `<Relationship Id="${rid}" Type="${COMMENTS_REL}" Target="comments.xml"/></Relationships>`)
      );
    }

    const open = /^<w:p(?:\s[^>]*)?>(?:\s*<w:pPr>[\s\S]*?<\/w:pPr>)?/.exec(target.xml)?.[0] ?? '';
    const marked =
      `${open}<w:commentRangeStart w:id="${id}"/>` +
      target.xml.slice(open.length).replace(
        /<\/w:p>$/,
        `<w:commentRangeEnd w:id="${id}"/><w:r><w:commentReference w:id="${id}"/></w:r></w:p>`
      );
    return { doc: this.withXml(this.splice(new Map([[target.index, marked]])), parts), id, paragraph: target.index };
  }

  async toBuffer(): Promise<Buffer> {
    for (const [name, xml] of this.parts) this.zip.file(name, xml);
    this.zip.file(DOCUMENT_PART, this.xml);
    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }
}
