import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import JSZip from 'jszip';

import {
  countOccurrences,
  decodeXml,
  DocxDocument,
  encodeXml,
  replaceInParagraph,
} from '../src/documents/docx.js';
import { ToolError } from '../src/tools/tool-error.js';
import { makeDocx } from './fixtures.js';

const COMMENTS =
  '<?xml version="1.0" encoding="UTF-8"?><w:comments xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
  '<w:comment w:id="3" w:author="Reviewer" w:date="2026-01-05T10:00:00Z"><w:p><w:r><w:t>Check this figure</w:t></w:r></w:p></w:comment>' +
  '<w:comment w:id="4" w:author="R &amp; D"><w:p><w:r><w:t>Line one</w:t></w:r></w:p><w:p><w:r><w:t>Line two</w:t></w:r></w:p></w:comment>' +
  '</w:comments>';

async function sample(): Promise<DocxDocument> {
  return DocxDocument.fromBuffer(
    await makeDocx([
      { text: 'Quarterly Report', style: 'Title' },
      { text: 'Summary', style: 'Heading1' },
      'Hello world, hello again.',
      { text: 'Details', style: 'Heading2' },
      'Revenue & costs',
    ])
  );
}

describe('xml helpers', () => {
  it('decodes named and numeric entities', () => {
    assert.equal(decodeXml('a &amp; b &lt;c&gt; &quot;d&quot; &apos;e&apos; &#65;&#x42;'), 'a & b <c> "d" \'e\' AB');
  });

  it('encodes markup characters', () => {
    assert.equal(encodeXml('<a & b>'), '&lt;a &amp; b&gt;');
  });

  it('counts non-overlapping occurrences', () => {
    assert.equal(countOccurrences('aaaa', 'aa'), 2);
    assert.equal(countOccurrences('abc', ''), 0);
  });
});

describe('replaceInParagraph', () => {
  it('rewrites inside a run and keeps its formatting', () => {
    const p = '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t>Hello world</w:t></w:r></w:p>';
    const res = replaceInParagraph(p, 'Hello', 'Hi');
    assert.equal(res.count, 1);
    assert.equal(res.xml, '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Hi world</w:t></w:r></w:p>');
  });

  it('rebuilds the paragraph text when a match spans runs', () => {
    const p = '<w:p><w:r><w:t>Hel</w:t></w:r><w:r><w:t>lo world</w:t></w:r></w:p>';
    const res = replaceInParagraph(p, 'Hello', 'Hi');
    assert.equal(res.count, 1);
    assert.equal(
      res.xml,
      '<w:p><w:r><w:t xml:space="preserve">Hi world</w:t></w:r><w:r><w:t xml:space="preserve"></w:t></w:r></w:p>'
    );
  });

  it('leaves the paragraph alone when there is no match', () => {
    const p = '<w:p><w:r><w:t>abc</w:t></w:r></w:p>';
    assert.deepEqual(replaceInParagraph(p, 'zzz', 'y'), { xml: p, count: 0 });
  });
});

describe('DocxDocument', () => {
  it('reads paragraphs in order with their styles', async () => {
    const doc = await sample();
    assert.deepEqual(
      doc.paragraphs().map((p) => [p.index, p.style, p.text]),
      [
        [0, 'Title', 'Quarterly Report'],
        [1, 'Heading1', 'Summary'],
        [2, undefined, 'Hello world, hello again.'],
        [3, 'Heading2', 'Details'],
        [4, undefined, 'Revenue & costs'],
      ]
    );
    assert.equal(doc.text(), 'Quarterly Report\nSummary\nHello world, hello again.\nDetails\nRevenue & costs\n');
  });

  it('builds the heading outline', async () => {
    assert.deepEqual((await sample()).headings(), [
      { index: 0, level: 0, text: 'Quarterly Report' },
      { index: 1, level: 1, text: 'Summary' },
      { index: 3, level: 2, text: 'Details' },
    ]);
  });

  it('renders tabs and empty paragraphs', async () => {
    const doc = await DocxDocument.fromBuffer(
      await makeDocx([], { bodyXml: '<w:p><w:r><w:t>a</w:t><w:tab/><w:t>b</w:t></w:r></w:p><w:p/>' })
    );
    assert.equal(doc.text(), 'a\tb\n\n');
  });

  it('replaces case-sensitively and leaves the original untouched', async () => {
    const doc = await sample();
    const { doc: next, count } = doc.replaceText('Hello', 'Hi');
    assert.equal(count, 1);
    assert.equal(next.paragraphs()[2]?.text, 'Hi world, hello again.');
    assert.equal(doc.paragraphs()[2]?.text, 'Hello world, hello again.');
  });

  it('escapes replacement text', async () => {
    const { doc: next } = (await sample()).replaceText('Revenue', 'R<&>D');
    assert.ok(next.xml.includes('R&lt;&amp;&gt;D &amp; costs'));
    assert.equal(next.paragraphs()[4]?.text, 'R<&>D & costs');
  });

  it('returns the same document when nothing matches', async () => {
    const doc = await sample();
    const res = doc.replaceText('absent', 'x');
    assert.equal(res.count, 0);
    assert.equal(res.doc, doc);
  });

  it('appends a run to one paragraph', async () => {
    const next = (await sample()).appendToParagraph(1, ' (draft)');
    assert.equal(next.paragraphs()[1]?.text, 'Summary (draft)');
    assert.equal(next.paragraphs().length, 5);
  });

  it('rejects an out-of-range paragraph index', async () => {
    const doc = await sample();
    assert.throws(
      () => doc.appendToParagraph(9, 'x'),
      (e: unknown) => e instanceof ToolError && e.code === 'not_found' && e.message === 'Paragraph index 9 out of range (0-4)'
    );
  });

  it('appends paragraphs before the section properties', async () => {
    const next = (await sample()).appendParagraphs('Appendix A\nAppendix B');
    assert.deepEqual(
      next.paragraphs().slice(-2).map((p) => p.text),
      ['Appendix A', 'Appendix B']
    );
    assert.ok(next.xml.indexOf('Appendix B') < next.xml.indexOf('<w:sectPr'));
  });

  it('reads comments with author and date', async () => {
    const doc = await DocxDocument.fromBuffer(await makeDocx(['Body'], { commentsXml: COMMENTS }));
    assert.deepEqual(await doc.comments(), [
      { id: '3', author: 'Reviewer', date: '2026-01-05T10:00:00Z', text: 'Check this figure', paragraph: undefined },
      { id: '4', author: 'R & D', date: undefined, text: 'Line one\nLine two', paragraph: undefined },
    ]);
  });

  it('adds a comment after the highest existing id', async () => {
    const doc = await DocxDocument.fromBuffer(await makeDocx(['Intro', 'Net revenue rose'], { commentsXml: COMMENTS }));
    const { doc: next, id, paragraph } = await doc.addComment('revenue', {
      text: 'Cite the source',
      author: 'Legal <review>',
      date: '2026-02-01T09:00:00Z',
    });
    assert.equal(id, '5');
    assert.equal(paragraph, 1);
    assert.equal(next.text(), doc.text());
    assert.deepEqual((await next.comments()).at(-1), {
      id: '5',
      author: 'Legal <review>',
      date: '2026-02-01T09:00:00Z',
      text: 'Cite the source',
      paragraph: 1,
    });
    assert.equal((await doc.comments()).length, 2);
  });

  it('creates the comments part and its registrations when missing', async () => {
    const { doc: next } = await (await sample()).addComment('Hello', {
      text: 'Too informal',
      author: 'Reviewer',
      date: '2026-02-01T09:00:00Z',
    });
    const buf = await next.toBuffer();
    const zip = await JSZip.loadAsync(buf);
    const types = (await zip.file('[Content_Types].xml')?.async('string')) ?? '';
    const rels = (await zip.file('word/_rels/document.xml.rels')?.async('string')) ?? '';
    assert.ok(types.includes('<Override PartName="/word/comments.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.comments+xml"/>'));
    assert.ok(
      rels.includes(
        '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/comments" Target="comments.xml"/>'
      )
    );

    const reloaded = await DocxDocument.fromBuffer(buf);
    assert.deepEqual(await reloaded.comments(), [
      { id: '0', author: 'Reviewer', date: '2026-02-01T09:00:00Z', text: 'Too informal', paragraph: 2 },
    ]);
    assert.equal(reloaded.text(), 'Quarterly Report\nSummary\nHello world, hello again.\nDetails\nRevenue & costs\n');
  });

  it('refuses to comment on text that is not there', async () => {
    await assert.rejects(
      (await sample()).addComment('Forecast', { text: 'x', author: 'Reviewer', date: '2026-02-01T09:00:00Z' }),
      (e: unknown) => e instanceof ToolError && e.code === 'not_found' && e.message === "Text not found: 'Forecast'"
    );
  });

  it('has no comments without a comments part', async () => {
    assert.deepEqual(await (await sample()).comments(), []);
  });

  it('serialises edits back into a loadable package', async () => {
    const { doc: next } = (await sample()).replaceText('Summary', 'Overview');
    const reloaded = await DocxDocument.fromBuffer(await next.toBuffer());
    assert.equal(reloaded.text(), next.text());
    assert.equal(reloaded.headings()[1]?.text, 'Overview');
  });

  it('rejects files that are not DOCX packages', async () => {
    await assert.rejects(
      DocxDocument.fromBuffer(Buffer.from('plain text, not a zip')),
      (e: unknown) => e instanceof ToolError && e.code === 'unsupported' && e.message.startsWith('not a DOCX (zip) file: ')
    );

    const zip = new JSZip();
    zip.file('readme.txt', 'hi');
    await assert.rejects(
      DocxDocument.fromBuffer(await zip.generateAsync({ type: 'nodebuffer' })),
      (e: unknown) => e instanceof ToolError && e.message === 'not a DOCX file: missing word/document.xml'
    );
  });
});
