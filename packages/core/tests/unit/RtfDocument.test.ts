import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { RtfDocument } from '../../src/document/RtfDocument.js';
import { createDefaultTemplate } from '../../src/template/defaultTemplate.js';
import type { DocumentTemplate } from '../../src/template/DocumentTemplate.js';
import { ConfigError, ParseError } from '../../src/errors/index.js';
import { LoggingService, LogLevel, MemorySink } from '../../src/services/LoggingService.js';
import type { FootnoteOptions } from '../../src/types/index.js';

const PARAGRAPH_APPLY = '\\s0\\qj ';
const FOOTNOTE_APPLY = '\\s23\\qj\\f1\\fs18\\fi-227\\li227 ';
const FOOTNOTE_OPEN = '{\\super \\chftn{\\footnote \\chftn\\pard\\plain ' + FOOTNOTE_APPLY;
const FIXED_NOW = () => new Date(2024, 0, 5, 9, 7);

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('RtfDocument', () => {
  let sink: MemorySink;
  let logger: LoggingService;
  let template: DocumentTemplate;
  let doc: RtfDocument;

  beforeEach(() => {
    sink = new MemorySink();
    logger = new LoggingService(LogLevel.WARN, sink);
    template = createDefaultTemplate(logger);
    doc = new RtfDocument(template, { title: 'Test', logger });
  });

  describe('construction', () => {
    it('should apply defaults', () => {
      const plain = new RtfDocument(createDefaultTemplate(logger), { logger });
      expect(plain.title).toBe('Document Title');
      expect(plain.author).toBe('author');
      expect(plain.filename).toBe('Document Title');
      expect(plain.isParagraphOpen).toBe(false);
      expect(plain.isFootnoteOpen).toBe(false);
      expect(plain.body).toBe('');
      expect(plain.paragraphStyleId).toBe('s0');
      expect(plain.footnoteStyleId).toBe('s23');
      expect(plain.footnoteOptions).toEqual({
        position: 'bottom-of-page',
        restartEachPage: false,
        restartEachSection: false,
        numbering: 'arabic',
      });
    });

    it('should merge caller options', () => {
      const custom = new RtfDocument(createDefaultTemplate(logger), {
        title: 'Report',
        author: 'Ana',
        filename: 'report-final',
        layout: 'A5',
        footnotes: { numbering: 'lower-roman' },
        paragraphStyle: 's21',
        footnoteStyle: 's26',
        logger,
      });

      expect(custom.filename).toBe('report-final');
      expect(custom.layout.paperWidth).toBe(8391);
      expect(custom.footnoteOptions.numbering).toBe('lower-roman');
      expect(custom.paragraphStyleId).toBe('s21');
      expect(custom.footnoteStyleId).toBe('s26');
    });

    it('should accept explicit geometry as the layout option', () => {
      const custom = new RtfDocument(createDefaultTemplate(logger), {
        layout: { paperWidth: '8.5in', paperHeight: '11in' },
        logger,
      });
      expect(custom.layout).toEqual({
        paperHeight: 15840,
        paperWidth: 12240,
        marginTop: 1134,
        marginBottom: 1134,
        marginLeft: 1134,
        marginRight: 1134,
      });
    });

    it('should freeze its template', () => {
      expect(template.isFrozen).toBe(true);
      expect(() => template.registerFont({ id: 'f9', name: 'Late' })).toThrow(ConfigError);
    });
  });

  describe('paragraphs', () => {
    it('should build a paragraph with plain and bold text', () => {
      doc.openParagraph('Hello');
      doc.addText('World', 'bold');
      doc.closeParagraph();

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}Hello{\\b World}\\par}\n`);
      expect(count(doc.body, '\\par}')).toBe(1);
      expect(doc.body).not.toContain('\\footnote');
    });

    it('should close the previous paragraph exactly once when opening another', () => {
      doc.openParagraph('One');
      doc.openParagraph('Two');

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}One\\par}\n{\\pard ${PARAGRAPH_APPLY}Two`);
      expect(count(doc.body, '\\par}')).toBe(1);
      expect(doc.isParagraphOpen).toBe(true);
    });

    it('should treat closing with nothing open as a no-op', () => {
      doc.closeParagraph();
      expect(doc.body).toBe('');

      doc.openParagraph('x');
      doc.closeParagraph();
      const before = doc.body;
      doc.closeParagraph();
      expect(doc.body).toBe(before);
      expect(doc.isParagraphOpen).toBe(false);
    });

    it('should open an empty paragraph', () => {
      doc.openParagraph();
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}`);
    });

    it('should escape paragraph text', () => {
      doc.openParagraph('Café {x}');
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}Caf\\u233? \\u123?x\\u125?`);
    });

    it('should use a registered style by id', () => {
      doc.openParagraph('Title', 's25');
      expect(doc.body).toBe('{\\pard \\s25\\qc\\f1\\fs28\\sb1132\\sa566\\keepn\\b\\lang1609 Title');
    });

    it('should fall back to the default style for an unknown id and warn', () => {
      doc.openParagraph('x', 's99');

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}x`);
      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toMatch(
        /\[WARN\] \[RtfDocument\] Style "s99" not found\. Defaulting to "s0" for paragraph\.$/
      );
    });

    it('should not warn when no style is given', () => {
      doc.openParagraph('x', '');
      expect(sink.lines).toEqual([]);
    });
  });

  describe('inline runs', () => {
    beforeEach(() => {
      doc.openParagraph();
    });

    it.each([
      ['italic', '{\\i a}'],
      ['bold-italic', '{\\i\\b a}'],
      ['subscript', '{\\sub a}'],
      ['superscript', '{\\super a}'],
      ['small-caps', '{\\scaps a}'],
    ] as const)('should wrap %s text', (format, expected) => {
      doc.addText('a', format);
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}${expected}`);
    });

    it('should pass a control word through', () => {
      doc.addText('under', { controlWord: 'ul' });
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}{\\ul under}`);
    });

    it('should reject a malformed control word', () => {
      expect(() => doc.addText('x', { controlWord: 'u l' })).toThrow(ParseError);
    });

    it('should offer shorthand methods', () => {
      doc.bold('b');
      doc.italic('i');
      doc.subscript('2');
      doc.superscript('n');
      doc.smallCaps('sc');

      expect(doc.body).toBe(
        `{\\pard ${PARAGRAPH_APPLY}{\\b b}{\\i i}{\\sub 2}{\\super n}{\\scaps sc}`
      );
    });

    it('should escape unformatted text', () => {
      doc.addText(' naïve');
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY} na\\u239?ve`);
    });
  });

  describe('footnotes', () => {
    it('should emit the anchor, footnote group, style and text', () => {
      doc.openParagraph('P');
      doc.openFootnote('Note');

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}P${FOOTNOTE_OPEN}Note`);
      expect(doc.isFootnoteOpen).toBe(true);
      expect(doc.isParagraphOpen).toBe(true);
    });

    it('should use a custom anchor', () => {
      doc.openParagraph('P');
      doc.openFootnote('Note', '', '*');
      expect(doc.body).toBe(
        `{\\pard ${PARAGRAPH_APPLY}P{\\super *{\\footnote *\\pard\\plain ${FOOTNOTE_APPLY}Note`
      );
    });

    it('should close a footnote left open when another one opens', () => {
      doc.openParagraph('P');
      doc.openFootnote('A');
      doc.openFootnote('B');

      const opened = `{\\pard ${PARAGRAPH_APPLY}P${FOOTNOTE_OPEN}A}}\n${FOOTNOTE_OPEN}B`;
      expect(doc.body).toBe(opened);
      expect(doc.isParagraphOpen).toBe(true);

      const rtf = doc.toRtf({ now: FIXED_NOW });
      expect(doc.body).toBe(`${opened}}}\n\\par}\n`);
      expect(rtf.endsWith(`${opened}}}\n\\par}\n\\par }`)).toBe(true);
      expect(count(doc.body, '}}\n')).toBe(2);
      expect(count(doc.body, '\\par}')).toBe(1);
    });

    it('should return to the paragraph after closing a footnote', () => {
      doc.openParagraph('P');
      doc.openFootnote('N');
      doc.closeFootnote();
      doc.addText(' more');

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}P${FOOTNOTE_OPEN}N}}\n more`);
      expect(doc.isFootnoteOpen).toBe(false);
      expect(doc.isParagraphOpen).toBe(true);
    });

    it('should close the footnote when the paragraph closes', () => {
      doc.openParagraph('P');
      doc.openFootnote('N');
      doc.closeParagraph();

      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}P${FOOTNOTE_OPEN}N}}\n\\par}\n`);
      expect(doc.isFootnoteOpen).toBe(false);
    });

    it('should permit a footnote with no paragraph open', () => {
      doc.openFootnote('orphan');
      expect(doc.isFootnoteOpen).toBe(true);
      expect(doc.isParagraphOpen).toBe(false);

      doc.closeParagraph();
      expect(doc.body).toBe(`${FOOTNOTE_OPEN}orphan}}\n`);
      expect(doc.isFootnoteOpen).toBe(false);
    });

    it('should ignore closeFootnote when none is open', () => {
      doc.openParagraph('P');
      doc.closeFootnote();
      expect(doc.body).toBe(`{\\pard ${PARAGRAPH_APPLY}P`);
    });

    it('should resolve footnote styles against the footnote default', () => {
      doc.openParagraph('P');
      doc.openFootnote('N', 's99');
      expect(doc.body.endsWith(`${FOOTNOTE_OPEN}N`)).toBe(true);
      expect(sink.lines[0]).toMatch(/Defaulting to "s23" for footnote\.$/);
    });
  });

  describe('styles', () => {
    it('should always return a usable style', () => {
      expect(doc.resolveStyle('s21').id).toBe('s21');
      expect(doc.resolveStyle('', 'footnote').id).toBe('s23');
      expect(doc.resolveStyle('nonsense').id).toBe('s0');
      expect(doc.resolveStyle('nonsense', 'footnote').id).toBe('s23');
    });

    it('should change the default paragraph style', () => {
      doc.setDefaultStyle('s21');
      doc.openParagraph('x');

      expect(doc.paragraphStyleId).toBe('s21');
      expect(doc.body).toBe('{\\pard \\s21\\qj\\f1\\fs24\\lang1024 x');
    });

    it('should keep the current default when the new one is unknown', () => {
      doc.setDefaultStyle('s99', 'footnote');
      expect(doc.footnoteStyleId).toBe('s23');
    });
  });

  describe('layout', () => {
    it('should apply the A4 preset', () => {
      doc.setLayout('royal');
      doc.setLayout('A4');
      expect(doc.layout).toEqual({
        paperHeight: 16838,
        paperWidth: 11906,
        marginTop: 1134,
        marginBottom: 1134,
        marginLeft: 1134,
        marginRight: 1134,
      });
    });

    it('should combine a preset with explicit overrides', () => {
      doc.setLayout('B5', { marginTop: '2cm' });
      expect(doc.layout).toEqual({
        paperHeight: 14173,
        paperWidth: 9978,
        marginTop: 1134,
        marginBottom: 1417,
        marginLeft: 1134,
        marginRight: 1134,
      });
    });

    it('should keep current values that are not overridden', () => {
      doc.setLayout('digest');
      doc.setLayout(undefined, { marginLeft: '1in' });
      expect(doc.layout.marginLeft).toBe(1440);
      expect(doc.layout.paperHeight).toBe(12240);
    });

    it('should leave the layout unchanged on error', () => {
      expect(() => doc.setLayout('Letter')).toThrow(ConfigError);
      expect(() => doc.setLayout(undefined, { paperWidth: '8.5pt' })).toThrow(ParseError);
      expect(doc.layout.paperWidth).toBe(11906);
    });

    it('should reject an overflowing length and keep the layout', () => {
      expect(() => doc.setLayout('A4', { paperHeight: '1e400in' })).toThrow(ParseError);
      expect(doc.layout.paperHeight).toBe(16838);
      expect(doc.toRtf({ now: FIXED_NOW })).toContain('\\paperh16838\\paperw11906');
    });

    it('should ignore a negative margin', () => {
      doc.setLayout('A4', { marginLeft: '-2cm' });
      expect(doc.layout.marginLeft).toBe(1134);
      expect(doc.toRtf({ now: FIXED_NOW })).toContain('\\margl1134\\margr1134');
    });

    it('should return a copy of the layout', () => {
      const layout = doc.layout;
      layout.paperHeight = 1;
      expect(doc.layout.paperHeight).toBe(16838);
    });

    it('should describe the layout', () => {
      expect(doc.describeLayout().split('\n')[1]).toBe(' Paper height: 16838 (29.70cm)');
    });
  });

  describe('footnote options', () => {
    it('should merge partial options', () => {
      doc.setFootnoteOptions({ position: 'below-text', restartEachPage: true });
      doc.setFootnoteOptions({ numbering: 'upper-alpha' });

      expect(doc.footnoteOptions).toEqual({
        position: 'below-text',
        restartEachPage: true,
        restartEachSection: false,
        numbering: 'upper-alpha',
      });
    });

    it('should reject unknown values', () => {
      const bad: Partial<FootnoteOptions> = JSON.parse('{"numbering":"greek"}');
      expect(() => doc.setFootnoteOptions(bad)).toThrow(ConfigError);
      expect(doc.footnoteOptions.numbering).toBe('arabic');
    });
  });

  describe('output', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rtf-document-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should close open content before serializing', () => {
      doc.openParagraph('Hello');
      const rtf = doc.toRtf({ now: FIXED_NOW });

      expect(doc.isParagraphOpen).toBe(false);
      expect(rtf.startsWith('{\\rtf1\\ansi\\deff0\\deflang1027\\adeflang1037\n')).toBe(true);
      expect(rtf).toContain('{\\title Test}\n');
      expect(rtf.endsWith(`{\\pard ${PARAGRAPH_APPLY}Hello\\par}\n\\par }`)).toBe(true);
    });

    it('should produce the same content when serialized twice', () => {
      doc.openParagraph('Hello');
      expect(doc.toRtf({ now: FIXED_NOW })).toBe(doc.toRtf({ now: FIXED_NOW }));
    });

    it('should save under the document filename', async () => {
      doc.openParagraph('Saved');
      const filePath = await doc.save({ folder: tempDir, now: FIXED_NOW });

      expect(filePath).toBe(path.join(tempDir, 'Test.rtf'));
      const written = await fs.readFile(filePath, 'utf-8');
      expect(written).toBe(doc.toRtf({ now: FIXED_NOW }));
    });

    it('should save under an explicit filename', async () => {
      const filePath = await doc.save({ folder: tempDir, filename: 'other' });
      expect(filePath).toBe(path.join(tempDir, 'other.rtf'));
    });
  });

  describe('verbose mode', () => {
    it('should trace authoring calls at debug level', () => {
      const verbose = new RtfDocument(createDefaultTemplate(logger), {
        title: 'Loud',
        verbose: true,
        logger,
      });
      verbose.openParagraph('Hi');
      verbose.closeParagraph();

      expect(sink.lines).toHaveLength(3);
      expect(sink.lines[0]).toMatch(/\[DEBUG\] \[RtfDocument\] Created with title "Loud"$/);
      expect(sink.lines[1]).toMatch(/\[DEBUG\] \[RtfDocument\] Open paragraph \(s0\): Hi$/);
      expect(sink.lines[2]).toMatch(/\[DEBUG\] \[RtfDocument\] Close paragraph$/);
    });
  });
});
