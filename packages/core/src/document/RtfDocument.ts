import { ConfigError } from '../errors/index.js';
import type {
  DocumentSnapshot,
  FootnoteOptions,
  InlineFormat,
  LayoutOverrides,
  PageLayout,
  SaveOptions,
  SerializeOptions,
  StyleKind,
} from '../types/index.js';
import type { Style } from '../resources/Style.js';
import type { DocumentTemplate } from '../template/DocumentTemplate.js';
import { getLogger, LogLevel, type LoggingService } from '../services/LoggingService.js';
import { DEFAULT_LAYOUT, describeLayout, resolveLayout } from '../layout/presets.js';
import {
  DEFAULT_FOOTNOTE_OPTIONS,
  FOOTNOTE_NUMBERINGS,
  FOOTNOTE_POSITIONS,
  serializeDocument,
} from '../serializer/RtfSerializer.js';
import { RtfFileWriter } from '../io/RtfFileWriter.js';
import { encodeRtfText, formatControlWord } from '../utils/rtfEncoding.js';

export interface RtfDocumentOptions {
  title?: string;
  author?: string;
  filename?: string;                   // Defaults to the title
  layout?: string | LayoutOverrides;   // Preset name or explicit geometry
  footnotes?: Partial<FootnoteOptions>;
  paragraphStyle?: string;
  footnoteStyle?: string;
  verbose?: boolean;                   // Trace every authoring call at DEBUG
  logger?: LoggingService;
  writer?: RtfFileWriter;
}

/**
 * Auto-numbered footnote anchor
 */
export const AUTO_FOOTNOTE_ANCHOR = '\\chftn';

const PARAGRAPH_CLOSE = '\\par}\n';
const FOOTNOTE_CLOSE = '}}\n';

function inlineFormatWords(format: InlineFormat): string {
  if (typeof format === 'object') {
    return formatControlWord(format.controlWord);
  }
  switch (format) {
    case 'bold':
      return '\\b';
    case 'italic':
      return '\\i';
    case 'bold-italic':
      return '\\i\\b';
    case 'subscript':
      return '\\sub';
    case 'superscript':
      return '\\super';
    case 'small-caps':
      return '\\scaps';
  }
}

/**
 * An RTF document under construction.
 *
 * Text goes into paragraphs, and footnotes live inside paragraphs.
 * Opening a paragraph closes the previous one (and any footnote in it);
 * opening a footnote closes only a previous footnote. Closing something
 * that is not open does nothing. Nothing stops text or footnotes being
 * added with no paragraph open; the markup is then the caller's problem.
 *
 * @example
 * const doc = new RtfDocument(createDefaultTemplate(), { title: 'Notes' });
 * doc.openParagraph('This text starts a paragraph.');
 * doc.openFootnote('The text of a footnote.', '', '*');
 * doc.openParagraph('A new paragraph closes the note and the paragraph.');
 * await doc.save({ folder: 'out' });
 */
export class RtfDocument {
  readonly template: DocumentTemplate;
  title: string;
  author: string;
  filename: string;

  private readonly logger: LoggingService;
  private readonly writer: RtfFileWriter;
  private readonly parts: string[] = [];
  private pageLayout: PageLayout;
  private footnoteConfig: FootnoteOptions;
  private paragraphStyle: Style;
  private footnoteStyle: Style;
  private paragraphOpen = false;
  private footnoteOpen = false;

  constructor(template: DocumentTemplate, options: RtfDocumentOptions = {}) {
    const baseLogger = options.logger ?? getLogger();
    this.logger = options.verbose ? baseLogger.withLevel(LogLevel.DEBUG) : baseLogger;
    this.writer = options.writer ?? new RtfFileWriter(this.logger);

    template.freeze();
    this.template = template;

    this.title = options.title ?? 'Document Title';
    this.author = options.author ?? 'author';
    this.filename = options.filename ?? this.title;

    this.pageLayout = typeof options.layout === 'string'
      ? resolveLayout(DEFAULT_LAYOUT, options.layout)
      : resolveLayout(DEFAULT_LAYOUT, undefined, options.layout);

    this.footnoteConfig = { ...DEFAULT_FOOTNOTE_OPTIONS };
    if (options.footnotes) {
      this.setFootnoteOptions(options.footnotes);
    }

    this.paragraphStyle = template.defaultParagraphStyle;
    this.footnoteStyle = template.defaultFootnoteStyle;
    if (options.paragraphStyle) this.setDefaultStyle(options.paragraphStyle, 'paragraph');
    if (options.footnoteStyle) this.setDefaultStyle(options.footnoteStyle, 'footnote');

    this.logger.debug(`[RtfDocument] Created with title "${this.title}"`);
  }

  // ==========================================================================
  // Paragraphs and runs
  // ==========================================================================

  /**
   * Open a new paragraph, closing the current paragraph and footnote first.
   *
   * @param style Style id; empty or unknown ids use the default paragraph style
   */
  openParagraph(text = '', style = ''): void {
    this.closeParagraph();

    const resolved = this.resolveStyle(style, 'paragraph');
    this.paragraphOpen = true;

    this.parts.push(`{\\pard ${resolved.renderApply()}`);
    this.parts.push(encodeRtfText(text));

    this.logger.debug(`[RtfDocument] Open paragraph (${resolved.id})${text ? `: ${text}` : ''}`);
  }

  /**
   * Close the open paragraph and any footnote inside it. No-op when nothing is open.
   */
  closeParagraph(): void {
    this.closeFootnote();

    if (this.paragraphOpen) {
      this.parts.push(PARAGRAPH_CLOSE);
      this.paragraphOpen = false;
      this.logger.debug('[RtfDocument] Close paragraph');
    }
  }

  /**
   * Append text to the open paragraph or footnote, optionally wrapped in a formatting group.
   *
   * @throws ParseError if a pass-through control word is malformed
   */
  addText(text: string, format?: InlineFormat): void {
    if (format === undefined) {
      this.parts.push(encodeRtfText(text));
    } else {
      this.parts.push(`{${inlineFormatWords(format)} ${encodeRtfText(text)}}`);
    }
  }

  bold(text: string): void {
    this.addText(text, 'bold');
  }

  italic(text: string): void {
    this.addText(text, 'italic');
  }

  subscript(text: string): void {
    this.addText(text, 'subscript');
  }

  superscript(text: string): void {
    this.addText(text, 'superscript');
  }

  smallCaps(text: string): void {
    this.addText(text, 'small-caps');
  }

  // ==========================================================================
  // Footnotes
  // ==========================================================================

  /**
   * Open a footnote at the current position, closing a previous footnote.
   *
   * @param style Style id; empty or unknown ids use the default footnote style
   * @param anchor Custom marker text; omitted means automatic numbering
   */
  openFootnote(text: string, style = '', anchor?: string): void {
    this.closeFootnote();

    const resolved = this.resolveStyle(style, 'footnote');
    const marker = anchor === undefined ? AUTO_FOOTNOTE_ANCHOR : encodeRtfText(anchor);
    this.footnoteOpen = true;

    this.parts.push(`{\\super ${marker}{\\footnote ${marker}\\pard\\plain `);
    this.parts.push(resolved.renderApply());
    this.parts.push(encodeRtfText(text));

    this.logger.debug(`[RtfDocument] Open footnote (${resolved.id})`);
  }

  closeFootnote(): void {
    if (this.footnoteOpen) {
      this.parts.push(FOOTNOTE_CLOSE);
      this.footnoteOpen = false;
      this.logger.debug('[RtfDocument] Close footnote');
    }
  }

  get isParagraphOpen(): boolean {
    return this.paragraphOpen;
  }

  get isFootnoteOpen(): boolean {
    return this.footnoteOpen;
  }

  /**
   * Body markup accumulated so far
   */
  get body(): string {
    return this.parts.join('');
  }

  // ==========================================================================
  // Styles
  // ==========================================================================

  /**
   * Find a style by id, falling back to the default for `kind`. Never throws.
   */
  resolveStyle(id: string, kind: StyleKind = 'paragraph'): Style {
    const fallback = kind === 'footnote' ? this.footnoteStyle : this.paragraphStyle;

    const style = this.template.styles.get(id);
    if (style) {
      return style;
    }

    if (id) {
      this.logger.warn(
        `[RtfDocument] Style "${id}" not found. Defaulting to "${fallback.id}" for ${kind}.`
      );
    }
    return fallback;
  }

  /**
   * Change the style used when no (or an unknown) style is given
   */
  setDefaultStyle(id: string, kind: StyleKind = 'paragraph'): void {
    const style = this.resolveStyle(id, kind);
    if (kind === 'footnote') {
      this.footnoteStyle = style;
    } else {
      this.paragraphStyle = style;
    }
    this.logger.debug(`[RtfDocument] Default ${kind} style set to "${style.id}"`);
  }

  get paragraphStyleId(): string {
    return this.paragraphStyle.id;
  }

  get footnoteStyleId(): string {
    return this.footnoteStyle.id;
  }

  // ==========================================================================
  // Layout and footnote options
  // ==========================================================================

  /**
   * Set page geometry from a preset and/or explicit length literals.
   * Set overrides win over the preset; anything left unset keeps its current value.
   *
   * @throws ConfigError for an unknown preset
   * @throws ParseError for a malformed length
   */
  setLayout(preset?: string, overrides: LayoutOverrides = {}): void {
    this.pageLayout = resolveLayout(this.pageLayout, preset, overrides);
    this.logger.debug(preset ? `[RtfDocument] Layout set to "${preset}"` : '[RtfDocument] Layout set');
  }

  get layout(): PageLayout {
    return { ...this.pageLayout };
  }

  describeLayout(): string {
    return describeLayout(this.pageLayout);
  }

  /**
   * @throws ConfigError for an unknown position or numbering style
   */
  setFootnoteOptions(options: Partial<FootnoteOptions>): void {
    if (options.position !== undefined && !FOOTNOTE_POSITIONS.includes(options.position)) {
      throw new ConfigError(`Unknown footnote position "${options.position}"`, {
        position: options.position,
      }, [`Valid positions: ${FOOTNOTE_POSITIONS.join(', ')}`]);
    }
    if (options.numbering !== undefined && !FOOTNOTE_NUMBERINGS.includes(options.numbering)) {
      throw new ConfigError(`Unknown footnote numbering "${options.numbering}"`, {
        numbering: options.numbering,
      }, [`Valid numbering styles: ${FOOTNOTE_NUMBERINGS.join(', ')}`]);
    }

    this.footnoteConfig = { ...this.footnoteConfig, ...options };
  }

  get footnoteOptions(): FootnoteOptions {
    return { ...this.footnoteConfig };
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  snapshot(): DocumentSnapshot {
    return {
      title: this.title,
      author: this.author,
      layout: this.layout,
      footnotes: this.footnoteOptions,
      body: this.body,
    };
  }

  /**
   * Close whatever is open and produce the complete RTF text
   */
  toRtf(options: SerializeOptions = {}): string {
    this.closeParagraph();
    return serializeDocument(this.snapshot(), this.template, options);
  }

  /**
   * Serialize and write `<folder>/<filename>.rtf`
   *
   * @returns The path written
   */
  async save(options: SaveOptions = {}): Promise<string> {
    const filename = options.filename || this.filename;
    const content = this.toRtf(options);

    this.logger.debug(`[RtfDocument] Exporting "${this.title}" as "${filename}"`);
    const filePath = await this.writer.write(content, { filename, folder: options.folder });
    this.logger.info(`[RtfDocument] Saved ${filePath}`);
    return filePath;
  }
}
