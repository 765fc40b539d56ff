import type {
  DocumentSnapshot,
  FootnoteNumbering,
  FootnoteOptions,
  FootnotePosition,
  SerializeOptions,
} from '../types/index.js';
import type { DocumentTemplate } from '../template/DocumentTemplate.js';
import { encodeRtfText } from '../utils/rtfEncoding.js';

export const GENERATOR_NAME = 'rtf-composer';
export const GENERATOR_VERSION = '0.1.0';

export const DEFAULT_FOOTNOTE_OPTIONS: Readonly<FootnoteOptions> = {
  position: 'bottom-of-page',
  restartEachPage: false,
  restartEachSection: false,
  numbering: 'arabic',
};

const POSITION_WORDS: Record<FootnotePosition, string> = {
  'below-text': '\\ftntj',
  'bottom-of-page': '\\ftnbj',
};

const NUMBERING_WORDS: Record<FootnoteNumbering, string> = {
  arabic: '\\ftnnar',
  'lower-alpha': '\\ftnnalc',
  'upper-alpha': '\\ftnnauc',
  'lower-roman': '\\ftnnrlc',
  'upper-roman': '\\ftnnruc',
};

export const FOOTNOTE_POSITIONS: readonly FootnotePosition[] = ['below-text', 'bottom-of-page'];
export const FOOTNOTE_NUMBERINGS: readonly FootnoteNumbering[] = [
  'arabic',
  'lower-alpha',
  'upper-alpha',
  'lower-roman',
  'upper-roman',
];

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * `{\creatim\yr2026\mo10\dy18\hr09\min05}` in local time
 */
export function renderCreationTime(date: Date): string {
  return (
    `{\\creatim\\yr${date.getFullYear()}\\mo${pad(date.getMonth() + 1)}` +
    `\\dy${pad(date.getDate())}\\hr${pad(date.getHours())}\\min${pad(date.getMinutes())}}`
  );
}

export function renderFootnoteOptions(options: FootnoteOptions): string {
  let out = POSITION_WORDS[options.position];
  if (options.restartEachPage) out += '\\ftnrstpg';
  if (options.restartEachSection) out += '\\ftnrestart';
  return out + NUMBERING_WORDS[options.numbering];
}

/**
 * Assemble the complete RTF file: header, resource tables, info group,
 * page geometry, footnote options, body and terminator.
 *
 * The body must already be closed; RtfDocument.toRtf takes care of that.
 */
export function serializeDocument(
  snapshot: DocumentSnapshot,
  template: DocumentTemplate,
  options: SerializeOptions = {}
): string {
  const generator = options.generator ?? GENERATOR_NAME;
  const version = options.generatorVersion ?? GENERATOR_VERSION;
  const now = options.now ?? (() => new Date());
  const { layout } = snapshot;

  const lines: string[] = [];

  // Prolog
  lines.push('{\\rtf1\\ansi\\deff0');
  lines.push(`\\deflang${template.defaultLanguage}\\adeflang${template.asianDefaultLanguage}\n`);

  lines.push('{\\fonttbl\n');
  for (const font of template.fonts.values()) {
    lines.push(font.render());
  }
  lines.push('}\n');

  // Entry 0 is the reader's default color
  lines.push('{\\colortbl\n');
  lines.push(';\n');
  for (const color of template.colors.values()) {
    lines.push(color.render());
  }
  lines.push('}\n');

  lines.push('{\\stylesheet\n');
  for (const style of template.styles.values()) {
    lines.push(style.renderTableEntry());
  }
  lines.push('}\n');

  lines.push(`{\\*\\generator ${encodeRtfText(`${generator} ${version}`)};}\n`);

  lines.push('{\\info\n');
  lines.push(`{\\title ${encodeRtfText(snapshot.title)}}\n`);
  lines.push(`{\\author ${encodeRtfText(snapshot.author)}}\n`);
  lines.push(`${renderCreationTime(now())}\n`);
  lines.push('}\n');

  lines.push(
    `\\paperh${layout.paperHeight}\\paperw${layout.paperWidth}` +
    `\\margl${layout.marginLeft}\\margr${layout.marginRight}` +
    `\\margt${layout.marginTop}\\margb${layout.marginBottom}\n`
  );

  lines.push(`${renderFootnoteOptions(snapshot.footnotes)}\n`);

  lines.push(snapshot.body);

  lines.push('\\par }');

  return lines.join('');
}
