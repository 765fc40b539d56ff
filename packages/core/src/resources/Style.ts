import { ConfigError } from '../errors/index.js';
import type { Alignment, StyleAttributes, StyleOptions } from '../types/index.js';
import { getLogger, type LoggingService } from '../services/LoggingService.js';
import { ResourceTable } from './ResourceTable.js';

const STYLE_ID = /^s\d+$/;
const FONT_ID = /^f\d+$/;
const COLOR_ID = /^\d+$/;

const ALIGNMENT_WORDS: Record<Alignment, string> = {
  left: '\\ql',
  right: '\\qr',
  center: '\\qc',
  justify: '\\qj',
};

/**
 * Paragraphs are justified unless a style says otherwise
 */
export const DEFAULT_ALIGNMENT: Alignment = 'justify';

/**
 * Numeric part of a style id: "s21" → "21"
 */
export function styleNumber(id: string): string {
  return id.replace(/^\D+/, '');
}

/**
 * Style sheet entry.
 *
 * `renderApply()` is what gets emitted each time the style is used;
 * `renderTableEntry()` is its one-off definition in the style sheet.
 */
export class Style {
  readonly id: string;
  readonly name: string;
  readonly basedOn: string;
  readonly next: string;
  readonly attributes: Readonly<StyleAttributes>;

  constructor(options: StyleOptions) {
    const { id, name, basedOn, next, ...attributes } = options;

    for (const [field, value] of [['id', id], ['basedOn', basedOn], ['next', next]] as const) {
      if (value !== undefined && !STYLE_ID.test(value)) {
        throw new ConfigError(`Invalid style ${field} "${value}"`, { id, [field]: value }, [
          'Style ids are "s" followed by a number (e.g. "s21")',
        ]);
      }
    }
    if (attributes.font !== undefined && !FONT_ID.test(attributes.font)) {
      throw new ConfigError(`Style "${id}" refers to invalid font id "${attributes.font}"`, { id });
    }
    if (attributes.color !== undefined && !COLOR_ID.test(attributes.color)) {
      throw new ConfigError(`Style "${id}" refers to invalid color id "${attributes.color}"`, { id });
    }

    this.id = id;
    this.name = name;
    this.basedOn = basedOn ?? id;
    this.next = next ?? id;
    this.attributes = Object.freeze({ alignment: DEFAULT_ALIGNMENT, ...attributes });
  }

  /**
   * Formatting commands in canonical order, followed by one space
   */
  renderApply(): string {
    const a = this.attributes;
    let out = `\\${this.id}`;

    if (a.alignment !== undefined) out += ALIGNMENT_WORDS[a.alignment];
    if (a.font !== undefined) out += `\\${a.font}`;
    if (a.fontSize !== undefined) out += `\\fs${a.fontSize}`;
    if (a.lineSpacing !== undefined) out += `\\sl${a.lineSpacing}\\slmult1`;
    if (a.spaceBefore !== undefined) out += `\\sb${a.spaceBefore}`;
    if (a.spaceAfter !== undefined) out += `\\sa${a.spaceAfter}`;
    if (a.keepWithNext) out += '\\keepn';
    if (a.bold) out += '\\b';
    if (a.italic) out += '\\i';
    if (a.smallCaps) out += '\\scaps';
    if (a.caps) out += '\\caps';
    if (a.widowControl === true) out += '\\widctlpar';
    if (a.widowControl === false) out += '\\nowidctlpar';
    if (a.hyphenation) out += '\\hyphpar';
    if (a.direction === 'rtl') out += '\\rtlpar';
    if (a.direction === 'ltr') out += '\\ltrpar';
    if (a.color !== undefined) out += `\\cf${a.color}`;
    if (a.firstLineIndent !== undefined) out += `\\fi${a.firstLineIndent}`;
    if (a.leftIndent !== undefined) out += `\\li${a.leftIndent}`;
    if (a.rightIndent !== undefined) out += `\\ri${a.rightIndent}`;
    if (a.language !== undefined) out += `\\lang${a.language}`;

    return out + ' ';
  }

  renderTableEntry(): string {
    return (
      `{\\${this.id}\\sbasedon${styleNumber(this.basedOn)}\\snext${styleNumber(this.next)}` +
      `${this.renderApply()}${this.name};}\n`
    );
  }
}

/**
 * Style registry. A style's basedOn/next must name an already registered
 * style or the style itself, and neither chain may loop back to it.
 */
export class StyleSheet extends ResourceTable<Style> {
  constructor(logger: LoggingService = getLogger()) {
    super('StyleSheet', logger);
  }

  protected validate(style: Style): void {
    this.checkReference(style, 'basedOn');
    this.checkReference(style, 'next');
  }

  private checkReference(style: Style, field: 'basedOn' | 'next'): void {
    const target = style[field];
    if (target === style.id) {
      return;
    }
    if (!this.has(target)) {
      throw new ConfigError(
        `Style "${style.id}" ${field} "${target}" is not registered`,
        { id: style.id, [field]: target },
        [`Register "${target}" before "${style.id}"`]
      );
    }

    const visited = new Set<string>();
    let current = target;
    while (current !== style.id && !visited.has(current)) {
      visited.add(current);
      const entry = this.get(current);
      if (!entry || entry[field] === current) {
        return;
      }
      current = entry[field];
    }

    if (current === style.id) {
      throw new ConfigError(
        `Style "${style.id}" ${field} chain loops back to itself`,
        { id: style.id, [field]: target, chain: [...visited] }
      );
    }
  }
}
