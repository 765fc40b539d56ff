import { ParseError } from '../errors/index.js';

/**
 * Text escaping for RTF output.
 *
 * RTF `\uN` takes a signed 16-bit N, so UTF-16 units from 0x8000 up are
 * written as negatives, and characters outside the BMP become two escapes
 * (one per surrogate). The `?` after each escape is the fallback character
 * for readers that skip unicode.
 */

const CONTROL_WORD = /^[A-Za-z]{1,32}(-?\d{1,10})?$/;

function needsEscape(unit: number): boolean {
  return unit < 0x20 || unit > 0x7f || unit === 0x5c || unit === 0x7b || unit === 0x7d;
}

/**
 * Map a UTF-16 code unit to the signed value written after `\u`
 */
export function toRtfEscapeValue(unit: number): number {
  return unit >= 0x8000 ? unit - 0x10000 : unit;
}

/**
 * Inverse of {@link toRtfEscapeValue}
 */
export function decodeRtfEscapeValue(value: number): number {
  return value < 0 ? value + 0x10000 : value;
}

/**
 * Escape text for an RTF body: `\`, `{`, `}`, control characters and
 * anything above 0x7F become `\uN?`; other characters pass through.
 */
export function encodeRtfText(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    out += needsEscape(unit) ? `\\u${toRtfEscapeValue(unit)}?` : text[i];
  }
  return out;
}

/**
 * Validate a pass-through control word and return it with its backslash.
 *
 * @throws ParseError if the keyword is not a letter sequence with an optional integer parameter
 */
export function formatControlWord(keyword: string): string {
  if (!CONTROL_WORD.test(keyword)) {
    throw new ParseError(`Invalid control word: "${keyword}"`, { keyword }, [
      'Control words are 1-32 ASCII letters optionally followed by an integer (e.g. "ul", "cf2")',
    ]);
  }
  return `\\${keyword}`;
}
