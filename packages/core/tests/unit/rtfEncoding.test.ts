import {
  encodeRtfText,
  toRtfEscapeValue,
  decodeRtfEscapeValue,
  formatControlWord,
} from '../../src/utils/rtfEncoding.js';
import { ParseError } from '../../src/errors/index.js';

describe('rtfEncoding', () => {
  describe('encodeRtfText()', () => {
    it('should leave printable ASCII untouched', () => {
      expect(encodeRtfText('Hello, world! (1 + 2) = 3')).toBe('Hello, world! (1 + 2) = 3');
      expect(encodeRtfText('')).toBe('');
    });

    it('should escape backslashes and braces', () => {
      expect(encodeRtfText('a\\b')).toBe('a\\u92?b');
      expect(encodeRtfText('{x}')).toBe('\\u123?x\\u125?');
    });

    it('should escape control characters', () => {
      expect(encodeRtfText('line\nbreak')).toBe('line\\u10?break');
      expect(encodeRtfText('\t')).toBe('\\u9?');
    });

    it('should pass DEL through', () => {
      expect(encodeRtfText('\x7f')).toBe('\x7f');
    });

    it('should escape Latin-1 and BMP characters below 0x8000 as positive values', () => {
      expect(encodeRtfText('Café')).toBe('Caf\\u233?');
      expect(encodeRtfText('א')).toBe('\\u1488?');
      expect(encodeRtfText('€')).toBe('\\u8364?');
    });

    it('should escape characters from 0x8000 up as negative values', () => {
      expect(encodeRtfText('가')).toBe('\\u-21504?');
      expect(encodeRtfText('\uFFFD')).toBe('\\u-3?');
    });

    it('should write characters beyond the BMP as two escapes', () => {
      expect(encodeRtfText('\u{1F600}')).toBe('\\u-10179?\\u-8704?');
    });
  });

  describe('escape values', () => {
    it('should map code units to signed 16-bit values and back', () => {
      expect(toRtfEscapeValue(0x7fff)).toBe(32767);
      expect(toRtfEscapeValue(0x8000)).toBe(-32768);
      expect(decodeRtfEscapeValue(-32768)).toBe(0x8000);
      expect(decodeRtfEscapeValue(233)).toBe(233);
    });
  });

  describe('formatControlWord()', () => {
    it('should prefix a valid keyword with a backslash', () => {
      expect(formatControlWord('ul')).toBe('\\ul');
      expect(formatControlWord('cf2')).toBe('\\cf2');
      expect(formatControlWord('expnd-4')).toBe('\\expnd-4');
    });

    it.each(['', 'b c', '1b', 'b\\', 'strike}'])('should reject "%s"', (keyword) => {
      expect(() => formatControlWord(keyword)).toThrow(ParseError);
    });
  });
});
