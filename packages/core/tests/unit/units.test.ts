import {
  parseLength,
  roundHalfEven,
  twipsToCm,
  twipsToMm,
  twipsToInches,
  formatLength,
  UNSET_LENGTH,
  CM_TO_TWIPS,
} from '../../src/utils/units.js';
import { ParseError } from '../../src/errors/index.js';

describe('units', () => {
  describe('parseLength()', () => {
    it('should return the unset sentinel for an empty string', () => {
      expect(parseLength('')).toBe(UNSET_LENGTH);
      expect(UNSET_LENGTH).toBe(-1);
    });

    it('should treat a bare integer string as twips', () => {
      expect(parseLength('5')).toBe(5);
      expect(parseLength('1440')).toBe(1440);
    });

    it('should accept a non-negative integer number as twips', () => {
      expect(parseLength(720)).toBe(720);
      expect(parseLength(0)).toBe(0);
    });

    it('should convert centimetres', () => {
      expect(parseLength('2cm')).toBe(1134);
      expect(parseLength('2.5cm')).toBe(1417);
      expect(parseLength('24cm')).toBe(13606);
    });

    it('should convert millimetres', () => {
      expect(parseLength('10mm')).toBe(567);
      expect(parseLength('20mm')).toBe(1134);
    });

    it('should convert inches', () => {
      expect(parseLength('1in')).toBe(1440);
      expect(parseLength('0.5in')).toBe(720);
      expect(parseLength('8.5in')).toBe(12240);
    });

    it('should accept signed and exponent forms before a unit', () => {
      expect(parseLength('-1cm')).toBe(-567);
      expect(parseLength('1e1mm')).toBe(567);
      expect(parseLength('.5in')).toBe(720);
    });

    it.each(['2pt', '2CM', 'abc', 'cm', '1.2', ' 2cm', '2 cm', '-5', '1,5cm', '1e400cm', '-1e400in'])(
      'should reject "%s" with a ParseError',
      (input) => {
        expect(() => parseLength(input)).toThrow(ParseError);
      }
    );

    it('should reject a digit string too long to represent', () => {
      expect(() => parseLength('9'.repeat(400))).toThrow(ParseError);
    });

    it('should reject negative or fractional numbers', () => {
      expect(() => parseLength(-5)).toThrow(ParseError);
      expect(() => parseLength(2.5)).toThrow(ParseError);
    });

    it('should carry the rejected input in the error context', () => {
      let caught: unknown;
      try {
        parseLength('3pt');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.context).toEqual({ input: '3pt' });
        expect(caught.message).toBe('Length impossible to parse: "3pt"');
      }
    });
  });

  describe('roundHalfEven()', () => {
    it('should round ties to the even neighbour', () => {
      expect(roundHalfEven(2.5)).toBe(2);
      expect(roundHalfEven(3.5)).toBe(4);
      expect(roundHalfEven(-2.5)).toBe(-2);
    });

    it('should round other values to the nearest integer', () => {
      expect(roundHalfEven(2.4)).toBe(2);
      expect(roundHalfEven(2.6)).toBe(3);
      expect(roundHalfEven(-0.2)).toBe(0);
    });
  });

  describe('reverse conversion', () => {
    it('should convert twips back without rounding', () => {
      expect(twipsToCm(CM_TO_TWIPS)).toBeCloseTo(1, 10);
      expect(twipsToMm(CM_TO_TWIPS)).toBeCloseTo(10, 10);
      expect(twipsToInches(1440)).toBe(1);
      expect(twipsToInches(720)).toBe(0.5);
    });

    it('should format lengths for display', () => {
      expect(formatLength(1134, 'twips')).toBe('1134');
      expect(formatLength(1134, 'cm')).toBe('2.00cm');
      expect(formatLength(567, 'mm')).toBe('10.0mm');
      expect(formatLength(1440, 'in')).toBe('1.00in');
    });
  });
});
