import { ParseError } from '../errors/index.js';
import type { LengthInput, LengthUnit } from '../types/index.js';

export const CM_TO_TWIPS = 566.929133858;
export const MM_TO_TWIPS = CM_TO_TWIPS / 10;
export const IN_TO_TWIPS = 1440;

export const TWIPS_TO_CM = 1 / CM_TO_TWIPS;
export const TWIPS_TO_IN = 1 / IN_TO_TWIPS;

/**
 * Returned by parseLength for an empty literal
 */
export const UNSET_LENGTH = -1;

function unitRatio(suffix: string): number {
  switch (suffix) {
    case 'cm':
      return CM_TO_TWIPS;
    case 'mm':
      return MM_TO_TWIPS;
    default:
      return IN_TO_TWIPS;
  }
}

const DIGITS = /^\d+$/;
const MEASURE = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)(cm|mm|in)$/;

/**
 * Round half to even, so x.5 lands on the even neighbour.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Parse a length literal into twips.
 *
 * - `""` gives {@link UNSET_LENGTH}
 * - `"720"` is already twips
 * - `"2.5cm"`, `"25mm"`, `"1in"` are converted and rounded
 *
 * @throws ParseError for any other form, or a value too large to represent
 */
export function parseLength(input: LengthInput): number {
  if (typeof input === 'number') {
    if (Number.isInteger(input) && input >= 0) {
      return input;
    }
    throw new ParseError(`Length impossible to parse: "${input}"`, { input });
  }

  if (input === '') {
    return UNSET_LENGTH;
  }

  let twips = NaN;
  if (DIGITS.test(input)) {
    twips = parseInt(input, 10);
  } else {
    const match = MEASURE.exec(input);
    if (match) {
      twips = roundHalfEven(parseFloat(match[1]) * unitRatio(match[2]));
    }
  }

  if (!Number.isFinite(twips)) {
    throw new ParseError(
      `Length impossible to parse: "${input}"`,
      { input },
      ['Use a whole number of twips or a number followed by cm, mm or in (e.g. "2.5cm")']
    );
  }

  return twips;
}

export function twipsToCm(twips: number): number {
  return twips * TWIPS_TO_CM;
}

export function twipsToMm(twips: number): number {
  return twips * TWIPS_TO_CM * 10;
}

export function twipsToInches(twips: number): number {
  return twips * TWIPS_TO_IN;
}

/**
 * Human-readable length, e.g. `formatLength(1134, 'cm')` → `"2.00cm"`
 */
export function formatLength(twips: number, unit: LengthUnit): string {
  switch (unit) {
    case 'twips':
      return `${twips}`;
    case 'cm':
      return `${twipsToCm(twips).toFixed(2)}cm`;
    case 'mm':
      return `${twipsToMm(twips).toFixed(1)}mm`;
    case 'in':
      return `${twipsToInches(twips).toFixed(2)}in`;
  }
}
