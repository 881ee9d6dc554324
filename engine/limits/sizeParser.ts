/**
 * Parses human-readable size strings ("80M", "2g", "512") into byte counts.
 * Units are binary (powers of 1024) and case-insensitive.
 */

export class SizeParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SizeParseError';
  }
}

const UNITS: Readonly<Record<string, number>> = {
  '': 1,
  k: 1024 ** 1,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
  p: 1024 ** 5,
  e: 1024 ** 6,
  z: 1024 ** 7,
  y: 1024 ** 8,
};

/**
 * Convert a size string to bytes.
 *
 * @param size - e.g. "80M", "1.5k", "1024"
 * @returns byte count, rounded to the nearest integer
 * @throws SizeParseError for empty input, a missing number or an unknown unit
 */
export function parseSize(size: string): number {
  if (typeof size !== 'string' || size.trim() === '') {
    throw new SizeParseError('Size must be a non-empty string');
  }

  const numberPart = size.replace(/[^0-9.]/g, '');
  const unitPart = size.replace(/[^a-zA-Z]/g, '').toLowerCase();

  const value = Number(numberPart);
  if (numberPart === '' || Number.isNaN(value)) {
    throw new SizeParseError(`Invalid size format: no valid number found in '${size}'`);
  }

  const multiplier = UNITS[unitPart];
  if (multiplier === undefined) {
    throw new SizeParseError(`Invalid unit '${unitPart}' in size string '${size}'`);
  }

  return Math.round(value * multiplier);
}

/**
 * Accepts either a raw byte count or a size string.
 */
export function toBytes(size: string | number): number {
  if (typeof size === 'number') {
    if (!Number.isFinite(size) || size < 0) {
      throw new SizeParseError(`Invalid byte count: ${size}`);
    }
    return Math.round(size);
  }
  return parseSize(size);
}
