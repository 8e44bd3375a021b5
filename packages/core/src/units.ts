/**
 * Unit conversion for fio option strings such as "50M" or "10s".
 */

import { UnitLookupError, ValueParseError } from './errors.js';

export type ConversionTable = ReadonlyMap<string, number>;

/**
 * File sizes, normalized to kilobytes (decimal multiples, as fio reports them)
 */
export const FILESIZE_TO_KB: ConversionTable = new Map([
  ['b', 0.001],
  ['k', 1],
  ['kb', 1],
  ['m', 10 ** 3],
  ['mb', 10 ** 3],
  ['g', 10 ** 6],
  ['gb', 10 ** 6],
  ['t', 10 ** 9],
  ['tb', 10 ** 9],
  ['p', 10 ** 12],
  ['pb', 10 ** 12],
]);

/**
 * Durations, normalized to milliseconds
 */
export const TIME_TO_MS: ConversionTable = new Map([
  ['us', 10 ** -3],
  ['ms', 1],
  ['s', 1000],
  ['m', 60 * 1000],
  ['h', 3600 * 1000],
  ['d', 24 * 3600 * 1000],
]);

// Bare durations are seconds; a bare size has no unit and fails the lookup
export const TIME_DEFAULT_UNIT = 's';

const TOKEN_PATTERN = /[0-9]+|[A-Za-z]+/g;
const DIGITS = /^[0-9]+$/;

/**
 * Converts a value[+unit] string to the unit of `table`.
 *
 * Only a string that splits into exactly one number and one unit carries its
 * own unit; anything else is read with `defaultUnit`.
 *
 * @example convertValue('5s', TIME_TO_MS) // 5000
 * @throws UnitLookupError when the unit is not in the table
 * @throws ValueParseError when the string has no leading numerical part
 */
export function convertValue(value: string, table: ConversionTable, defaultUnit = ''): number {
  const tokens = value.match(TOKEN_PATTERN) ?? [];
  const [num, suffix] = tokens;
  if (num === undefined) {
    throw new ValueParseError(value);
  }

  const unit = tokens.length === 2 && suffix !== undefined ? suffix : defaultUnit;
  const factor = table.get(unit.toLowerCase());
  if (factor === undefined) {
    throw new UnitLookupError(unit, value);
  }

  if (!DIGITS.test(num)) {
    throw new ValueParseError(value);
  }

  return Number.parseInt(num, 10) * factor;
}
