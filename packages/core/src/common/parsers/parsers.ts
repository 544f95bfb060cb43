/**
 * @fileoverview Parsers - String to Value Conversion
 *
 * @packageDocumentation
 * @module @registry-di/core/common/parsers
 * @license Apache-2.0
 *
 * Parsing helpers for configuration values. None of them throw: every parser
 * returns a `Result` whose failure message says what was wrong.
 *
 * @version 1.0.0
 */

import { Result } from '../result';

const INVALID_FORMAT = 'Invalid format';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Whole days, e.g. `5` */
const DAYS_PATTERN = /^\d+$/;

/** `[d.]hh:mm[:ss[.fff]]`, hours 0-23 */
const CLOCK_PATTERN = /^(?:(\d+)\.)?([01]?\d|2[0-3]):([0-5]?\d)(?::([0-5]?\d(?:\.\d+)?))?$/;

/** One `<value><unit>` segment of a compact duration such as `1h30m`. */
const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)?([^\d\s]*)/y;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const UNIT_MILLISECONDS = new Map<string, number>([
  ['d', MS_PER_DAY],
  ['h', MS_PER_HOUR],
  ['m', MS_PER_MINUTE],
  ['s', MS_PER_SECOND],
  ['ms', 1],
]);

/**
 * Parse a whole number within the safe integer range.
 *
 * @example
 * ```typescript
 * parseInteger(' 42 ').value; // 42
 * parseInteger('4.2').failure?.message; // 'Invalid format'
 * ```
 */
export function parseInteger(text: string | null | undefined): Result<number> {
  const trimmed = text?.trim() ?? '';
  if (!INTEGER_PATTERN.test(trimmed)) {
    return Result.fail<number>(INVALID_FORMAT);
  }

  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? Result.ok(value) : Result.fail<number>(INVALID_FORMAT);
}

/**
 * Parse a finite decimal number (exponent notation allowed).
 */
export function parseNumber(text: string | null | undefined): Result<number> {
  const trimmed = text?.trim() ?? '';
  if (!NUMBER_PATTERN.test(trimmed)) {
    return Result.fail<number>(INVALID_FORMAT);
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? Result.ok(value) : Result.fail<number>(INVALID_FORMAT);
}

/**
 * Parse `true` or `false`, ignoring case and surrounding whitespace.
 */
export function parseBoolean(text: string | null | undefined): Result<boolean> {
  switch (text?.trim().toLowerCase()) {
    case 'true':
      return Result.ok(true);
    case 'false':
      return Result.ok(false);
    default:
      return Result.fail<boolean>(INVALID_FORMAT);
  }
}

/**
 * Parse a duration into milliseconds.
 *
 * @remarks
 * Three notations are accepted, tried in this order:
 *
 * - whole days, e.g. `5`
 * - clock form `[d.]hh:mm[:ss[.fff]]` with hours 0-23, e.g. `01:30` or
 *   `2.00:00:05`
 * - compact form, a run of `<value><unit>` segments with units `d`, `h`, `m`,
 *   `s` and `ms` (case-insensitive, whitespace ignored), e.g. `1h 30m` or
 *   `1.5s`
 *
 * Input that fits neither of the first two falls through to the compact form,
 * so `25:00` fails with `Invalid unit ':'`.
 *
 * @example
 * ```typescript
 * parseDuration('1h30m').value; // 5_400_000
 * parseDuration('00:00:05').value; // 5_000
 * parseDuration('5').value; // 432_000_000
 * parseDuration('1.5').failure?.message; // 'Both value and unit must be given'
 * ```
 */
export function parseDuration(text: string | null | undefined): Result<number> {
  const trimmed = text?.trim() ?? '';
  if (trimmed.length === 0) {
    return Result.fail<number>('String is empty');
  }

  if (DAYS_PATTERN.test(trimmed)) {
    return Result.ok(Number(trimmed) * MS_PER_DAY);
  }

  const clock = CLOCK_PATTERN.exec(trimmed);
  if (clock) {
    const [, days = '0', hours = '0', minutes = '0', seconds = '0'] = clock;
    return Result.ok(
      Number(days) * MS_PER_DAY +
        Number(hours) * MS_PER_HOUR +
        Number(minutes) * MS_PER_MINUTE +
        Math.round(Number(seconds) * MS_PER_SECOND),
    );
  }

  const compact = trimmed.replace(/\s+/g, '');
  let total = 0;
  let position = 0;

  while (position < compact.length) {
    SEGMENT_PATTERN.lastIndex = position;
    const match = SEGMENT_PATTERN.exec(compact);
    const segment = match?.[0] ?? '';
    const value = match?.[1];
    const unit = match?.[2] ?? '';

    if (segment.length === 0 || value === undefined || unit.length === 0) {
      return Result.fail<number>('Both value and unit must be given');
    }

    const factor = UNIT_MILLISECONDS.get(unit.toLowerCase());
    if (factor === undefined) {
      return Result.fail<number>(`Invalid unit '${unit}'`);
    }

    total += Number(value) * factor;
    position += segment.length;
  }

  return Result.ok(total);
}
