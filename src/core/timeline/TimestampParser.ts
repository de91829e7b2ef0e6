/**
 * TimestampParser - turns `YYYY-MM-DD-HH:MM:SS.<ext>` file names into naive
 * calendar timestamps.
 *
 * The literal pattern is the contract between file ingestion and the
 * timeline: anything else is rejected with a ParseError naming the file.
 * There is no fallback (file mtime, epoch zero, partial matches).
 */

import { ParseError } from '../errors';
import type { NaiveTimestamp, TimestampedFile } from '../types/timeline';

const STEM_PATTERN = /^(\d{4})-(\d{2})-(\d{2})-(\d{2}):(\d{2}):(\d{2})$/;

const SECONDS_PER_DAY = 86_400;

export const TIMESTAMP_PATTERN_DESCRIPTION = 'YYYY-MM-DD-HH:MM:SS';

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/**
 * Days since 1970-01-01 in the proleptic Gregorian calendar, computed from
 * the civil date alone (no Date object, no timezone).
 */
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const dayOfYear = Math.floor((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1;
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * 146_097 + dayOfEra - 719_468;
}

/** Strip the final extension: `2024-03-01-09:15:00.jpg` -> `2024-03-01-09:15:00` */
export function fileStem(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(0, dot) : filename;
}

/**
 * Build a NaiveTimestamp from components, validating every range.
 * `label` is the name reported in the ParseError.
 */
export function createTimestamp(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  label = `${year}-${month}-${day}-${hour}:${minute}:${second}`
): NaiveTimestamp {
  const check = (name: string, value: number, min: number, max: number): void => {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ParseError(label, `${name} ${value} is out of range (${min}-${max})`);
    }
  };

  check('year', year, 0, 9999);
  check('month', month, 1, 12);
  check('day', day, 1, daysInMonth(year, month));
  check('hour', hour, 0, 23);
  check('minute', minute, 0, 59);
  check('second', second, 0, 59);

  const epochSeconds =
    daysFromCivil(year, month, day) * SECONDS_PER_DAY + hour * 3600 + minute * 60 + second;

  return Object.freeze({ year, month, day, hour, minute, second, epochSeconds });
}

/**
 * Parse a file name whose stem is exactly `YYYY-MM-DD-HH:MM:SS`.
 *
 * @throws ParseError when the pattern does not match or a component is out of range
 */
export function parseTimestamp(filename: string): TimestampedFile {
  const match = STEM_PATTERN.exec(fileStem(filename));
  if (!match) {
    throw new ParseError(filename, `expected ${TIMESTAMP_PATTERN_DESCRIPTION}.<ext>`);
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const absoluteTime = createTimestamp(
    year ?? NaN,
    month ?? NaN,
    day ?? NaN,
    hour ?? NaN,
    minute ?? NaN,
    second ?? NaN,
    filename
  );

  return Object.freeze({ absoluteTime, originalName: filename });
}

/** Result of parsing a batch: bad names are collected, not thrown */
export interface ParseBatchResult {
  parsed: TimestampedFile[];
  errors: ParseError[];
}

/**
 * Parse every name in a batch. A malformed name is recorded in `errors` and
 * left out of `parsed`; the rest of the batch is unaffected. Input order is
 * preserved in both lists.
 */
export function parseFilenames(filenames: readonly string[]): ParseBatchResult {
  const result: ParseBatchResult = { parsed: [], errors: [] };
  for (const name of filenames) {
    try {
      result.parsed.push(parseTimestamp(name));
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      result.errors.push(error);
    }
  }
  return result;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Format back to the file name contract (without extension). */
export function formatTimestamp(ts: NaiveTimestamp): string {
  return (
    `${pad(ts.year, 4)}-${pad(ts.month, 2)}-${pad(ts.day, 2)}` +
    `-${pad(ts.hour, 2)}:${pad(ts.minute, 2)}:${pad(ts.second, 2)}`
  );
}

/** Seconds from `from` to `to` (negative when `to` is earlier). */
export function secondsBetween(from: NaiveTimestamp, to: NaiveTimestamp): number {
  return to.epochSeconds - from.epochSeconds;
}

export function compareTimestamps(a: NaiveTimestamp, b: NaiveTimestamp): number {
  return a.epochSeconds - b.epochSeconds;
}
