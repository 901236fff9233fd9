import { format, isValid } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { DataShapeError } from './errors';

/**
 * Display format shared by the uploads listing and the CSV export
 * (`YYYY-MM-DD HH:MM:SS`, UTC).
 */
export const DISPLAY_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Format a point in time for display, always in UTC
 */
export function formatTimestamp(date: Date): string {
  return format(new UTCDate(date.getTime()), DISPLAY_TIMESTAMP_FORMAT);
}

/**
 * Convert a byte count to kilobytes rounded to two decimal places
 */
export function bytesToKilobytes(bytes: number): number {
  return Math.round((bytes / 1024) * 100) / 100;
}

/**
 * Reinterpret a stored timestamp attribute as integer epoch seconds and
 * format it for display.
 *
 * Numbers are truncated towards zero; strings must hold an integer. Values
 * outside the range a `Date` can represent are rejected like malformed ones.
 *
 * @param value Raw `timestamp` attribute of a detection record
 * @param recordIndex Position of the record in the scanned page, for the error
 * @throws DataShapeError if the value is missing, not an integer or out of range
 */
export function formatEpochSeconds(value: unknown, recordIndex: number): string {
  const seconds = parseEpochSeconds(value);
  const date = seconds === undefined ? undefined : new Date(seconds * 1000);
  if (date === undefined || !isValid(date)) {
    throw new DataShapeError(
      recordIndex,
      value,
      `Record ${recordIndex} has an invalid timestamp: ${describe(value)}`
    );
  }
  return formatTimestamp(date);
}

function parseEpochSeconds(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    return parseInt(value, 10);
  }
  return undefined;
}

function describe(value: unknown): string {
  return value === undefined ? 'missing' : JSON.stringify(value) ?? String(value);
}
