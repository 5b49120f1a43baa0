import { DateTime } from 'luxon';
import { ROTATION_ZONE, TIMESTAMP_FORMAT, TIMESTAMP_PATTERN } from '../constants.js';
import { MalformedTimestampError } from '../rotation/rotation.errors.js';

/**
 * Parses a wire timestamp (`2023-01-01T00:00:00Z`) into a UTC DateTime.
 * @param field - Name reported in the error when the value is rejected
 */
export function parseTimestamp(value: string, field?: string): DateTime {
  if (!TIMESTAMP_PATTERN.test(value)) {
    throw new MalformedTimestampError(value, field);
  }

  const parsed = DateTime.fromFormat(value, TIMESTAMP_FORMAT, { zone: ROTATION_ZONE });
  if (!parsed.isValid) {
    // Right shape, impossible calendar value (e.g. February 30th)
    throw new MalformedTimestampError(value, field);
  }

  return parsed;
}

export function formatTimestamp(value: DateTime): string {
  return value.setZone(ROTATION_ZONE).toFormat(TIMESTAMP_FORMAT);
}

export function parseOptionalTimestamp(value: string | undefined, field?: string): DateTime | undefined {
  return value === undefined ? undefined : parseTimestamp(value, field);
}

export function hoursBetween(start: DateTime, end: DateTime): number {
  return end.diff(start, 'hours').hours;
}
