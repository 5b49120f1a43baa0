import { TIMESTAMP_PATTERN } from '../constants.js';
import type { OverrideInput, ScheduleInput, SelfTestFixture } from '../rotation/rotation.types.js';

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const VALID: ValidationResult = { isValid: true };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateTimestampField(record: Record<string, unknown>, field: string, label: string): ValidationResult {
  const value = record[field];
  if (typeof value !== 'string') {
    return { isValid: false, error: `${label}.${field} is required and must be a string` };
  }
  if (!TIMESTAMP_PATTERN.test(value)) {
    return { isValid: false, error: `${label}.${field} "${value}" must look like YYYY-MM-DDTHH:MM:SSZ` };
  }
  return VALID;
}

/**
 * Checks the shape of a decoded schedule file.
 *
 * Only the shape is checked here; calendar validity of the timestamps is left to the parser,
 * which raises `MalformedTimestampError`.
 */
export function validateScheduleInput(raw: unknown, label: string = 'schedule'): ValidationResult {
  if (!isRecord(raw)) {
    return { isValid: false, error: `${label} must be an object` };
  }

  const { users, handover_interval_days: intervalDays } = raw;

  if (!Array.isArray(users) || users.length === 0) {
    return { isValid: false, error: `${label}.users must be a non-empty array` };
  }

  const badUser = users.findIndex((user) => typeof user !== 'string' || !user.trim());
  if (badUser !== -1) {
    return { isValid: false, error: `${label}.users[${badUser}] must be a non-empty string` };
  }

  const startValidation = validateTimestampField(raw, 'handover_start_at', label);
  if (!startValidation.isValid) {
    return startValidation;
  }

  if (typeof intervalDays !== 'number' || !Number.isInteger(intervalDays) || intervalDays <= 0) {
    return { isValid: false, error: `${label}.handover_interval_days must be a positive integer` };
  }

  return VALID;
}

function validateShiftLike(raw: unknown, label: string): ValidationResult {
  if (!isRecord(raw)) {
    return { isValid: false, error: `${label} must be an object` };
  }

  if (typeof raw.user !== 'string' || !raw.user.trim()) {
    return { isValid: false, error: `${label}.user must be a non-empty string` };
  }

  for (const field of ['start_at', 'end_at']) {
    const fieldValidation = validateTimestampField(raw, field, label);
    if (!fieldValidation.isValid) {
      return fieldValidation;
    }
  }

  return VALID;
}

function validateShiftList(raw: unknown, label: string): ValidationResult {
  if (!Array.isArray(raw)) {
    return { isValid: false, error: `${label} must be an array` };
  }

  for (const [i, entry] of raw.entries()) {
    const entryValidation = validateShiftLike(entry, `${label}[${i}]`);
    if (!entryValidation.isValid) {
      return entryValidation;
    }
  }

  return VALID;
}

export function validateOverridesInput(raw: unknown, label: string = 'overrides'): ValidationResult {
  return validateShiftList(raw, label);
}

export function validateSelfTestFixture(raw: unknown): ValidationResult {
  if (!isRecord(raw)) {
    return { isValid: false, error: 'fixture must be an object' };
  }

  const fixture = raw;
  if (fixture.name !== undefined && typeof fixture.name !== 'string') {
    return { isValid: false, error: 'fixture.name must be a string' };
  }

  const checks: Array<() => ValidationResult> = [
    () => validateScheduleInput(fixture.schedule, 'fixture.schedule'),
    () => (fixture.overrides === undefined ? VALID : validateOverridesInput(fixture.overrides, 'fixture.overrides')),
    () => (fixture.from === undefined ? VALID : validateTimestampField(fixture, 'from', 'fixture')),
    () => validateTimestampField(fixture, 'until', 'fixture'),
    () => validateShiftList(fixture.expected, 'fixture.expected'),
  ];

  for (const check of checks) {
    const result = check();
    if (!result.isValid) {
      return result;
    }
  }

  return VALID;
}

// Type guards over the validators, for callers that need the narrowed value

export function isScheduleInput(raw: unknown): raw is ScheduleInput {
  return validateScheduleInput(raw).isValid;
}

export function isOverrideInputList(raw: unknown): raw is OverrideInput[] {
  return validateOverridesInput(raw).isValid;
}

export function isSelfTestFixture(raw: unknown): raw is SelfTestFixture {
  return validateSelfTestFixture(raw).isValid;
}
