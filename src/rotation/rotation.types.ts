import type { DateTime } from 'luxon';

/**
 * Periodic handover rule for an on-call rotation.
 *
 * Shifts start at `anchorStart` and hand over every `intervalDays` days, cycling through
 * `users` in order.
 */
export interface RotationRule {
  anchorStart: DateTime;
  /** Positive integer */
  intervalDays: number;
  /** Non-empty, assigned round-robin */
  users: readonly string[];
}

/** One contiguous span of on-call responsibility. Always `start < end`. */
export interface Shift {
  readonly user: string;
  readonly start: DateTime;
  readonly end: DateTime;
}

/**
 * A manually requested span that supersedes the rotation.
 * It appears in rendered output exactly as given.
 */
export type OverrideInterval = Shift;

/** Half-open window `[from, until)`. */
export interface ScheduleWindow {
  from?: DateTime;
  until: DateTime;
}

/* ====================================================================
 * Wire shapes (JSON files and rendered output)
 * ==================================================================== */

export interface ScheduleInput {
  users: string[];
  handover_start_at: string;
  handover_interval_days: number;
}

export interface OverrideInput {
  user: string;
  start_at: string;
  end_at: string;
}

export interface RenderedShift {
  user: string;
  start_at: string;
  end_at: string;
}

/** Everything needed to render a schedule, still in wire form. */
export interface RenderScheduleRequest {
  schedule: ScheduleInput;
  overrides?: OverrideInput[];
  from?: string;
  until: string;
}

export interface SelfTestFixture extends RenderScheduleRequest {
  name?: string;
  expected: RenderedShift[];
}

export interface UserCoverage {
  user: string;
  shifts: number;
  total_hours: number;
}
