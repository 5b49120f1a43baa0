import type { DateTime } from 'luxon';
import type {
  OverrideInput,
  OverrideInterval,
  RenderScheduleRequest,
  RenderedShift,
  RotationRule,
  ScheduleInput,
  Shift,
} from './rotation.types.js';
import { generateShifts } from './rotation.generation.js';
import { mergeOverrides, prepareOverrides } from './rotation.overrides.js';
import { clipShifts } from './rotation.window.js';
import { findShiftAt } from './rotation.utils.js';
import { formatTimestamp, parseOptionalTimestamp, parseTimestamp } from '../utils/date.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-schedule');

/**
 * Computes the on-call schedule for `[from, until)`: rotation shifts, with overrides taking
 * precedence, clipped to the window.
 *
 * @param from - Defaults to the rule's anchor
 */
export function computeSchedule(
  rule: RotationRule,
  overrides: readonly OverrideInterval[] | undefined,
  from: DateTime | undefined,
  until: DateTime,
): Shift[] {
  const windowStart = from ?? rule.anchorStart;

  const rotation = generateShifts(rule, { from: windowStart, until });

  // An empty list would merge to the same result, skip the pass entirely
  const merged = overrides && overrides.length > 0 ? mergeOverrides(rotation, prepareOverrides(overrides)) : rotation;

  return clipShifts(merged, windowStart, until);
}

export function toRotationRule(schedule: ScheduleInput): RotationRule {
  return {
    anchorStart: parseTimestamp(schedule.handover_start_at, 'handover_start_at'),
    intervalDays: schedule.handover_interval_days,
    users: [...schedule.users],
  };
}

export function toOverrideIntervals(overrides: readonly OverrideInput[]): OverrideInterval[] {
  return overrides.map((override, i) => ({
    user: override.user,
    start: parseTimestamp(override.start_at, `overrides[${i}].start_at`),
    end: parseTimestamp(override.end_at, `overrides[${i}].end_at`),
  }));
}

export function toRenderedShift(shift: Shift): RenderedShift {
  return {
    user: shift.user,
    start_at: formatTimestamp(shift.start),
    end_at: formatTimestamp(shift.end),
  };
}

/**
 * Computes a schedule from wire values, parsing every timestamp on the way in.
 */
export function resolveSchedule(request: RenderScheduleRequest): Shift[] {
  const rule = toRotationRule(request.schedule);
  const overrides = request.overrides ? toOverrideIntervals(request.overrides) : undefined;
  const from = parseOptionalTimestamp(request.from, 'from');
  const until = parseTimestamp(request.until, 'until');

  const shifts = computeSchedule(rule, overrides, from, until);

  logger.info(`Computed ${shifts.length} shifts`, {
    from: request.from ?? request.schedule.handover_start_at,
    until: request.until,
    overrides: overrides?.length ?? 0,
  });

  return shifts;
}

/** `resolveSchedule`, formatted back into wire form. */
export function renderSchedule(request: RenderScheduleRequest): RenderedShift[] {
  return resolveSchedule(request).map(toRenderedShift);
}

/**
 * The shift covering `at`, rendered from the rule's anchor so the rotation order matches a full
 * render. Returns undefined when nobody is on call.
 */
export function resolveShiftAt(
  schedule: ScheduleInput,
  overrides: readonly OverrideInput[] | undefined,
  at: string,
): Shift | undefined {
  const rule = toRotationRule(schedule);
  const intervals = overrides ? toOverrideIntervals(overrides) : undefined;
  const instant = parseTimestamp(at, 'at');

  // A covering rotation shift ends within one interval of `at`; an override may run longer
  const until = (intervals ?? []).reduce(
    (latest, o) => (o.end > latest ? o.end : latest),
    instant.plus({ days: rule.intervalDays }),
  );

  return findShiftAt(computeSchedule(rule, intervals, undefined, until), instant);
}
