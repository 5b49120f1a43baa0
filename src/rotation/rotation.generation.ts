import type { DateTime } from 'luxon';
import type { RotationRule, ScheduleWindow, Shift } from './rotation.types.js';
import { EmptyUserSetError, NonPositiveIntervalError } from './rotation.errors.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-generation');

export function assertValidRotationRule(rule: RotationRule): void {
  if (rule.users.length === 0) {
    throw new EmptyUserSetError();
  }

  // Anything else would never advance past the anchor
  if (!Number.isInteger(rule.intervalDays) || rule.intervalDays <= 0) {
    throw new NonPositiveIntervalError(rule.intervalDays);
  }
}

/**
 * Expands a rotation rule into consecutive shifts from its anchor until `window.until`.
 *
 * Periods that end strictly before `window.from` are skipped, and skipped periods do NOT
 * consume a rotation slot: the first emitted shift always goes to `users[0]`. Which user is
 * on call for a given period therefore depends on where the window starts, not only on the
 * anchor.
 *
 * The last shift may run past `until`; clipping happens downstream.
 */
export function generateShifts(rule: RotationRule, window: ScheduleWindow): Shift[] {
  assertValidRotationRule(rule);

  const lowerBound: DateTime = window.from ?? rule.anchorStart;
  const shifts: Shift[] = [];

  let start = rule.anchorStart;
  let index = 0;
  let skipped = 0;

  while (start < window.until) {
    const end = start.plus({ days: rule.intervalDays });

    if (end < lowerBound) {
      skipped++;
      start = end;
      continue;
    }

    shifts.push({ user: rule.users[index % rule.users.length], start, end });
    index++;
    start = end;
  }

  logger.debug(`Generated ${shifts.length} shifts (${skipped} periods before the window skipped)`, {
    users: rule.users.length,
    intervalDays: rule.intervalDays,
  });

  return shifts;
}
