import { sortBy } from 'lodash-es';
import type { OverrideInterval, Shift } from './rotation.types.js';
import { InvalidIntervalError, OverlappingOverridesError } from './rotation.errors.js';
import { formatTimestamp } from '../utils/date.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-overrides');

/**
 * Sorts overrides by start time and rejects lists the merge cannot handle:
 * empty or inverted intervals, and overrides that overlap one another.
 *
 * Overlapping overrides are an error rather than "last one wins" so that a typo in an
 * overrides file never silently hands a shift to the wrong person.
 */
export function prepareOverrides(overrides: readonly OverrideInterval[]): OverrideInterval[] {
  const sorted = sortBy(overrides, (override) => override.start.toMillis());

  sorted.forEach((override, i) => {
    if (override.start >= override.end) {
      throw new InvalidIntervalError(
        `Override for ${override.user} must start before it ends ` +
          `(${formatTimestamp(override.start)} - ${formatTimestamp(override.end)})`,
      );
    }

    const previous = i > 0 ? sorted[i - 1] : undefined;
    if (previous && previous.end > override.start) {
      throw new OverlappingOverridesError(
        `Override for ${previous.user} (${formatTimestamp(previous.start)} - ${formatTimestamp(previous.end)}) ` +
          `overlaps override for ${override.user} (${formatTimestamp(override.start)} - ${formatTimestamp(override.end)})`,
      );
    }
  });

  return sorted;
}

/**
 * Merges overrides into a rotation so that overrides always win.
 *
 * Both inputs must be ordered by start time and free of internal overlaps (see
 * `prepareOverrides`). Shifts are trimmed, split around an override, or dropped when an
 * override covers them entirely; overrides are emitted verbatim. Input values are never
 * modified, trimmed pieces are new objects.
 */
export function mergeOverrides(shifts: readonly Shift[], overrides: readonly OverrideInterval[]): Shift[] {
  const merged: Shift[] = [];

  let shiftIndex = 0;
  let overrideIndex = 0;
  // The part of shifts[shiftIndex] not yet emitted or superseded
  let current: Shift | undefined = shifts[0];

  const nextShift = () => {
    shiftIndex++;
    current = shiftIndex < shifts.length ? shifts[shiftIndex] : undefined;
  };

  while (current && overrideIndex < overrides.length) {
    const override = overrides[overrideIndex];

    if (current.end <= override.start) {
      // Shift entirely before the override
      merged.push(current);
      nextShift();
    } else if (current.start >= override.end) {
      // Override entirely before the shift
      merged.push(override);
      overrideIndex++;
    } else if (current.start >= override.start && current.end <= override.end) {
      // Override covers the whole shift
      nextShift();
    } else if (current.start < override.start && current.end <= override.end) {
      // Override covers the tail
      merged.push({ ...current, end: override.start });
      nextShift();
    } else if (current.start >= override.start) {
      // Override covers the head; the rest of the shift is checked against the next override
      merged.push(override);
      overrideIndex++;
      current = { ...current, start: override.end };
    } else {
      // Override strictly inside the shift: head, override, then the tail carries on
      merged.push({ ...current, end: override.start });
      merged.push(override);
      overrideIndex++;
      current = { ...current, start: override.end };
    }
  }

  if (current) {
    merged.push(current);
    merged.push(...shifts.slice(shiftIndex + 1));
  }
  merged.push(...overrides.slice(overrideIndex));

  logger.debug(`Merged ${overrides.length} overrides into ${shifts.length} shifts`, { result: merged.length });

  return merged;
}
