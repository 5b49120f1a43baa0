import type { DateTime } from 'luxon';
import type { Shift } from './rotation.types.js';

/**
 * Restricts an ordered, non-overlapping shift list to `[from, until)`.
 *
 * Shifts wholly outside the window are dropped; the first and last remaining shifts are
 * truncated to the window edges. Returns a new list. An empty or inverted window yields `[]`.
 */
export function clipShifts(shifts: readonly Shift[], from: DateTime, until: DateTime): Shift[] {
  if (until <= from) {
    return [];
  }

  const first = shifts.findIndex((s) => s.end > from);
  if (first === -1) {
    return [];
  }

  let last = shifts.length - 1;
  while (last >= first && shifts[last].start >= until) {
    last--;
  }

  const clipped = shifts.slice(first, last + 1);
  if (clipped.length === 0) {
    return clipped;
  }

  const head = clipped[0];
  if (head.start < from) {
    clipped[0] = { ...head, start: from };
  }

  const tailIndex = clipped.length - 1;
  const tail = clipped[tailIndex];
  if (tail.end > until) {
    clipped[tailIndex] = { ...tail, end: until };
  }

  return clipped;
}
