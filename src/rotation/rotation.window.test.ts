import { describe, it, expect } from 'vitest';
import { clipShifts } from './rotation.window.js';
import type { Shift } from './rotation.types.js';
import { describeShifts, jan, shift } from '../../test/fixtures/test-data.js';

function twoWeeks(): Shift[] {
  return [shift('alice', jan(1), jan(8)), shift('bob', jan(8), jan(15))];
}

describe('clipShifts', () => {
  it('should leave shifts inside the window alone', () => {
    const shifts = twoWeeks();

    expect(clipShifts(shifts, jan(1), jan(15))).toEqual(shifts);
  });

  it('should trim a shift the window starts inside', () => {
    expect(describeShifts(clipShifts(twoWeeks(), jan(4), jan(15)))).toEqual([
      ['alice', '2023-01-04T00:00:00Z', '2023-01-08T00:00:00Z'],
      ['bob', '2023-01-08T00:00:00Z', '2023-01-15T00:00:00Z'],
    ]);
  });

  it('should trim a shift the window ends inside', () => {
    expect(describeShifts(clipShifts(twoWeeks(), jan(1), jan(10, 12)))).toEqual([
      ['alice', '2023-01-01T00:00:00Z', '2023-01-08T00:00:00Z'],
      ['bob', '2023-01-08T00:00:00Z', '2023-01-10T12:00:00Z'],
    ]);
  });

  it('should trim both ends of a single shift', () => {
    expect(describeShifts(clipShifts(twoWeeks(), jan(9), jan(10)))).toEqual([
      ['bob', '2023-01-09T00:00:00Z', '2023-01-10T00:00:00Z'],
    ]);
  });

  it('should drop shifts ending at the window start and starting at the window end', () => {
    const shifts = [...twoWeeks(), shift('alice', jan(15), jan(22))];

    expect(describeShifts(clipShifts(shifts, jan(8), jan(15)))).toEqual([
      ['bob', '2023-01-08T00:00:00Z', '2023-01-15T00:00:00Z'],
    ]);
  });

  it('should return an empty list for an empty or inverted window', () => {
    expect(clipShifts(twoWeeks(), jan(5), jan(5))).toEqual([]);
    expect(clipShifts(twoWeeks(), jan(10), jan(3))).toEqual([]);
  });

  it('should return an empty list when nothing reaches the window', () => {
    expect(clipShifts(twoWeeks(), jan(20), jan(25))).toEqual([]);
    expect(clipShifts(twoWeeks().slice(1), jan(1), jan(5))).toEqual([]);
  });

  it('should return an empty list when the window falls in a gap', () => {
    const gapped = [shift('alice', jan(1), jan(3)), shift('bob', jan(10), jan(12))];

    expect(clipShifts(gapped, jan(4), jan(9))).toEqual([]);
  });

  it('should be idempotent', () => {
    const once = clipShifts(twoWeeks(), jan(4), jan(10));

    expect(clipShifts(once, jan(4), jan(10))).toEqual(once);
  });

  it('should not modify its input', () => {
    const shifts = twoWeeks();
    const before = describeShifts(shifts);

    clipShifts(shifts, jan(4), jan(10));

    expect(describeShifts(shifts)).toEqual(before);
  });
});
