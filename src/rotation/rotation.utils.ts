import type { DateTime } from 'luxon';
import { groupBy, uniq } from 'lodash-es';
import type { Shift, UserCoverage } from './rotation.types.js';
import { hoursBetween } from '../utils/date.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-utils');

/**
 * Totals shift count and hours per user, in order of each user's first shift.
 */
export function summarizeCoverage(shifts: readonly Shift[]): UserCoverage[] {
  const shiftsByUser = groupBy(shifts, 'user');

  // Object key order would put integer-like user names first
  return uniq(shifts.map((s) => s.user)).map((user) => {
    const userShifts = shiftsByUser[user];
    return {
      user,
      shifts: userShifts.length,
      total_hours: userShifts.reduce((sum, s) => sum + hoursBetween(s.start, s.end), 0),
    };
  });
}

export function printScheduleDiagnostics(shifts: readonly Shift[]): UserCoverage[] {
  const coverage = summarizeCoverage(shifts);

  const logLines = ['=== ROTATION COVERAGE ==='];
  for (const { user, shifts: shiftCount, total_hours } of coverage) {
    logLines.push(`👤 ${user}`);
    logLines.push(`  Shifts: ${shiftCount}`);
    logLines.push(`  Hours: ${total_hours}`);
    logLines.push('');
  }

  const totalHours = coverage.reduce((sum, c) => sum + c.total_hours, 0);
  const avgHoursPerUser = coverage.length > 0 ? totalHours / coverage.length : 0;

  logLines.push('=== SUMMARY ===');
  logLines.push(`Total Shifts: ${shifts.length}`);
  logLines.push(`Total Hours: ${totalHours}`);
  logLines.push(`Users: ${coverage.length}`);
  logLines.push(`Average Hours per User: ${avgHoursPerUser.toFixed(1)}`);

  logger.info(logLines.join('\n'), { coverage });

  return coverage;
}

/** The shift covering `at` (start inclusive, end exclusive), if any. */
export function findShiftAt(shifts: readonly Shift[], at: DateTime): Shift | undefined {
  return shifts.find((s) => s.start <= at && at < s.end);
}
