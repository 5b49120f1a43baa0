export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

/** Logs per-user coverage totals after every render, even without --diagnostics */
export const ALWAYS_PRINT_DIAGNOSTICS =
  process.env.ALWAYS_PRINT_DIAGNOSTICS === 'true' || process.env.ALWAYS_PRINT_DIAGNOSTICS === '1';

/**
 * Resolves the schedule and overrides file paths, preferring values given on the command line
 * over ROTATION_SCHEDULE_PATH / ROTATION_OVERRIDES_PATH, and reports the variables that would
 * have been needed.
 */
export function resolveInputPaths(cliPaths: { schedule?: string; overrides?: string }): {
  valid: boolean;
  missing: string[];
  schedulePath?: string;
  overridesPath?: string;
} {
  const { ROTATION_SCHEDULE_PATH, ROTATION_OVERRIDES_PATH } = process.env;
  const missing: string[] = [];
  const schedulePath = cliPaths.schedule || ROTATION_SCHEDULE_PATH || undefined;
  const overridesPath = cliPaths.overrides || ROTATION_OVERRIDES_PATH || undefined;

  if (!schedulePath) {
    missing.push('ROTATION_SCHEDULE_PATH');
  }

  return {
    valid: missing.length === 0,
    missing,
    schedulePath,
    overridesPath,
  };
}
