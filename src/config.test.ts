import { describe, it, expect, afterEach, vi } from 'vitest';
import { resolveInputPaths } from './config.js';

describe('resolveInputPaths', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should prefer paths given on the command line', () => {
    vi.stubEnv('ROTATION_SCHEDULE_PATH', '/env/schedule.json');
    vi.stubEnv('ROTATION_OVERRIDES_PATH', '/env/overrides.json');

    expect(resolveInputPaths({ schedule: '/cli/schedule.json', overrides: '/cli/overrides.json' })).toEqual({
      valid: true,
      missing: [],
      schedulePath: '/cli/schedule.json',
      overridesPath: '/cli/overrides.json',
    });
  });

  it('should fall back to the environment', () => {
    vi.stubEnv('ROTATION_SCHEDULE_PATH', '/env/schedule.json');
    vi.stubEnv('ROTATION_OVERRIDES_PATH', '/env/overrides.json');

    const paths = resolveInputPaths({});

    expect(paths.schedulePath).toBe('/env/schedule.json');
    expect(paths.overridesPath).toBe('/env/overrides.json');
  });

  it('should report a missing schedule path', () => {
    vi.stubEnv('ROTATION_SCHEDULE_PATH', '');
    vi.stubEnv('ROTATION_OVERRIDES_PATH', '');

    const paths = resolveInputPaths({});

    expect(paths.valid).toBe(false);
    expect(paths.missing).toEqual(['ROTATION_SCHEDULE_PATH']);
    expect(paths.overridesPath).toBeUndefined();
  });
});
