import fs from 'fs';
import path from 'path';
import { isEqual } from 'lodash-es';
import type { RenderedShift } from './rotation.types.js';
import { FIXTURE_FILE_EXTENSION } from '../constants.js';
import { loadSelfTestFixture } from './rotation.loader.js';
import { renderSchedule } from './rotation.schedule.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-self-test');

export interface SelfTestCaseResult {
  fixture: string;
  name?: string;
  passed: boolean;
  expected?: RenderedShift[];
  actual?: RenderedShift[];
  error?: string;
}

export interface SelfTestReport {
  passed: number;
  failed: number;
  results: SelfTestCaseResult[];
}

/**
 * Expands directories into the fixture files they contain (sorted, non-recursive).
 * Plain file paths are kept as given.
 */
export function resolveFixturePaths(paths: readonly string[]): string[] {
  return paths.flatMap((fixturePath) => {
    if (!fs.existsSync(fixturePath) || !fs.statSync(fixturePath).isDirectory()) {
      return [fixturePath];
    }

    return fs
      .readdirSync(fixturePath)
      .filter((entry) => entry.endsWith(FIXTURE_FILE_EXTENSION))
      .sort()
      .map((entry) => path.join(fixturePath, entry));
  });
}

export function runSelfTestCase(fixturePath: string): SelfTestCaseResult {
  try {
    const fixture = loadSelfTestFixture(fixturePath);
    const actual = renderSchedule(fixture);
    const passed = isEqual(actual, fixture.expected);

    if (!passed) {
      logger.warn(`Self-test ${fixturePath} produced an unexpected schedule`, { expected: fixture.expected, actual });
    }

    return passed
      ? { fixture: fixturePath, name: fixture.name, passed }
      : { fixture: fixturePath, name: fixture.name, passed, expected: fixture.expected, actual };
  } catch (error) {
    logger.error(`Self-test ${fixturePath} failed with an error:`, error);
    return {
      fixture: fixturePath,
      passed: false,
      error: error instanceof Error ? error.message : 'Unknown error occurred',
    };
  }
}

/**
 * Renders every fixture and compares it with the schedule the fixture expects.
 */
export function runSelfTest(paths: readonly string[]): SelfTestReport {
  const fixturePaths = resolveFixturePaths(paths);
  const results = fixturePaths.map(runSelfTestCase);
  const passed = results.filter((result) => result.passed).length;

  logger.info(`Self-test finished: ${passed}/${results.length} fixtures passed`);

  return {
    passed,
    failed: results.length - passed,
    results,
  };
}
