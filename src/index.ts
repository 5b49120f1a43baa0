#!/usr/bin/env node
import 'dotenv/config';

import fs from 'fs';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';

import { ALWAYS_PRINT_DIAGNOSTICS, resolveInputPaths } from './config.js';
import { Logger } from './logger.js';
import { RotationTask, type RotationTaskEvent, type TaskResponse } from './task.types.js';
import { RotationConfigError, RotationError, UsageError } from './rotation/rotation.errors.js';
import { loadOverrides, loadSchedule } from './rotation/rotation.loader.js';
import { resolveSchedule, resolveShiftAt, toRenderedShift } from './rotation/rotation.schedule.js';
import { runSelfTest } from './rotation/rotation.self-test.js';
import { printScheduleDiagnostics } from './rotation/rotation.utils.js';

const logger = new Logger('main');

export const USAGE = `Usage:
  render-schedule --schedule=FILE [--overrides=FILE] [--from=TIMESTAMP] --until=TIMESTAMP [--diagnostics]
  render-schedule --at=TIMESTAMP --schedule=FILE [--overrides=FILE]
  render-schedule --self-test FIXTURE_FILE_OR_DIR...

Timestamps look like 2023-11-17T17:00:00Z. --schedule and --overrides fall back to
ROTATION_SCHEDULE_PATH and ROTATION_OVERRIDES_PATH.`;

export function handler(event?: RotationTaskEvent): TaskResponse {
  if (!event) {
    logger.error('Required `event` parameter is missing (see `RotationTaskEvent` in task.types.ts).');
    return {
      exitCode: 2,
      body: {
        error: 'Required `event` parameter is missing (see `RotationTaskEvent` in task.types.ts).',
        error_type: 'INVALID_TASK',
      },
    };
  }

  try {
    return runTask(event);
  } catch (error) {
    if (error instanceof RotationConfigError) {
      logger.error(`Could not load ${error.path}:`, error.message);
      return {
        exitCode: 1,
        body: { error: error.message, error_type: 'CONFIG_ERROR', path: error.path },
      };
    }

    if (error instanceof RotationError) {
      logger.error('Validation error:', error.message);
      return {
        exitCode: 1,
        body: { error: error.message, error_type: 'VALIDATION_ERROR', name: error.name },
      };
    }

    logger.error('Unexpected error running task:', error);
    return {
      exitCode: 1,
      body: {
        error: error instanceof Error ? error.message : 'Unknown error occurred',
        error_type: 'UNKNOWN_ERROR',
      },
    };
  }
}

function runTask(event: RotationTaskEvent): TaskResponse {
  switch (event.task) {
    case RotationTask.RENDER_SCHEDULE: {
      const shifts = resolveSchedule({
        schedule: loadSchedule(event.schedule_path),
        overrides: event.overrides_path ? loadOverrides(event.overrides_path) : undefined,
        from: event.from,
        until: event.until,
      });

      if (event.diagnostics || ALWAYS_PRINT_DIAGNOSTICS) {
        printScheduleDiagnostics(shifts);
      }

      return { exitCode: 0, body: shifts.map(toRenderedShift) };
    }
    case RotationTask.SELF_TEST: {
      const report = runSelfTest(event.fixture_paths);
      if (report.results.length === 0) {
        logger.warn('No self-test fixtures found', { paths: event.fixture_paths });
      }
      return { exitCode: report.failed === 0 && report.results.length > 0 ? 0 : 1, body: report };
    }
    case RotationTask.CURRENT_ONCALL: {
      const shift = resolveShiftAt(
        loadSchedule(event.schedule_path),
        event.overrides_path ? loadOverrides(event.overrides_path) : undefined,
        event.at,
      );

      return { exitCode: 0, body: shift ? toRenderedShift(shift) : null };
    }
    default:
      logger.error('Unhandled event `task`.', event);
      throw new Error(`Unhandled event task: ${(event as RotationTaskEvent).task}`);
  }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        schedule: { type: 'string' },
        overrides: { type: 'string' },
        from: { type: 'string' },
        until: { type: 'string' },
        at: { type: 'string' },
        diagnostics: { type: 'boolean', default: false },
        'self-test': { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : 'Invalid arguments');
  }
}

/**
 * Turns command-line arguments into a task event.
 * @throws UsageError when the arguments do not describe a runnable task
 */
export function parseCommandLine(argv: string[]): RotationTaskEvent {
  const { values, positionals } = readArgs(argv);

  if (values['self-test']) {
    if (positionals.length === 0) {
      throw new UsageError('--self-test needs at least one fixture file or directory');
    }
    return { task: RotationTask.SELF_TEST, fixture_paths: positionals };
  }

  if (positionals.length > 0) {
    throw new UsageError(`Unexpected argument: ${positionals[0]}`);
  }

  const paths = resolveInputPaths({ schedule: values.schedule, overrides: values.overrides });
  if (!paths.valid || !paths.schedulePath) {
    throw new UsageError(`Missing --schedule (or environment variables: ${paths.missing.join(', ')})`);
  }

  if (values.at !== undefined) {
    return {
      task: RotationTask.CURRENT_ONCALL,
      schedule_path: paths.schedulePath,
      overrides_path: paths.overridesPath,
      at: values.at,
    };
  }

  if (values.until === undefined) {
    throw new UsageError('Missing --until');
  }

  return {
    task: RotationTask.RENDER_SCHEDULE,
    schedule_path: paths.schedulePath,
    overrides_path: paths.overridesPath,
    from: values.from,
    until: values.until,
    diagnostics: values.diagnostics,
  };
}

/** Runs the command line; returns the process exit code. */
export function main(argv: string[]): number {
  let event: RotationTaskEvent;
  try {
    event = parseCommandLine(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      process.stderr.write(`${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  const response = handler(event);
  process.stdout.write(`${JSON.stringify(response.body, null, 2)}\n`);
  return response.exitCode;
}

function isDirectExecution(): boolean {
  const script = process.argv[1];
  if (!script || !fs.existsSync(script)) {
    return false;
  }
  return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
}

if (isDirectExecution()) {
  process.exitCode = main(process.argv.slice(2));
}
