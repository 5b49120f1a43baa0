import fs from 'fs';
import type { OverrideInput, ScheduleInput, SelfTestFixture } from './rotation.types.js';
import { RotationConfigError } from './rotation.errors.js';
import {
  type ValidationResult,
  isOverrideInputList,
  isScheduleInput,
  isSelfTestFixture,
  validateOverridesInput,
  validateScheduleInput,
  validateSelfTestFixture,
} from '../utils/validation.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-loader');

function readJsonFile(path: string): unknown {
  let contents: string;
  try {
    contents = fs.readFileSync(path, 'utf8');
  } catch (error) {
    throw new RotationConfigError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : 'Unknown file error'}`,
      path,
    );
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new RotationConfigError(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : 'Unknown parse error'}`,
      path,
    );
  }
}

function decodeFile<T>(
  path: string,
  isValid: (raw: unknown) => raw is T,
  validate: (raw: unknown) => ValidationResult,
): T {
  const raw = readJsonFile(path);
  if (!isValid(raw)) {
    const error = validate(raw).error || 'Unknown validation error';
    logger.error(`Invalid file ${path}:`, error);
    throw new RotationConfigError(`${path}: ${error}`, path);
  }

  logger.debug(`Loaded ${path}`);
  return raw;
}

export function loadSchedule(path: string): ScheduleInput {
  return decodeFile(path, isScheduleInput, (raw) => validateScheduleInput(raw));
}

export function loadOverrides(path: string): OverrideInput[] {
  return decodeFile(path, isOverrideInputList, (raw) => validateOverridesInput(raw));
}

export function loadSelfTestFixture(path: string): SelfTestFixture {
  return decodeFile(path, isSelfTestFixture, validateSelfTestFixture);
}
