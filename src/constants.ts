/**
 * Core constants shared by the rotation renderer.
 *
 * NOTE:
 *  • Keep this file free of side-effects, everything here must be
 *    deterministically initialised at module load.
 */

/** Wire representation of every timestamp: UTC, second precision (luxon format tokens). */
export const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

/** Shape check applied before luxon validates the calendar fields. */
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

/** All rotation arithmetic happens in this zone. */
export const ROTATION_ZONE = 'utc';

/** Extension of schedule, overrides and self-test fixture files. */
export const FIXTURE_FILE_EXTENSION = '.json';
