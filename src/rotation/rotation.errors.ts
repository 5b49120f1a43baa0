// Error classes surfaced by the rotation core and its loaders.
// The task handler maps them onto `error_type` values and exit codes.

export class RotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RotationError';
  }
}

export class MalformedTimestampError extends RotationError {
  constructor(
    public readonly value: unknown,
    public readonly field?: string,
  ) {
    super(
      `${field ?? 'timestamp'} "${String(value)}" is not a valid timestamp (expected YYYY-MM-DDTHH:MM:SSZ)`,
    );
    this.name = 'MalformedTimestampError';
  }
}

export class EmptyUserSetError extends RotationError {
  constructor() {
    super('Rotation rule must list at least one user');
    this.name = 'EmptyUserSetError';
  }
}

export class NonPositiveIntervalError extends RotationError {
  constructor(public readonly intervalDays: number) {
    super(`Rotation interval must be a positive whole number of days, got ${intervalDays}`);
    this.name = 'NonPositiveIntervalError';
  }
}

export class InvalidIntervalError extends RotationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidIntervalError';
  }
}

export class OverlappingOverridesError extends RotationError {
  constructor(message: string) {
    super(message);
    this.name = 'OverlappingOverridesError';
  }
}

export class RotationConfigError extends RotationError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'RotationConfigError';
  }
}

export class UsageError extends RotationError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
