/**
 * Errors raised when encoding input or configuration is rejected.
 * Decoding never throws; it returns null instead.
 */

export class InvalidGroupError extends Error {
  readonly errors: readonly string[];

  constructor(
    readonly group: string,
    errors: readonly string[],
  ) {
    super(`Invalid group '${group}': ${errors.join(', ')}`);
    this.name = 'InvalidGroupError';
    this.errors = Object.freeze([...errors]);
  }
}

export class InvalidOptionsError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid naming options: ${errors.join(', ')}`);
    this.name = 'InvalidOptionsError';
    this.errors = Object.freeze([...errors]);
  }
}
