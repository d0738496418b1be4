/**
 * Configuration surface for naming conventions.
 *
 * Options are checked in two passes: an Ajv JSON Schema for types and
 * ranges, then the content validators for character sets.
 */

import { Ajv, type ErrorObject } from 'ajv';
import { InvalidOptionsError } from './errors.js';
import type { NamingOptions, ValidationResult } from './types.js';
import { validateNamingOptions } from './validators.js';

/**
 * Partial options as gathered from the environment or command-line flags
 */
export type NamingOverrides = { -readonly [K in keyof NamingOptions]?: NamingOptions[K] };

export const DEFAULT_NAMING_OPTIONS: NamingOptions = Object.freeze({
  prefix: 'jclouds',
  delimiter: '-',
  suffixLength: 3,
  suffixAlphabet: '0123456789abcdef',
});

export const namingOptionsSchema = {
  type: 'object',
  properties: {
    prefix: { type: 'string', maxLength: 63 },
    delimiter: { type: 'string', minLength: 1, maxLength: 1 },
    suffixLength: { type: 'integer', minimum: 1, maximum: 8 },
    suffixAlphabet: { type: 'string', minLength: 2, maxLength: 64 },
  },
  additionalProperties: false,
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile<Partial<NamingOptions>>(namingOptionsSchema);

/**
 * Check raw options against the schema
 *
 * @example
 * validateOptionsSchema({ delimiter: '--' })
 * // { valid: false, errors: ["Property '/delimiter' must be at most 1 characters"] }
 */
export function validateOptionsSchema(input: unknown): ValidationResult {
  if (validateSchema(input)) {
    return Object.freeze({ valid: true, errors: Object.freeze([]) });
  }

  return Object.freeze({
    valid: false,
    errors: Object.freeze(formatValidationErrors(validateSchema.errors || [])),
  });
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws InvalidOptionsError listing every problem found
 */
export function resolveNamingOptions(overrides: unknown = {}): NamingOptions {
  if (!validateSchema(overrides)) {
    throw new InvalidOptionsError(formatValidationErrors(validateSchema.errors || []));
  }

  const options: NamingOptions = Object.freeze({
    prefix: overrides.prefix ?? DEFAULT_NAMING_OPTIONS.prefix,
    delimiter: overrides.delimiter ?? DEFAULT_NAMING_OPTIONS.delimiter,
    suffixLength: overrides.suffixLength ?? DEFAULT_NAMING_OPTIONS.suffixLength,
    suffixAlphabet: overrides.suffixAlphabet ?? DEFAULT_NAMING_OPTIONS.suffixAlphabet,
  });

  const validation = validateNamingOptions(options);
  if (!validation.valid) {
    throw new InvalidOptionsError(validation.errors);
  }

  return options;
}

/**
 * Read option overrides from environment variables
 *
 * - GROUPNAME_PREFIX (an empty value disables the prefix)
 * - GROUPNAME_DELIMITER
 * - GROUPNAME_SUFFIX_LENGTH
 * - GROUPNAME_SUFFIX_ALPHABET
 */
export function loadNamingOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): NamingOverrides {
  const overrides: NamingOverrides = {};

  if (env.GROUPNAME_PREFIX !== undefined) {
    overrides.prefix = env.GROUPNAME_PREFIX;
  }
  if (env.GROUPNAME_DELIMITER !== undefined) {
    overrides.delimiter = env.GROUPNAME_DELIMITER;
  }
  if (env.GROUPNAME_SUFFIX_LENGTH !== undefined) {
    // Left as NaN when unparseable so the schema reports it
    overrides.suffixLength = parseStrictInt(env.GROUPNAME_SUFFIX_LENGTH);
  }
  if (env.GROUPNAME_SUFFIX_ALPHABET !== undefined) {
    overrides.suffixAlphabet = env.GROUPNAME_SUFFIX_ALPHABET;
  }

  return overrides;
}

export function parseStrictInt(value: string): number {
  return /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : Number.NaN;
}

/**
 * Format Ajv validation errors into human-readable messages
 */
function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'type':
        return `Property '${path}' must be of type ${error.params.type}`;

      case 'minimum':
        return `Property '${path}' must be >= ${error.params.limit}`;

      case 'maximum':
        return `Property '${path}' must be <= ${error.params.limit}`;

      case 'minLength':
        return `Property '${path}' must be at least ${error.params.limit} characters`;

      case 'maxLength':
        return `Property '${path}' must be at most ${error.params.limit} characters`;

      case 'additionalProperties':
        return `Unknown property: '${error.params.additionalProperty}'`;

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
