/**
 * Parsing of user-typed values for the CLI
 */

import { InvalidInputError } from '../errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface IntegerBounds {
  min?: number;
  max?: number;
}

/**
 * Parse a whole decimal integer; anything else throws InvalidInputError
 */
export function parseInteger(input: string, field: string, bounds: IntegerBounds = {}): number {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidInputError(field, `'${trimmed}' is not an integer`);
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidInputError(field, `'${trimmed}' is out of range`);
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw new InvalidInputError(field, `must be at least ${bounds.min}`);
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new InvalidInputError(field, `must be at most ${bounds.max}`);
  }

  return value;
}

/**
 * Parse comma-separated integers such as "1, 2, 3"
 */
export function parseIntegerList(input: string, field: string, bounds: IntegerBounds = {}): number[] {
  return input.split(',').map(part => parseInteger(part, field, bounds));
}

/**
 * Answers starting with y/Y are yes
 */
export function parseYesNo(input: string): boolean {
  return input.trim().toLowerCase().startsWith('y');
}

/**
 * Render a sequence the way the console shows arrays: [1, 2, 3]
 */
export function formatSequence(values: ReadonlyArray<number | null>): string {
  return `[${values.map(v => String(v)).join(', ')}]`;
}
