/**
 * Low-level type-guard primitives shared across operation validators.
 *
 * This module contains ONLY primitive type checks and generic assertions.
 * Operation-specific field lists and exclusivity rules stay local to each
 * operation file.
 */

import { MATCH_OPTION_KEYS, type MatchOptions, type SlideTarget } from './types/index.js';
import { DeckApiValidationError } from './errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Throws INVALID_ARGUMENT if any key on the input object is not in the allowlist.
 */
export function assertNoUnknownFields(
  input: Record<string, unknown>,
  allowlist: ReadonlySet<string>,
  operationName: string,
): void {
  for (const key of Object.keys(input)) {
    if (!allowlist.has(key)) {
      throw new DeckApiValidationError(
        'INVALID_ARGUMENT',
        `Unknown field "${key}" on ${operationName} input. Allowed fields: ${[...allowlist].join(', ')}.`,
        { field: key },
      );
    }
  }
}

export function assertString(value: unknown, fieldName: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new DeckApiValidationError('INVALID_ARGUMENT', `${fieldName} must be a string, got ${describeType(value)}.`, {
      field: fieldName,
      value,
    });
  }
}

/**
 * Throws INVALID_ARGUMENT unless the value is `undefined` or a boolean.
 */
export function assertOptionalBoolean(value: unknown, fieldName: string): asserts value is boolean | undefined {
  if (value !== undefined && typeof value !== 'boolean') {
    throw new DeckApiValidationError('INVALID_ARGUMENT', `${fieldName} must be a boolean, got ${describeType(value)}.`, {
      field: fieldName,
      value,
    });
  }
}

/**
 * Throws INVALID_ARGUMENT if the value is not a positive integer.
 */
export function assertPositiveInteger(value: unknown, fieldName: string): asserts value is number {
  if (!isInteger(value) || value < 1) {
    throw new DeckApiValidationError(
      'INVALID_ARGUMENT',
      `${fieldName} must be a positive integer, got ${JSON.stringify(value)}.`,
      { field: fieldName, value },
    );
  }
}

/**
 * Validates the slide-targeting fields shared by every operation.
 */
export function assertSlideTarget(input: Record<string, unknown>): asserts input is Record<string, unknown> & SlideTarget {
  const { slideIndex, allSlides } = input;

  if (slideIndex !== undefined) assertPositiveInteger(slideIndex, 'slideIndex');
  assertOptionalBoolean(allSlides, 'allSlides');

  if (slideIndex !== undefined && allSlides === true) {
    throw new DeckApiValidationError('INVALID_ARGUMENT', 'Cannot combine slideIndex with allSlides.', {
      fields: ['slideIndex', 'allSlides'],
    });
  }
}

const MATCH_OPTIONS_ALLOWED_KEYS: ReadonlySet<string> = new Set(MATCH_OPTION_KEYS);

export function assertMatchOptions(value: unknown): asserts value is MatchOptions | undefined {
  if (value === undefined) return;
  if (!isRecord(value)) {
    throw new DeckApiValidationError('INVALID_ARGUMENT', 'match must be an object.', { field: 'match', value });
  }

  assertNoUnknownFields(value, MATCH_OPTIONS_ALLOWED_KEYS, 'match');
  for (const key of MATCH_OPTION_KEYS) {
    assertOptionalBoolean(value[key], `match.${key}`);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
