import type { MatchOptions, ReplaceTextReceipt, SlideTarget } from '../types/index.js';
import { DeckApiValidationError } from '../errors.js';
import {
  assertMatchOptions,
  assertNoUnknownFields,
  assertOptionalBoolean,
  assertSlideTarget,
  assertString,
  isRecord,
} from '../validation-primitives.js';

export interface MutationOptions {
  /**
   * When true, adapters resolve scope and count matches but must not mutate the deck.
   * Defaults to `false`.
   */
  dryRun?: boolean;
}

export type ReplaceTextInput = SlideTarget & {
  /** Pattern to search for. Interpreted as a regular expression unless `match.literal` is set. */
  oldValue: string;
  /** Replacement text. Always inserted literally, even in regex mode. */
  newValue: string;
  /** Produce a NO_MATCH warning when nothing in scope matches. Defaults to `true`. */
  warn?: boolean;
  match?: MatchOptions;
};

/** Canonical request handed to adapters: every default resolved. */
export type ReplaceTextRequest = SlideTarget & {
  oldValue: string;
  newValue: string;
  warn: boolean;
  match: MatchOptions;
};

/**
 * Engine-specific adapter that the replaceText API delegates to.
 */
export interface ReplaceTextAdapter {
  replaceText(request: ReplaceTextRequest, options: Required<MutationOptions>): ReplaceTextReceipt;
}

const REPLACE_TEXT_INPUT_ALLOWED_KEYS = new Set(['oldValue', 'newValue', 'slideIndex', 'allSlides', 'warn', 'match']);

/**
 * Validates ReplaceTextInput and throws DeckApiValidationError on violations.
 *
 * Validation order:
 * 0. Input shape guard
 * 1. Unknown field rejection
 * 2. oldValue / newValue are strings
 * 3. warn is a boolean when given
 * 4. Slide target (positive integer index, exclusive with allSlides)
 * 5. Match option flags
 */
export function validateReplaceTextInput(input: unknown): asserts input is ReplaceTextInput {
  if (!isRecord(input)) {
    throw new DeckApiValidationError('INVALID_ARGUMENT', 'replaceText input must be a non-null object.');
  }

  assertNoUnknownFields(input, REPLACE_TEXT_INPUT_ALLOWED_KEYS, 'replaceText');

  assertString(input.oldValue, 'oldValue');
  assertString(input.newValue, 'newValue');
  assertOptionalBoolean(input.warn, 'warn');
  assertSlideTarget(input);
  assertMatchOptions(input.match);
}

export function normalizeMutationOptions(options?: MutationOptions): Required<MutationOptions> {
  assertOptionalBoolean(options?.dryRun, 'dryRun');
  return {
    dryRun: options?.dryRun ?? false,
  };
}

export function normalizeReplaceTextInput(input: ReplaceTextInput): ReplaceTextRequest {
  return {
    oldValue: input.oldValue,
    newValue: input.newValue,
    warn: input.warn ?? true,
    match: { ...input.match },
    ...(input.slideIndex !== undefined && { slideIndex: input.slideIndex }),
    ...(input.allSlides === true && { allSlides: true }),
  };
}

export function executeReplaceText(
  adapter: ReplaceTextAdapter,
  input: ReplaceTextInput,
  options?: MutationOptions,
): ReplaceTextReceipt {
  validateReplaceTextInput(input);
  const mutationOptions = normalizeMutationOptions(options);
  return adapter.replaceText(normalizeReplaceTextInput(input), mutationOptions);
}
