import type { FindTextResult, MatchOptions, SlideTarget } from '../types/index.js';
import { DeckApiValidationError } from '../errors.js';
import {
  assertMatchOptions,
  assertNoUnknownFields,
  assertSlideTarget,
  assertString,
  isRecord,
} from '../validation-primitives.js';

export type FindTextInput = SlideTarget & {
  pattern: string;
  match?: MatchOptions;
};

export type FindTextRequest = SlideTarget & {
  pattern: string;
  match: MatchOptions;
};

/**
 * Engine-specific adapter that the findText API delegates to.
 */
export interface FindTextAdapter {
  /**
   * Locate every span the pattern matches in scope without mutating the deck.
   */
  findText(request: FindTextRequest): FindTextResult;
}

const FIND_TEXT_INPUT_ALLOWED_KEYS = new Set(['pattern', 'slideIndex', 'allSlides', 'match']);

function validateFindTextInput(input: unknown): asserts input is FindTextInput {
  if (!isRecord(input)) {
    throw new DeckApiValidationError('INVALID_ARGUMENT', 'findText input must be a non-null object.');
  }

  assertNoUnknownFields(input, FIND_TEXT_INPUT_ALLOWED_KEYS, 'findText');
  assertString(input.pattern, 'pattern');
  assertSlideTarget(input);
  assertMatchOptions(input.match);
}

/**
 * Executes a findText operation by validating the input and delegating to the adapter.
 */
export function executeFindText(adapter: FindTextAdapter, input: FindTextInput): FindTextResult {
  validateFindTextInput(input);
  return adapter.findText({
    pattern: input.pattern,
    match: { ...input.match },
    ...(input.slideIndex !== undefined && { slideIndex: input.slideIndex }),
    ...(input.allSlides === true && { allSlides: true }),
  });
}
