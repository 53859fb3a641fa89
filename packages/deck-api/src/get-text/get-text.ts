import type { ParagraphText, SlideTarget } from '../types/index.js';
import { DeckApiValidationError } from '../errors.js';
import { assertNoUnknownFields, assertSlideTarget, isRecord } from '../validation-primitives.js';

export type GetTextInput = SlideTarget;

/**
 * Engine-specific adapter that the getText API delegates to.
 */
export interface GetTextAdapter {
  /**
   * Return the flattened text of every paragraph in scope.
   */
  getText(input: GetTextInput): ParagraphText[];
}

const GET_TEXT_INPUT_ALLOWED_KEYS = new Set(['slideIndex', 'allSlides']);

/**
 * Execute a getText operation via the provided adapter.
 *
 * @param adapter - Engine-specific getText adapter.
 * @param input - Slide target; defaults to the current slide.
 */
export function executeGetText(adapter: GetTextAdapter, input: GetTextInput = {}): ParagraphText[] {
  if (!isRecord(input)) {
    throw new DeckApiValidationError('INVALID_ARGUMENT', 'getText input must be a non-null object.');
  }
  assertNoUnknownFields(input, GET_TEXT_INPUT_ALLOWED_KEYS, 'getText');
  assertSlideTarget(input);
  return adapter.getText(input);
}
