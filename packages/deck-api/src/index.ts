/**
 * Engine-agnostic Deck Text API surface.
 */

export * from './types/index.js';

import type { FindTextResult, ParagraphText, ReplaceTextReceipt } from './types/index.js';
import { executeFindText, type FindTextAdapter, type FindTextInput } from './find-text/find-text.js';
import { executeGetText, type GetTextAdapter, type GetTextInput } from './get-text/get-text.js';
import {
  executeReplaceText,
  type MutationOptions,
  type ReplaceTextAdapter,
  type ReplaceTextInput,
} from './replace-text/replace-text.js';

export type { FindTextAdapter, FindTextInput, FindTextRequest } from './find-text/find-text.js';
export type { GetTextAdapter, GetTextInput } from './get-text/get-text.js';
export type {
  MutationOptions,
  ReplaceTextAdapter,
  ReplaceTextInput,
  ReplaceTextRequest,
} from './replace-text/replace-text.js';
export {
  executeReplaceText,
  normalizeMutationOptions,
  normalizeReplaceTextInput,
  validateReplaceTextInput,
} from './replace-text/replace-text.js';
export { executeFindText } from './find-text/find-text.js';
export { executeGetText } from './get-text/get-text.js';
export { DeckApiValidationError, type DeckApiValidationErrorCode } from './errors.js';

/**
 * The Deck Text API: find, read and replace text in a slide deck.
 */
export interface DeckTextApi {
  /**
   * Replace every match of `oldValue` in scope with `newValue`, preserving run formatting
   * outside the matched spans.
   * @param input - Pattern, replacement, slide target and match options.
   * @param options - Mutation options (`dryRun`).
   * @returns A receipt with the replacement count, updated paragraphs and warnings.
   */
  replaceText(input: ReplaceTextInput, options?: MutationOptions): ReplaceTextReceipt;
  /**
   * Locate every match in scope without mutating the deck.
   */
  findText(input: FindTextInput): FindTextResult;
  /**
   * Return the flattened text of each paragraph in scope.
   */
  getText(input?: GetTextInput): ParagraphText[];
}

export interface DeckTextApiAdapters {
  replaceText: ReplaceTextAdapter;
  findText: FindTextAdapter;
  getText: GetTextAdapter;
}

/**
 * Creates a Deck Text API instance from the provided adapters.
 *
 * @example
 * ```ts
 * const api = createDeckTextApi(adapters);
 * const receipt = api.replaceText({ oldValue: 'PERSON', newValue: 'Alice', match: { literal: true } });
 * console.log(receipt.replacements);
 * ```
 */
export function createDeckTextApi(adapters: DeckTextApiAdapters): DeckTextApi {
  return {
    replaceText(input: ReplaceTextInput, options?: MutationOptions): ReplaceTextReceipt {
      return executeReplaceText(adapters.replaceText, input, options);
    },
    findText(input: FindTextInput): FindTextResult {
      return executeFindText(adapters.findText, input);
    },
    getText(input?: GetTextInput): ParagraphText[] {
      return executeGetText(adapters.getText, input);
    },
  };
}
