import { createDeckTextApi, type DeckDocument, type MatchOptions } from '@deck-replace/deck-api';
import { assembleDeckAdapters } from './assemble-adapters.js';
import type { DeckEngineConfig } from './config.js';

export interface ReplaceTextOnSlideOptions {
  /** 1-based slide to search. Defaults to the deck's current slide. */
  slideIndex?: number;
  /** Search every slide instead of one. Exclusive with `slideIndex`. */
  allSlides?: boolean;
  /** Report a NO_MATCH warning when nothing is replaced. Defaults to `true`. */
  warn?: boolean;
  match?: MatchOptions;
  /** Count matches without changing the deck. Defaults to `false`. */
  dryRun?: boolean;
  config?: DeckEngineConfig;
}

/**
 * Replace all occurrences of `oldValue` with `newValue` on one slide (the
 * current slide by default) or across the deck.
 *
 * `oldValue` is a regular expression unless `match.literal` is set, and it is
 * matched against each paragraph's whole text, however that text is chunked
 * into runs. `newValue` is always inserted literally and takes the formatting
 * of the run where the match begins; text outside the matches keeps its own.
 *
 * @returns The same deck, mutated in place.
 * @throws {DeckApiValidationError} `INVALID_ARGUMENT` for malformed arguments, before the deck is read.
 * @throws {DeckEngineError} For an unresolvable slide or an invalid pattern, before any paragraph is rewritten.
 *
 * @example
 * ```ts
 * replaceTextOnSlide(deck, 'PERSON', 'Alice', { match: { literal: true } });
 * replaceTextOnSlide(deck, 'person', 'Bob', { allSlides: true, match: { ignoreCase: true } });
 * ```
 */
export function replaceTextOnSlide<T extends DeckDocument>(
  document: T,
  oldValue: string,
  newValue: string,
  options: ReplaceTextOnSlideOptions = {},
): T {
  const { config, dryRun, ...target } = options;
  const api = createDeckTextApi(assembleDeckAdapters(document, config));

  api.replaceText({ oldValue, newValue, ...target }, { dryRun });
  return document;
}
