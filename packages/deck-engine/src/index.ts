/**
 * Deck text engine: run-aware search and replace for slide decks.
 */

export { replaceTextOnSlide, type ReplaceTextOnSlideOptions } from './replace-text-on-slide.js';
export { assembleDeckAdapters } from './assemble-adapters.js';
export {
  DEFAULT_MAX_PATTERN_LENGTH,
  emitProcessWarning,
  normalizeEngineConfig,
  type DeckEngineConfig,
  type ResolvedEngineConfig,
  type WarningHandler,
} from './config.js';
export { DeckEngineError, isDeckEngineError, type DeckEngineErrorCode } from './errors.js';
export { Logger } from './logger.js';

export {
  compilePattern,
  escapeRegExp,
  findMatches,
  findMatchesInText,
  type CompiledPattern,
} from './text/pattern-matcher.js';
export {
  flattenParagraph,
  flattenRuns,
  OffsetMap,
  type FlattenedParagraph,
  type RunLocation,
  type RunSegment,
} from './text/run-flattener.js';
export { applyEdits, copyRunProperties, rewriteRuns, type TextEdit } from './text/chunk-rewriter.js';
export {
  createNoMatchWarning,
  findInScope,
  replaceInScope,
  type ReplaceInScopeOptions,
  type ReplacementResult,
} from './replace/replacement-orchestrator.js';
export { resolveScope, resolveSlideIndices, type ScopedParagraph } from './scope/scope-resolver.js';

export {
  createInMemoryDeck,
  InMemoryDeck,
  InMemoryParagraph,
  InMemoryShape,
  InMemorySlide,
  paragraphText,
  type DeckDefinition,
  type RunDefinition,
  type ShapeDefinition,
  type SlideDefinition,
} from './model/in-memory-deck.js';
