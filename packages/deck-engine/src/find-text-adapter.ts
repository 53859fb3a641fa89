import type { DeckDocument, FindTextRequest, FindTextResult } from '@deck-replace/deck-api';
import type { ResolvedEngineConfig } from './config.js';
import { findInScope } from './replace/replacement-orchestrator.js';
import { resolveScope } from './scope/scope-resolver.js';
import { compilePattern } from './text/pattern-matcher.js';

/**
 * Locate every match in scope. Never mutates the deck and never warns.
 */
export function findTextAdapter(
  document: DeckDocument,
  request: FindTextRequest,
  config: ResolvedEngineConfig,
): FindTextResult {
  const paragraphs = resolveScope(document, request);
  const compiled = compilePattern(request.pattern, request.match, config.maxPatternLength);
  const matches = findInScope(paragraphs, compiled);

  config.logger.debug('Find pass finished', { pattern: request.pattern, total: matches.length });

  return { matches, total: matches.length };
}
