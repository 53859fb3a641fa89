import type {
  DeckDocument,
  MutationOptions,
  ReplaceTextReceipt,
  ReplaceTextRequest,
} from '@deck-replace/deck-api';
import type { ResolvedEngineConfig } from './config.js';
import { replaceInScope } from './replace/replacement-orchestrator.js';
import { resolveScope } from './scope/scope-resolver.js';
import { compilePattern } from './text/pattern-matcher.js';

/**
 * Replace text in the deck for one normalized request.
 *
 * Scope resolution and pattern compilation both finish before the first
 * paragraph is rewritten, so a structural failure leaves the deck untouched.
 *
 * @throws {DeckEngineError} `NO_CURRENT_SLIDE`, `SLIDE_INDEX_OUT_OF_RANGE` or `INVALID_PATTERN`.
 */
export function replaceTextAdapter(
  document: DeckDocument,
  request: ReplaceTextRequest,
  options: Required<MutationOptions>,
  config: ResolvedEngineConfig,
): ReplaceTextReceipt {
  const paragraphs = resolveScope(document, request);
  const compiled = compilePattern(request.oldValue, request.match, config.maxPatternLength);

  const result = replaceInScope(paragraphs, compiled, request.newValue, {
    warn: request.warn,
    dryRun: options.dryRun,
    logger: config.logger,
  });

  for (const warning of result.warnings) {
    config.logger.warn(warning.message);
    config.onWarning(warning);
  }

  return {
    replacements: result.replacements,
    updated: result.updated,
    warnings: result.warnings,
    dryRun: options.dryRun,
  };
}
