/**
 * Per-paragraph replacement pass over a resolved scope, in document order.
 */

import type { DeckWarning, ParagraphReplacement, TextMatch } from '@deck-replace/deck-api';
import type { Logger } from '../logger.js';
import type { ScopedParagraph } from '../scope/scope-resolver.js';
import { applyEdits, type TextEdit } from '../text/chunk-rewriter.js';
import { findMatches, type CompiledPattern } from '../text/pattern-matcher.js';
import { flattenParagraph } from '../text/run-flattener.js';

export interface ReplaceInScopeOptions {
  /** Produce a NO_MATCH warning when the pass replaces nothing. Defaults to `true`. */
  warn?: boolean;
  /** Count matches without writing any paragraph. Defaults to `false`. */
  dryRun?: boolean;
  logger?: Logger;
}

export interface ReplacementResult {
  replacements: number;
  updated: ParagraphReplacement[];
  warnings: DeckWarning[];
}

export function createNoMatchWarning(compiled: CompiledPattern, paragraphCount: number): DeckWarning {
  return {
    code: 'NO_MATCH',
    message: `Pattern ${JSON.stringify(compiled.pattern)} was not found in ${paragraphCount} paragraph(s).`,
    details: { pattern: compiled.pattern, paragraphCount },
  };
}

/**
 * Replace every match of `compiled` in `paragraphs` with `newValue`.
 *
 * `newValue` is inserted literally: `$1`, `$&` and the like are never expanded.
 * Paragraphs without a match are not written.
 */
export function replaceInScope(
  paragraphs: readonly ScopedParagraph[],
  compiled: CompiledPattern,
  newValue: string,
  options: ReplaceInScopeOptions = {},
): ReplacementResult {
  const { warn = true, dryRun = false, logger } = options;
  const updated: ParagraphReplacement[] = [];
  let replacements = 0;

  for (const { address, paragraph } of paragraphs) {
    const { text } = flattenParagraph(paragraph);
    const spans = findMatches(text, compiled);
    if (spans.length === 0) continue;

    if (!dryRun) {
      const edits: TextEdit[] = spans.map((range) => ({ range, text: newValue }));
      applyEdits(paragraph, edits);
    }

    replacements += spans.length;
    updated.push({ address, replacements: spans.length });
  }

  logger?.debug('Replacement pass finished', {
    pattern: compiled.pattern,
    paragraphs: paragraphs.length,
    updatedParagraphs: updated.length,
    replacements,
    dryRun,
  });

  const warnings = replacements === 0 && warn ? [createNoMatchWarning(compiled, paragraphs.length)] : [];
  return { replacements, updated, warnings };
}

/**
 * Collect every match of `compiled` in `paragraphs` without mutating anything.
 */
export function findInScope(paragraphs: readonly ScopedParagraph[], compiled: CompiledPattern): TextMatch[] {
  const matches: TextMatch[] = [];

  for (const { address, paragraph } of paragraphs) {
    const { text } = flattenParagraph(paragraph);
    for (const range of findMatches(text, compiled)) {
      matches.push({ address, range, text: text.slice(range.start, range.end) });
    }
  }

  return matches;
}
