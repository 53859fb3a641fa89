/**
 * Compiles a search pattern once and finds every non-overlapping match in a
 * paragraph's flattened text.
 *
 * All functions are pure.
 */

import type { MatchOptions, MatchSpan } from '@deck-replace/deck-api';
import { DEFAULT_MAX_PATTERN_LENGTH } from '../config.js';
import { DeckEngineError } from '../errors.js';

export interface CompiledPattern {
  /** The pattern as supplied by the caller. */
  readonly pattern: string;
  /** Global regular expression; never executed directly, see {@link findMatches}. */
  readonly regex: RegExp;
  readonly options: Readonly<MatchOptions>;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildRegExpFlags(options: MatchOptions): string {
  let flags = 'g';
  if (options.ignoreCase) flags += 'i';
  if (options.multiline) flags += 'm';
  if (options.dotAll) flags += 's';
  if (options.unicode) flags += 'u';
  return flags;
}

/**
 * Compile a pattern into a reusable {@link CompiledPattern}.
 *
 * @throws {DeckEngineError} `INVALID_PATTERN` when the pattern is too long or is not a valid regular expression.
 */
export function compilePattern(
  pattern: string,
  options: MatchOptions = {},
  maxPatternLength: number = DEFAULT_MAX_PATTERN_LENGTH,
): CompiledPattern {
  if (pattern.length > maxPatternLength) {
    throw new DeckEngineError('INVALID_PATTERN', `Pattern exceeds ${maxPatternLength} characters.`, {
      length: pattern.length,
      maxPatternLength,
    });
  }

  // Literal patterns are compiled as escaped expressions so both modes share one matching loop.
  const source = options.literal ? escapeRegExp(pattern) : pattern;

  let regex: RegExp;
  try {
    regex = new RegExp(source, buildRegExpFlags(options));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DeckEngineError('INVALID_PATTERN', `Invalid pattern: ${reason}`, { pattern });
  }

  return { pattern, regex, options: { ...options } };
}

function nextSearchPosition(text: string, position: number, unicode: boolean): number {
  if (unicode) {
    const codePoint = text.codePointAt(position);
    if (codePoint !== undefined && codePoint > 0xffff) return position + 2;
  }
  return position + 1;
}

/**
 * Find all non-overlapping matches, leftmost first.
 *
 * A zero-length match advances the search by one character so that patterns
 * such as `a*` terminate. Returns an empty array when nothing matches.
 */
export function findMatches(text: string, compiled: CompiledPattern): MatchSpan[] {
  // Fresh instance: RegExp objects carry lastIndex state.
  const regex = new RegExp(compiled.regex.source, compiled.regex.flags);
  const unicode = compiled.options.unicode ?? false;
  const spans: MatchSpan[] = [];

  let position = 0;
  while (position <= text.length) {
    regex.lastIndex = position;
    const match = regex.exec(text);
    if (!match) break;

    const start = match.index;
    const end = start + match[0].length;
    spans.push({ start, end });

    position = end === start ? nextSearchPosition(text, end, unicode) : end;
  }

  return spans;
}

/**
 * Compile and match in one step.
 */
export function findMatchesInText(text: string, pattern: string, options: MatchOptions = {}): MatchSpan[] {
  return findMatches(text, compilePattern(pattern, options));
}
