import type { Range } from './address.js';

/**
 * Pattern interpretation flags.
 *
 * `literal` and `ignoreCase` are the core switches; `multiline`, `dotAll` and
 * `unicode` pass through to the regular-expression engine.
 */
export type MatchOptions = {
  /** Treat the pattern as literal text. Defaults to `false`. */
  literal?: boolean;
  /** Case-insensitive matching. Defaults to `false`. */
  ignoreCase?: boolean;
  /** `^` and `$` match at line breaks. */
  multiline?: boolean;
  /** `.` also matches line terminators. */
  dotAll?: boolean;
  /** Unicode-aware pattern syntax; zero-length matches advance by code point. */
  unicode?: boolean;
};

export const MATCH_OPTION_KEYS = ['literal', 'ignoreCase', 'multiline', 'dotAll', 'unicode'] as const;

export type MatchOptionKey = (typeof MATCH_OPTION_KEYS)[number];

/** Half-open range over a paragraph's flattened text. */
export type MatchSpan = Range;
