import type { ParagraphAddress, Range } from './address.js';

export type DeckWarningCode = 'NO_MATCH';

/**
 * Advisory signal produced by an otherwise successful operation.
 * Warnings are never thrown.
 */
export type DeckWarning = {
  code: DeckWarningCode;
  message: string;
  details?: unknown;
};

export type ParagraphReplacement = {
  address: ParagraphAddress;
  /** Number of spans replaced in this paragraph. */
  replacements: number;
};

export type ReplaceTextReceipt = {
  /** Total spans replaced across the scope. */
  replacements: number;
  /** Paragraphs with at least one replacement, in document order. */
  updated: ParagraphReplacement[];
  warnings: DeckWarning[];
  /** True when the deck was left untouched because `dryRun` was requested. */
  dryRun: boolean;
};

export type TextMatch = {
  address: ParagraphAddress;
  range: Range;
  /** Matched text, as read from the flattened paragraph. */
  text: string;
};

export type FindTextResult = {
  matches: TextMatch[];
  total: number;
};

export type ParagraphText = {
  address: ParagraphAddress;
  text: string;
};
