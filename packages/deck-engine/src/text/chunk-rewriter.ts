/**
 * Applies replacement edits expressed in flattened offsets to a paragraph's
 * physical run sequence.
 *
 * Edits run from the rightmost span to the leftmost. Each edit only touches
 * runs at or after the run holding its first character, and keeps that run's
 * prefix in place, so offsets from the original map stay valid for every edit
 * still to come.
 */

import type { DeckParagraph, MatchSpan, RunProperties, TextRun } from '@deck-replace/deck-api';
import { flattenRuns, type OffsetMap } from './run-flattener.js';

export interface TextEdit {
  range: MatchSpan;
  /** Replacement text. Empty means pure deletion. */
  text: string;
}

/**
 * Copy a formatting bag for a new run fragment. Values are shared as-is: the
 * bag is opaque and read-only, so class instances and functions pass through.
 */
export function copyRunProperties(properties: RunProperties): RunProperties {
  return { ...properties };
}

function fragment(text: string, properties: RunProperties): TextRun {
  return { text, properties: copyRunProperties(properties) };
}

function applyInsertion(runs: TextRun[], offsetMap: OffsetMap, edit: TextEdit): void {
  if (edit.text.length === 0) return;

  const location = offsetMap.locateInsertion(edit.range.start);
  if (!location) {
    runs.push({ text: edit.text, properties: {} });
    return;
  }

  const host = runs[location.runIndex];
  const pieces = [
    fragment(host.text.slice(0, location.localOffset), host.properties),
    fragment(edit.text, host.properties),
    fragment(host.text.slice(location.localOffset), host.properties),
  ].filter((run) => run.text.length > 0);

  runs.splice(location.runIndex, 1, ...pieces);
}

function applyReplacement(runs: TextRun[], offsetMap: OffsetMap, edit: TextEdit): void {
  const first = offsetMap.locate(edit.range.start);
  const last = offsetMap.locateEnd(edit.range.end);

  const firstRun = runs[first.runIndex];
  const lastRun = runs[last.runIndex];

  const pieces = [
    fragment(firstRun.text.slice(0, first.localOffset), firstRun.properties),
    fragment(edit.text, firstRun.properties),
    fragment(lastRun.text.slice(last.localOffset), lastRun.properties),
  ].filter((run) => run.text.length > 0);

  runs.splice(first.runIndex, last.runIndex - first.runIndex + 1, ...pieces);
}

/**
 * Compute the run sequence that renders `edits` applied to `runs`.
 *
 * `offsetMap` must describe `runs`, and edits must not overlap. Runs outside
 * every edited span are returned as the same objects, untouched.
 */
export function rewriteRuns(runs: readonly TextRun[], offsetMap: OffsetMap, edits: readonly TextEdit[]): TextRun[] {
  const result = [...runs];
  const ordered = [...edits].sort((a, b) => b.range.start - a.range.start);

  for (const edit of ordered) {
    if (edit.range.start === edit.range.end) {
      applyInsertion(result, offsetMap, edit);
    } else {
      applyReplacement(result, offsetMap, edit);
    }
  }

  return result;
}

/**
 * Apply edits to a paragraph in place. A paragraph with no edits is not written.
 *
 * @returns The paragraph's resulting runs.
 */
export function applyEdits(paragraph: DeckParagraph, edits: readonly TextEdit[]): readonly TextRun[] {
  const runs = paragraph.getRuns();
  if (edits.length === 0) return runs;

  const { offsetMap } = flattenRuns(runs);
  const rewritten = rewriteRuns(runs, offsetMap, edits);
  paragraph.setRuns(rewritten);
  return rewritten;
}
