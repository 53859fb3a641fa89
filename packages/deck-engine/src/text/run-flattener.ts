/**
 * Presents a paragraph's run partition as one contiguous string, with an
 * offset map back to the physical runs.
 *
 * The map is stored in run-length form: one segment per non-empty run, in
 * order, tiling `[0, text.length)` without gaps. Empty runs own no segment.
 */

import type { DeckParagraph, TextRun } from '@deck-replace/deck-api';

/** Flattened range covered by one non-empty run. */
export interface RunSegment {
  runIndex: number;
  /** Inclusive flattened offset of the run's first character. */
  start: number;
  /** Exclusive flattened offset. */
  end: number;
}

export interface RunLocation {
  runIndex: number;
  /** Offset within `runs[runIndex].text`. */
  localOffset: number;
}

export class OffsetMap {
  constructor(
    readonly segments: readonly RunSegment[],
    /** Flattened text length. */
    readonly length: number,
    /** Number of runs in the source partition, empty runs included. */
    readonly runCount: number,
  ) {}

  /**
   * Locate the run holding the character at `offset`.
   *
   * @throws {RangeError} When `offset` is not in `[0, length)`.
   */
  locate(offset: number): RunLocation {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.length) {
      throw new RangeError(`Offset ${offset} out of bounds for flattened length ${this.length}.`);
    }
    const segment = this.segments[this.findSegmentIndex(offset)];
    return { runIndex: segment.runIndex, localOffset: offset - segment.start };
  }

  /**
   * Locate the exclusive end of a span: the run holding the character before
   * `offset`, with `localOffset` one past that character.
   *
   * @throws {RangeError} When `offset` is not in `(0, length]`.
   */
  locateEnd(offset: number): RunLocation {
    if (!Number.isInteger(offset) || offset <= 0 || offset > this.length) {
      throw new RangeError(`End offset ${offset} out of bounds for flattened length ${this.length}.`);
    }
    const segment = this.segments[this.findSegmentIndex(offset - 1)];
    return { runIndex: segment.runIndex, localOffset: offset - segment.start };
  }

  /**
   * Locate an insertion point for a zero-length span.
   *
   * Inside the text this is the run holding the character at `offset`. At the
   * end of the text it is the end of the last non-empty run. With no text at
   * all it is the start of the first run, or `undefined` when there are no runs.
   */
  locateInsertion(offset: number): RunLocation | undefined {
    if (offset < this.length) return this.locate(offset);
    if (offset > this.length) {
      throw new RangeError(`Insertion offset ${offset} out of bounds for flattened length ${this.length}.`);
    }
    const last = this.segments[this.segments.length - 1];
    if (last) return { runIndex: last.runIndex, localOffset: last.end - last.start };
    return this.runCount > 0 ? { runIndex: 0, localOffset: 0 } : undefined;
  }

  private findSegmentIndex(offset: number): number {
    let low = 0;
    let high = this.segments.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.segments[mid].start <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }
}

export interface FlattenedParagraph {
  text: string;
  offsetMap: OffsetMap;
}

export function flattenRuns(runs: readonly TextRun[]): FlattenedParagraph {
  const segments: RunSegment[] = [];
  let text = '';

  runs.forEach((run, runIndex) => {
    if (run.text.length === 0) return;
    const start = text.length;
    text += run.text;
    segments.push({ runIndex, start, end: text.length });
  });

  return { text, offsetMap: new OffsetMap(segments, text.length, runs.length) };
}

/**
 * Flatten a paragraph's current runs. Never mutates the paragraph.
 */
export function flattenParagraph(paragraph: DeckParagraph): FlattenedParagraph {
  return flattenRuns(paragraph.getRuns());
}
