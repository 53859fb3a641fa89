/**
 * Collaborator interfaces for the slide deck this API operates on.
 *
 * The deck's storage format, layouts and shapes belong to the document layer.
 * The text engine only sees slides, the paragraphs of their text-bearing
 * shapes, and each paragraph's run sequence.
 */

/**
 * Opaque formatting attributes attached to a run.
 *
 * Copied verbatim (values shared) when a run is split; never inspected by the engine.
 */
export type RunProperties = Readonly<Record<string, unknown>>;

/** Smallest unit of styled text in a paragraph. */
export interface TextRun {
  text: string;
  properties: RunProperties;
}

export interface DeckParagraph {
  /** Stable identifier assigned by the document layer. */
  readonly id: string;
  /** Current run sequence, in order. Concatenated run texts form the visible text. */
  getRuns(): readonly TextRun[];
  /** Replace the paragraph's run sequence. */
  setRuns(runs: TextRun[]): void;
}

export interface DeckSlide {
  /**
   * Paragraphs of every text-bearing shape on the slide, in shape-then-paragraph order.
   */
  paragraphs(): readonly DeckParagraph[];
}

export interface DeckDocument {
  readonly slides: readonly DeckSlide[];
  /**
   * 1-based index of the current slide, or `undefined` when no slide is current.
   * Owned by the document layer; read-only from the engine's point of view.
   */
  readonly cursor: number | undefined;
}
