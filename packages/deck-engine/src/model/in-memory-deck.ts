/**
 * In-memory deck model.
 *
 * A plain-data implementation of the deck collaborator interfaces for callers
 * that have no document layer of their own (and for tests). Shapes without a
 * text body contribute no paragraphs.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DeckDocument, DeckParagraph, DeckSlide, RunProperties, TextRun } from '@deck-replace/deck-api';

/** A run, or a bare string for a run with no formatting. */
export type RunDefinition = string | { text: string; properties?: RunProperties };

export type ShapeDefinition = {
  name?: string;
  /** Paragraphs of the shape's text body, each an ordered list of runs. */
  paragraphs?: RunDefinition[][];
};

export type SlideDefinition = {
  shapes: ShapeDefinition[];
};

export type DeckDefinition = {
  slides: SlideDefinition[];
  /**
   * 1-based current slide. Defaults to the last slide, as if each slide had
   * just been added; `null` leaves the cursor unset.
   */
  cursor?: number | null;
};

function toRun(definition: RunDefinition): TextRun {
  if (typeof definition === 'string') return { text: definition, properties: {} };
  return { text: definition.text, properties: definition.properties ?? {} };
}

export class InMemoryParagraph implements DeckParagraph {
  readonly id: string;
  private runs: TextRun[];

  constructor(runs: TextRun[], id: string = uuidv4()) {
    this.id = id;
    this.runs = [...runs];
  }

  getRuns(): readonly TextRun[] {
    return this.runs;
  }

  setRuns(runs: TextRun[]): void {
    this.runs = [...runs];
  }
}

export class InMemoryShape {
  constructor(
    readonly name: string | undefined,
    readonly paragraphs: readonly InMemoryParagraph[],
  ) {}
}

export class InMemorySlide implements DeckSlide {
  constructor(readonly shapes: readonly InMemoryShape[]) {}

  paragraphs(): readonly InMemoryParagraph[] {
    return this.shapes.flatMap((shape) => shape.paragraphs);
  }
}

export class InMemoryDeck implements DeckDocument {
  private current: number | undefined;

  constructor(
    readonly slides: readonly InMemorySlide[],
    cursor?: number,
  ) {
    this.current = cursor;
  }

  get cursor(): number | undefined {
    return this.current;
  }

  /**
   * Move the current-slide cursor. Owned by the caller; the engine only reads it.
   */
  setCursor(slideIndex: number | undefined): void {
    if (slideIndex === undefined) {
      this.current = undefined;
      return;
    }
    if (!Number.isInteger(slideIndex) || slideIndex < 1 || slideIndex > this.slides.length) {
      throw new RangeError(`Cursor ${slideIndex} is out of range; the deck has ${this.slides.length} slide(s).`);
    }
    this.current = slideIndex;
  }
}

export function createInMemoryDeck(definition: DeckDefinition): InMemoryDeck {
  const slides = definition.slides.map(
    (slide) =>
      new InMemorySlide(
        slide.shapes.map(
          (shape) =>
            new InMemoryShape(
              shape.name,
              (shape.paragraphs ?? []).map((runs) => new InMemoryParagraph(runs.map(toRun))),
            ),
        ),
      ),
  );

  const deck = new InMemoryDeck(slides);
  if (definition.cursor === undefined) {
    deck.setCursor(slides.length > 0 ? slides.length : undefined);
  } else if (definition.cursor !== null) {
    deck.setCursor(definition.cursor);
  }
  return deck;
}

/**
 * A paragraph's visible text: its run texts concatenated with no separator.
 */
export function paragraphText(paragraph: DeckParagraph): string {
  return paragraph
    .getRuns()
    .map((run) => run.text)
    .join('');
}
