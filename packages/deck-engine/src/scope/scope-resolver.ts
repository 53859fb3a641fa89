import type { DeckDocument, DeckParagraph, ParagraphAddress, SlideTarget } from '@deck-replace/deck-api';
import { DeckEngineError } from '../errors.js';

export type ScopedParagraph = {
  address: ParagraphAddress;
  paragraph: DeckParagraph;
};

function assertSlideInRange(document: DeckDocument, slideIndex: number, source: 'slideIndex' | 'cursor'): void {
  const slideCount = document.slides.length;
  if (!Number.isInteger(slideIndex) || slideIndex < 1 || slideIndex > slideCount) {
    throw new DeckEngineError(
      'SLIDE_INDEX_OUT_OF_RANGE',
      `Slide index ${slideIndex} is out of range; the deck has ${slideCount} slide(s).`,
      { slideIndex, slideCount, source },
    );
  }
}

/**
 * Resolve a slide target to concrete 1-based slide indices.
 *
 * Priority:
 * 1) `allSlides` — every slide in order.
 * 2) `slideIndex` — that slide.
 * 3) The deck's current slide.
 *
 * @throws {DeckEngineError} `NO_CURRENT_SLIDE` when falling back to an unset cursor.
 * @throws {DeckEngineError} `SLIDE_INDEX_OUT_OF_RANGE` when the index (or cursor) names no slide.
 */
export function resolveSlideIndices(document: DeckDocument, target: SlideTarget = {}): number[] {
  if (target.allSlides) {
    return document.slides.map((_slide, index) => index + 1);
  }

  if (target.slideIndex !== undefined) {
    assertSlideInRange(document, target.slideIndex, 'slideIndex');
    return [target.slideIndex];
  }

  const cursor = document.cursor;
  if (cursor === undefined) {
    throw new DeckEngineError('NO_CURRENT_SLIDE', 'No slide index was given and the deck has no current slide.');
  }
  assertSlideInRange(document, cursor, 'cursor');
  return [cursor];
}

/**
 * Resolve a slide target into the ordered paragraphs it covers, each with its address.
 * Reads the deck only; nothing is mutated.
 */
export function resolveScope(document: DeckDocument, target: SlideTarget = {}): ScopedParagraph[] {
  const scoped: ScopedParagraph[] = [];

  for (const slideIndex of resolveSlideIndices(document, target)) {
    const paragraphs = document.slides[slideIndex - 1].paragraphs();
    paragraphs.forEach((paragraph, paragraphIndex) => {
      scoped.push({
        address: { kind: 'paragraph', slideIndex, paragraphIndex, paragraphId: paragraph.id },
        paragraph,
      });
    });
  }

  return scoped;
}
