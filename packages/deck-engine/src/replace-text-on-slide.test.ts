import { afterEach, describe, expect, it, vi } from 'vitest';
import { DeckApiValidationError, type DeckDocument, type DeckWarning } from '@deck-replace/deck-api';
import { replaceTextOnSlide } from './replace-text-on-slide.js';
import { createInMemoryDeck, paragraphText, type InMemoryDeck } from './model/in-memory-deck.js';
import { DeckEngineError } from './errors.js';

const BOLD = { bold: true };
const BOLD_PINK = { bold: true, color: 'pink' };
const ITALIC_RED = { italic: true, color: 'red' };

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

function deckTexts(deck: InMemoryDeck): string[][] {
  return deck.slides.map((slide) => slide.paragraphs().map(paragraphText));
}

function makeGreetingDeck(): InMemoryDeck {
  return createInMemoryDeck({
    slides: [
      {
        shapes: [
          { name: 'Title', paragraphs: [['Hello, PERSON ']] },
          {
            name: 'Body',
            paragraphs: [
              [{ text: 'hello PERSON. ', properties: BOLD_PINK }],
              [
                { text: 'hello ', properties: BOLD },
                { text: 'person. ', properties: ITALIC_RED },
              ],
              [{ text: 'No need to panic. ', properties: {} }],
            ],
          },
        ],
      },
    ],
  });
}

function makeThreeSlideDeck(): InMemoryDeck {
  return createInMemoryDeck({
    slides: [
      { shapes: [{ paragraphs: [['PERSON on slide one']] }] },
      { shapes: [{ paragraphs: [['PERSON on slide two']] }] },
      { shapes: [{ paragraphs: [['slide three']] }] },
    ],
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('replaceTextOnSlide', () => {
  it('replaces a match that is one whole run and keeps the neighbouring runs', () => {
    const deck = createInMemoryDeck({
      slides: [
        {
          shapes: [
            {
              paragraphs: [
                [
                  { text: 'hello ', properties: BOLD },
                  { text: 'PERSON', properties: ITALIC_RED },
                  { text: '. ', properties: {} },
                ],
              ],
            },
          ],
        },
      ],
    });
    const paragraph = deck.slides[0].paragraphs()[0];
    const [first, , last] = paragraph.getRuns();

    replaceTextOnSlide(deck, 'PERSON', 'Alice', { match: { literal: true } });

    const runs = paragraph.getRuns();
    expect(paragraphText(paragraph)).toBe('hello Alice. ');
    expect(runs).toEqual([
      { text: 'hello ', properties: BOLD },
      { text: 'Alice', properties: ITALIC_RED },
      { text: '. ', properties: {} },
    ]);
    expect(runs[0]).toBe(first);
    expect(runs[2]).toBe(last);
  });

  it('replaces each non-greedy word-boundary match', () => {
    const deck = createInMemoryDeck({ slides: [{ shapes: [{ paragraphs: [['no need to panic']] }] }] });

    replaceTextOnSlide(deck, '\\bn.*?\\b', 'example');

    expect(deckTexts(deck)).toEqual([['example example to panic']]);
  });

  it('fails for a slide index past the end of the deck and leaves the deck alone', () => {
    const deck = makeThreeSlideDeck();
    const before = deckTexts(deck);

    const error = captureError(() => replaceTextOnSlide(deck, 'PERSON', 'Alice', { slideIndex: 5 }));

    expect(error).toBeInstanceOf(DeckEngineError);
    expect(error).toMatchObject({ code: 'SLIDE_INDEX_OUT_OF_RANGE' });
    expect(deckTexts(deck)).toEqual(before);
  });

  it('reports a NO_MATCH warning and returns the deck unchanged when nothing matches', () => {
    const deck = makeThreeSlideDeck();
    const before = deckTexts(deck);
    const warnings: DeckWarning[] = [];

    const result = replaceTextOnSlide(deck, 'zzz', 'Alice', { config: { onWarning: (w) => warnings.push(w) } });

    expect(result).toBe(deck);
    expect(deckTexts(deck)).toEqual(before);
    expect(warnings).toEqual([
      {
        code: 'NO_MATCH',
        message: 'Pattern "zzz" was not found in 1 paragraph(s).',
        details: { pattern: 'zzz', paragraphCount: 1 },
      },
    ]);
  });

  it('raises NO_MATCH as a process warning by default', () => {
    const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});

    replaceTextOnSlide(makeThreeSlideDeck(), 'zzz', 'Alice');

    expect(emitWarning).toHaveBeenCalledWith('Pattern "zzz" was not found in 1 paragraph(s).', {
      type: 'NoMatchWarning',
      code: 'NO_MATCH',
    });
  });

  it('does not warn when warn is false', () => {
    const onWarning = vi.fn();

    replaceTextOnSlide(makeThreeSlideDeck(), 'zzz', 'Alice', { warn: false, config: { onWarning } });

    expect(onWarning).not.toHaveBeenCalled();
  });

  it('walks a deck through a sequence of literal, case-insensitive and regex replacements', () => {
    const deck = makeGreetingDeck();
    const onWarning = vi.fn();
    const [, , third] = deck.slides[0].paragraphs();
    const boldRun = third.getRuns()[0];

    replaceTextOnSlide(deck, 'PERSON', 'Alice', { match: { literal: true }, config: { onWarning } });
    expect(deckTexts(deck)).toEqual([['Hello, Alice ', 'hello Alice. ', 'hello person. ', 'No need to panic. ']]);
    expect(deck.slides[0].paragraphs()[1].getRuns()).toEqual([
      { text: 'hello ', properties: BOLD_PINK },
      { text: 'Alice', properties: BOLD_PINK },
      { text: '. ', properties: BOLD_PINK },
    ]);

    replaceTextOnSlide(deck, 'PERSON', 'Bob', { match: { ignoreCase: true }, config: { onWarning } });
    expect(third.getRuns()).toEqual([
      { text: 'hello ', properties: BOLD },
      { text: 'Bob', properties: ITALIC_RED },
      { text: '. ', properties: ITALIC_RED },
    ]);
    expect(third.getRuns()[0]).toBe(boldRun);

    replaceTextOnSlide(deck, '\\bn.*?\\b', 'example', { config: { onWarning } });
    expect(deckTexts(deck)).toEqual([['Hello, Alice ', 'hello Alice. ', 'hello Bob. ', 'No example to panic. ']]);

    expect(onWarning).not.toHaveBeenCalled();
  });

  it('uses the current slide when no slide index is given', () => {
    const deck = makeThreeSlideDeck();
    deck.setCursor(2);

    replaceTextOnSlide(deck, 'PERSON', 'Alice');

    expect(deckTexts(deck)).toEqual([['PERSON on slide one'], ['Alice on slide two'], ['slide three']]);
  });

  it('fails when there is no slide index and no current slide', () => {
    const deck = makeThreeSlideDeck();
    deck.setCursor(undefined);

    expect(captureError(() => replaceTextOnSlide(deck, 'PERSON', 'Alice'))).toMatchObject({
      code: 'NO_CURRENT_SLIDE',
    });
  });

  it('replaces across every slide with allSlides', () => {
    const deck = makeThreeSlideDeck();

    replaceTextOnSlide(deck, 'PERSON', 'Alice', { allSlides: true });

    expect(deckTexts(deck)).toEqual([['Alice on slide one'], ['Alice on slide two'], ['slide three']]);
  });

  it('rewrites every paragraph when run formatting holds functions', () => {
    const render = () => 'x';
    const deck = createInMemoryDeck({
      slides: [{ shapes: [{ paragraphs: [['PERSON one'], [{ text: 'hi PERSON', properties: { render } }]] }] }],
    });

    replaceTextOnSlide(deck, 'PERSON', 'Alice');

    expect(deckTexts(deck)).toEqual([['Alice one', 'hi Alice']]);
    expect(deck.slides[0].paragraphs()[1].getRuns()[1].properties.render).toBe(render);
  });

  it('inserts the replacement literally', () => {
    const deck = makeThreeSlideDeck();

    replaceTextOnSlide(deck, '(PERSON)', '$1', { slideIndex: 1 });

    expect(deckTexts(deck)[0]).toEqual(['$1 on slide one']);
  });

  it('rejects an invalid pattern without touching the deck', () => {
    const deck = makeThreeSlideDeck();
    const before = deckTexts(deck);

    const error = captureError(() => replaceTextOnSlide(deck, '(PERSON', 'Alice', { allSlides: true }));

    expect(error).toBeInstanceOf(DeckEngineError);
    expect(error).toMatchObject({ code: 'INVALID_PATTERN', details: { pattern: '(PERSON' } });
    expect(deckTexts(deck)).toEqual(before);
  });

  it('reports a bad slide before a bad pattern', () => {
    const error = captureError(() => replaceTextOnSlide(makeThreeSlideDeck(), '(', 'x', { slideIndex: 9 }));

    expect(error).toMatchObject({ code: 'SLIDE_INDEX_OUT_OF_RANGE' });
  });

  it('honours a configured pattern length limit', () => {
    const error = captureError(() =>
      replaceTextOnSlide(makeThreeSlideDeck(), 'PERSON', 'Alice', { config: { maxPatternLength: 4 } }),
    );

    expect(error).toMatchObject({ code: 'INVALID_PATTERN', message: 'Pattern exceeds 4 characters.' });
  });

  it('validates arguments before reading the deck', () => {
    const document: DeckDocument = {
      get slides(): never {
        throw new Error('deck was read');
      },
      cursor: 1,
    };

    const error = captureError(() => replaceTextOnSlide(document, 'PERSON', 'Alice', { slideIndex: 1.5 }));

    expect(error).toBeInstanceOf(DeckApiValidationError);
    expect(error).toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: 'slideIndex must be a positive integer, got 1.5.',
    });
  });

  it('rejects slideIndex together with allSlides', () => {
    const error = captureError(() =>
      replaceTextOnSlide(makeThreeSlideDeck(), 'PERSON', 'Alice', { slideIndex: 1, allSlides: true }),
    );

    expect(error).toMatchObject({ code: 'INVALID_ARGUMENT', message: 'Cannot combine slideIndex with allSlides.' });
  });

  it('leaves the deck unchanged on a dry run', () => {
    const deck = makeThreeSlideDeck();
    const before = deckTexts(deck);

    replaceTextOnSlide(deck, 'PERSON', 'Alice', { allSlides: true, dryRun: true });

    expect(deckTexts(deck)).toEqual(before);
  });
});
