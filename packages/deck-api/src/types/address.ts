export type Range = {
  /** Inclusive start offset (0-based, UTF-16 code units). */
  start: number;
  /** Exclusive end offset (0-based, UTF-16 code units). */
  end: number;
};

/**
 * Locates one paragraph inside a deck.
 *
 * `slideIndex` is 1-based, like every slide reference in this API.
 * `paragraphIndex` is 0-based within the slide's paragraph list.
 */
export type ParagraphAddress = {
  kind: 'paragraph';
  slideIndex: number;
  paragraphIndex: number;
  paragraphId: string;
};

/**
 * Which slides an operation covers.
 *
 * With neither field set, the deck's current slide is used.
 * `slideIndex` and `allSlides` are mutually exclusive.
 */
export type SlideTarget = {
  /** 1-based slide index. */
  slideIndex?: number;
  /** Cover every slide in the deck, in order. */
  allSlides?: boolean;
};
