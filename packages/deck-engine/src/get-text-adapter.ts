import type { DeckDocument, GetTextInput, ParagraphText } from '@deck-replace/deck-api';
import { resolveScope } from './scope/scope-resolver.js';
import { flattenParagraph } from './text/run-flattener.js';

export function getTextAdapter(document: DeckDocument, input: GetTextInput): ParagraphText[] {
  return resolveScope(document, input).map(({ address, paragraph }) => ({
    address,
    text: flattenParagraph(paragraph).text,
  }));
}
