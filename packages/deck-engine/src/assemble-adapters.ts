import type { DeckDocument, DeckTextApiAdapters } from '@deck-replace/deck-api';
import { normalizeEngineConfig, type DeckEngineConfig } from './config.js';
import type { Logger } from './logger.js';
import { findTextAdapter } from './find-text-adapter.js';
import { getTextAdapter } from './get-text-adapter.js';
import { replaceTextAdapter } from './replace-text-adapter.js';

function logFailures<T>(logger: Logger, operation: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    logger.error(`${operation} failed`, error);
    throw error;
  }
}

/**
 * Assembles all deck-api adapters for the given deck.
 *
 * @param document - The deck to bind adapters to.
 * @param config - Engine configuration (logging, pattern limits, warning handler).
 * @returns A {@link DeckTextApiAdapters} object ready to pass to `createDeckTextApi()`.
 */
export function assembleDeckAdapters(document: DeckDocument, config?: DeckEngineConfig): DeckTextApiAdapters {
  const resolved = normalizeEngineConfig(config);

  return {
    replaceText: {
      replaceText: (request, options) =>
        logFailures(resolved.logger, 'replaceText', () => replaceTextAdapter(document, request, options, resolved)),
    },
    findText: {
      findText: (request) =>
        logFailures(resolved.logger, 'findText', () => findTextAdapter(document, request, resolved)),
    },
    getText: {
      getText: (input) => logFailures(resolved.logger, 'getText', () => getTextAdapter(document, input)),
    },
  };
}
