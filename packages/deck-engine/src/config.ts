import type { DeckWarning, DeckWarningCode } from '@deck-replace/deck-api';
import { Logger } from './logger.js';

/** Maximum allowed pattern length to guard against ReDoS and excessive memory usage. */
export const DEFAULT_MAX_PATTERN_LENGTH = 1024;

const PROCESS_WARNING_TYPES: Record<DeckWarningCode, string> = {
  NO_MATCH: 'NoMatchWarning',
};

export type WarningHandler = (warning: DeckWarning) => void;

export interface DeckEngineConfig {
  /** Write debug lines for each replacement pass. Defaults to `false`. */
  enableLogging?: boolean;
  /** Longest pattern the matcher will compile. Defaults to {@link DEFAULT_MAX_PATTERN_LENGTH}. */
  maxPatternLength?: number;
  /**
   * Receives advisory warnings such as NO_MATCH.
   * Defaults to {@link emitProcessWarning}.
   */
  onWarning?: WarningHandler;
}

export interface ResolvedEngineConfig {
  logger: Logger;
  maxPatternLength: number;
  onWarning: WarningHandler;
}

/**
 * Raise the warning through Node's process warning channel, observable with
 * `process.on('warning', ...)`.
 */
export function emitProcessWarning(warning: DeckWarning): void {
  process.emitWarning(warning.message, { type: PROCESS_WARNING_TYPES[warning.code], code: warning.code });
}

export function normalizeEngineConfig(config: DeckEngineConfig = {}): ResolvedEngineConfig {
  const maxPatternLength = config.maxPatternLength ?? DEFAULT_MAX_PATTERN_LENGTH;
  if (!Number.isInteger(maxPatternLength) || maxPatternLength < 1) {
    throw new RangeError(`maxPatternLength must be a positive integer, got ${maxPatternLength}.`);
  }

  return {
    logger: new Logger(config.enableLogging ?? false),
    maxPatternLength,
    onWarning: config.onWarning ?? emitProcessWarning,
  };
}
