/** Error codes used by {@link DeckEngineError} to classify engine failures. */
export type DeckEngineErrorCode = 'SLIDE_INDEX_OUT_OF_RANGE' | 'NO_CURRENT_SLIDE' | 'INVALID_PATTERN';

/**
 * Structured error thrown by the deck engine.
 *
 * Every engine error is raised before the first paragraph is rewritten.
 *
 * @param code - Machine-readable error classification.
 * @param message - Human-readable description.
 * @param details - Optional payload with additional context.
 */
export class DeckEngineError extends Error {
  readonly code: DeckEngineErrorCode;
  readonly details?: unknown;

  constructor(code: DeckEngineErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DeckEngineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, DeckEngineError.prototype);
  }
}

/**
 * Type guard that narrows an unknown value to {@link DeckEngineError}.
 */
export function isDeckEngineError(error: unknown): error is DeckEngineError {
  return error instanceof DeckEngineError;
}
