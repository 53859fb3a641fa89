export type DeckApiValidationErrorCode = 'INVALID_ARGUMENT';

/**
 * Structured validation error thrown by deck-api execute* functions before the
 * deck is touched.
 *
 * Consumers should prefer checking `error.code` over `instanceof` for resilience
 * across package boundaries and bundling scenarios.
 */
export class DeckApiValidationError extends Error {
  readonly code: DeckApiValidationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DeckApiValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeckApiValidationError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, DeckApiValidationError.prototype);
  }
}
