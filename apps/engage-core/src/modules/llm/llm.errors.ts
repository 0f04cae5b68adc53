/**
 * Raised when no model can be reached: missing API key, transport failure,
 * or an empty completion.
 */
export class LlmUnavailableError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'LlmUnavailableError';
  }
}
