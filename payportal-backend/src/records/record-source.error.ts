/**
 * Raised when the trip records cannot be fetched or read.
 * The store turns it into a single "system unavailable" response.
 */
export class RecordSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordSourceError';
  }
}
