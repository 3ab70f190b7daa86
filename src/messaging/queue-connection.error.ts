/**
 * The broker connection is lost or could not be established.
 *
 * Signals the consumer to rebuild the connection rather than treat the
 * failure as an ordinary error.
 */
export class QueueConnectionError extends Error {
  constructor(
    message: string,
    readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'QueueConnectionError';
  }
}
