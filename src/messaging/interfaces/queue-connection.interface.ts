export const QUEUE_CONNECTION_FACTORY = Symbol('QUEUE_CONNECTION_FACTORY');

/**
 * One live connection to the broker.
 *
 * @remarks
 * Implementations throw `QueueConnectionError` when the connection itself is
 * unusable, and let any other error through unchanged.
 */
export interface QueueConnection {
  /**
   * Blocking left-pop on `queue`.
   *
   * @returns the raw payload, or `null` when `timeoutSeconds` passed with no item
   */
  pop(queue: string, timeoutSeconds: number): Promise<string | null>;

  /** Liveness probe used after (re)connecting. */
  ping(): Promise<void>;

  /** Drop the connection; pending operations fail with a connection error. */
  close(): void;
}

/**
 * Builds connections from the startup configuration. The consumer calls it
 * once at start and again after every connection loss.
 */
export interface QueueConnectionFactory {
  create(): Promise<QueueConnection>;
}
