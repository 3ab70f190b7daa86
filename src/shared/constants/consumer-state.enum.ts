/**
 * Lifecycle of the consumer loop.
 */
export enum ConsumerState {
  /** Blocked on BLPOP, waiting for an item */
  IDLE = 'idle',

  /** Running validate → enrich → merge → persist for one item */
  PROCESSING = 'processing',

  /** Broker connection lost; rebuilding it */
  RECONNECTING = 'reconnecting',

  /** Loop is not running (before start, or after a stop request) */
  STOPPED = 'stopped',
}

/**
 * State of the broker connection, owned by the consumer loop.
 */
export enum ConnectionState {
  CONNECTED = 'connected',
  DISCONNECTED = 'disconnected',
}
