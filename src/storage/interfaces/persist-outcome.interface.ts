/**
 * Result of writing one merged record to S3.
 *
 * `key` is absent on failure only when the error happened before the key was
 * computed (serialization).
 */
export type PersistOutcome =
  | { kind: 'stored'; key: string }
  | { kind: 'failed'; key?: string; message: string };
