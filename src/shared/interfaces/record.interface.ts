import { isLosslessNumber, LosslessNumber } from 'lossless-json';

/**
 * Records flowing through the worker.
 *
 * @remarks
 * Queue items, detail API responses and stored records are all plain JSON
 * objects. The worker only interprets `link` (and `name` for log lines);
 * every other field passes through untouched.
 *
 * Payloads are decoded with `lossless-json`, so numbers arrive as
 * {@link LosslessNumber} holding their source text. `12345678901234567890`
 * and `1.0` are written back exactly as they were received.
 */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Decoded queue payload. Must carry an absolute URL under `link`. */
export type QueueItem = JsonObject;

/** Detail API response body. */
export type EnrichmentResult = JsonObject;

/** Queue item overlaid with its enrichment; enrichment wins on key collision. */
export type MergedRecord = JsonObject;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !isLosslessNumber(value);

/**
 * Human-readable label for log lines: the item's `name` when it is a string
 * or number, otherwise `Unknown`.
 */
export const describeItem = (item: QueueItem): string => {
  const name = item.name;
  if (typeof name === 'string' && name !== '') return name;
  if (typeof name === 'number') return String(name);
  if (isLosslessNumber(name)) return name.toString();
  return 'Unknown';
};
