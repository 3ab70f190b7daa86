import { EnrichmentResult } from '../../shared/interfaces/record.interface';

/**
 * Result of one detail API call.
 *
 * @remarks
 * Only `enriched` carries data. Every other kind means the item is dropped;
 * the kind records why so callers and tests can branch on it.
 */
export type EnrichmentOutcome =
  | { kind: 'enriched'; data: EnrichmentResult }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'transport-error'; message: string }
  | { kind: 'http-error'; status: number }
  | { kind: 'invalid-body'; message: string };

export type EnrichmentFailure = Exclude<EnrichmentOutcome, { kind: 'enriched' }>;
