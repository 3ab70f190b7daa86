import { EnrichmentFailure } from '../../enrichment/interfaces/enrichment-outcome.interface';
import { InvalidUrlError } from '../../processing/link-validator';

/**
 * What happened to one dequeued payload. Everything but `stored` means the
 * item was dropped.
 */
export type ItemOutcome =
  | { kind: 'stored'; key: string }
  | { kind: 'decode-failed'; message: string }
  | { kind: 'invalid'; error: InvalidUrlError }
  | { kind: 'enrichment-failed'; failure: EnrichmentFailure }
  | { kind: 'persist-failed'; message: string };
