import {
  EnrichmentResult,
  MergedRecord,
  QueueItem,
} from '../shared/interfaces/record.interface';

/**
 * Shallow, right-biased merge: enrichment fields replace item fields with the
 * same key. Neither input is modified.
 */
export const mergeRecords = (
  original: QueueItem,
  enrichment: EnrichmentResult,
): MergedRecord => ({ ...original, ...enrichment });
