import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'lossless-json';
import { EnrichmentService } from '../enrichment/enrichment.service';
import { validateQueueItem } from '../processing/link-validator';
import { mergeRecords } from '../processing/record-merger';
import {
  describeItem,
  isJsonObject,
} from '../shared/interfaces/record.interface';
import { S3StorageService } from '../storage/services/s3-storage.service';
import { ItemOutcome } from './interfaces/item-outcome.interface';

/**
 * Runs one raw queue payload through decode → validate → enrich → merge →
 * persist.
 *
 * @remarks
 * Each stage reports failure as a value, so a bad item ends here with a
 * logged outcome and never reaches the loop as an exception. Dropped items
 * are not re-queued.
 */
@Injectable()
export class ItemProcessorService {
  private readonly logger = new Logger(ItemProcessorService.name);

  constructor(
    private readonly enrichmentService: EnrichmentService,
    private readonly storageService: S3StorageService,
  ) {}

  async process(payload: string): Promise<ItemOutcome> {
    let decoded: unknown;
    try {
      decoded = parse(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to parse message as JSON: ${message}`);
      return { kind: 'decode-failed', message };
    }

    if (!isJsonObject(decoded)) {
      const message = 'payload is not a JSON object';
      this.logger.error(`Failed to parse message as JSON: ${message}`);
      return { kind: 'decode-failed', message };
    }

    const item = decoded;
    const label = describeItem(item);
    this.logger.log(`Processing message: ${label}`);

    const validation = validateQueueItem(item);
    if (!validation.valid) {
      this.logger.error(validation.error.message);
      return this.drop(label, { kind: 'invalid', error: validation.error });
    }

    const enrichment = await this.enrichmentService.enrich(validation.link);
    if (enrichment.kind !== 'enriched') {
      return this.drop(label, {
        kind: 'enrichment-failed',
        failure: enrichment,
      });
    }

    const record = mergeRecords(item, enrichment.data);
    const persisted = await this.storageService.storeRecord(record);
    if (persisted.kind === 'failed') {
      return this.drop(label, {
        kind: 'persist-failed',
        message: persisted.message,
      });
    }

    return { kind: 'stored', key: persisted.key };
  }

  private drop(label: string, outcome: ItemOutcome): ItemOutcome {
    this.logger.warn(`Failed to process message: ${label}`);
    return outcome;
  }
}
