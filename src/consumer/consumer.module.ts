import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/environment';
import { EnrichmentModule } from '../enrichment/enrichment.module';
import { MessagingModule } from '../messaging/messaging.module';
import { StorageModule } from '../storage/storage.module';
import { BACKOFF_POLICY, createBackoffPolicy } from './backoff';
import { ConsumerService } from './consumer.service';
import { ItemProcessorService } from './item-processor.service';

/**
 * Consumer module driving the queue → detail API → S3 pipeline.
 *
 * @remarks
 * This module provides:
 * - The consume loop and its reconnect handling via ConsumerService
 * - Per-item validate/enrich/merge/persist via ItemProcessorService
 * - The reconnect backoff policy selected by `RECONNECT_BACKOFF_STRATEGY`
 */
@Module({
  imports: [ConfigModule, MessagingModule, EnrichmentModule, StorageModule],
  providers: [
    ConsumerService,
    ItemProcessorService,
    {
      provide: BACKOFF_POLICY,
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        createBackoffPolicy(
          configService.get('RECONNECT_BACKOFF_STRATEGY', { infer: true }),
          configService.get('RECONNECT_BACKOFF_MS', { infer: true }),
          configService.get('RECONNECT_MAX_BACKOFF_MS', { infer: true }),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [ConsumerService],
})
export class ConsumerModule {}
