import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { QUEUE_CONNECTION_FACTORY } from './interfaces/queue-connection.interface';
import { RedisQueueConnectionFactory } from './redis-queue.service';

/**
 * Module for the Redis work queue.
 *
 * @remarks
 * Exposes a connection factory rather than a connection: the consumer owns the
 * connection's lifecycle and replaces it after a failure.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: QUEUE_CONNECTION_FACTORY,
      useClass: RedisQueueConnectionFactory,
    },
  ],
  exports: [QUEUE_CONNECTION_FACTORY],
})
export class MessagingModule {}
