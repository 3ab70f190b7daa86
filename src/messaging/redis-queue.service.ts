import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Redis } from 'ioredis';
import { EnvironmentVariables } from '../config/environment';
import {
  QueueConnection,
  QueueConnectionFactory,
} from './interfaces/queue-connection.interface';
import { QueueConnectionError } from './queue-connection.error';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

// Messages ioredis uses when a command cannot reach the server
const CONNECTION_ERROR_MESSAGES = [
  /connection is closed/i,
  /stream isn't writeable/i,
  /max retries per request/i,
];

/**
 * Whether `error` means the Redis connection is unusable.
 *
 * Reply errors (`WRONGTYPE`, `NOAUTH`, ...) come from a live server and are
 * not connection errors.
 */
export const isRedisConnectionError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  if (error.name === 'ReplyError') return false;
  if (error.name === 'MaxRetriesPerRequestError') return true;
  if (
    'code' in error &&
    typeof error.code === 'string' &&
    CONNECTION_ERROR_CODES.has(error.code)
  ) {
    return true;
  }
  return CONNECTION_ERROR_MESSAGES.some((pattern) =>
    pattern.test(error.message),
  );
};

const toQueueError = (error: unknown): unknown => {
  if (!isRedisConnectionError(error)) return error;
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new QueueConnectionError(message, error);
};

/**
 * {@link QueueConnection} over one ioredis client.
 */
export class RedisQueueConnection implements QueueConnection {
  constructor(private readonly redis: Redis) {}

  async pop(queue: string, timeoutSeconds: number): Promise<string | null> {
    try {
      const reply = await this.redis.blpop(queue, timeoutSeconds);
      return reply === null ? null : reply[1];
    } catch (error) {
      throw toQueueError(error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (error) {
      throw toQueueError(error);
    }
  }

  close(): void {
    this.redis.disconnect();
  }
}

/**
 * Builds Redis connections for the consumer.
 *
 * @remarks
 * **Design Decision: Consumer-Owned Reconnects**
 *
 * ioredis would normally reconnect on its own and buffer commands meanwhile.
 * Here `retryStrategy` returns `null` and the offline queue is off, so a lost
 * connection fails the pending BLPOP right away and the consumer rebuilds the
 * client with the same settings, probing it with PING.
 */
@Injectable()
export class RedisQueueConnectionFactory implements QueueConnectionFactory {
  private readonly logger = new Logger(RedisQueueConnectionFactory.name);

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  async create(): Promise<QueueConnection> {
    const redis = new Redis({
      host: this.configService.get('REDIS_HOST', { infer: true }),
      port: this.configService.get('REDIS_PORT', { infer: true }),
      db: this.configService.get('REDIS_DB', { infer: true }),
      password: this.configService.get('REDIS_PASSWORD', { infer: true }),
      lazyConnect: true,
      enableOfflineQueue: false,
      retryStrategy: () => null,
    });

    redis.on('error', (error: Error) => {
      this.logger.warn(`Redis client error: ${error.message}`);
    });

    try {
      await redis.connect();
    } catch (error) {
      redis.disconnect();
      throw toQueueError(error);
    }

    return new RedisQueueConnection(redis);
  }
}
