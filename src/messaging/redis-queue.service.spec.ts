import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Redis, RedisOptions } from 'ioredis';
import { QueueConnectionError } from './queue-connection.error';
import {
  isRedisConnectionError,
  RedisQueueConnectionFactory,
} from './redis-queue.service';

// Mock ioredis
const mockRedis = {
  connect: jest.fn(),
  blpop: jest.fn(),
  ping: jest.fn(),
  disconnect: jest.fn(),
  on: jest.fn(),
};

const mockRedisConstructor = jest.fn((_options: RedisOptions) => mockRedis);

jest.mock('ioredis', () => ({
  Redis: jest
    .fn()
    .mockImplementation((options: RedisOptions) =>
      mockRedisConstructor(options),
    ),
}));

const socketError = (code: string, message: string): Error =>
  Object.assign(new Error(message), { code });

describe('isRedisConnectionError', () => {
  it.each([
    socketError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:6379'),
    socketError('ECONNRESET', 'read ECONNRESET'),
    socketError('ENOTFOUND', 'getaddrinfo ENOTFOUND redis'),
    new Error('Connection is closed.'),
    new Error("Stream isn't writeable and enableOfflineQueue options is false"),
  ])('should treat %p as a connection error', (error) => {
    expect(isRedisConnectionError(error)).toBe(true);
  });

  it('should treat MaxRetriesPerRequestError as a connection error', () => {
    const error = new Error('Reached the max retries per request limit');
    error.name = 'MaxRetriesPerRequestError';

    expect(isRedisConnectionError(error)).toBe(true);
  });

  it('should not treat reply errors as connection errors', () => {
    const error = new Error(
      'WRONGTYPE Operation against a key holding the wrong kind of value',
    );
    error.name = 'ReplyError';

    expect(isRedisConnectionError(error)).toBe(false);
  });

  it('should not treat unrelated errors or non-errors as connection errors', () => {
    expect(isRedisConnectionError(new Error('boom'))).toBe(false);
    expect(isRedisConnectionError('Connection is closed.')).toBe(false);
    expect(isRedisConnectionError(undefined)).toBe(false);
  });
});

describe('RedisQueueConnectionFactory', () => {
  let factory: RedisQueueConnectionFactory;

  const config: Record<string, string | number | undefined> = {
    REDIS_HOST: 'redis.internal',
    REDIS_PORT: 6380,
    REDIS_DB: 2,
    REDIS_PASSWORD: 'test-password',
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    mockRedis.connect.mockResolvedValue(undefined);
    mockRedis.ping.mockResolvedValue('PONG');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisQueueConnectionFactory,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    factory = module.get<RedisQueueConnectionFactory>(
      RedisQueueConnectionFactory,
    );
  });

  describe('create', () => {
    it('should build a lazily connected client without its own reconnects', async () => {
      await factory.create();

      expect(Redis).toHaveBeenCalledTimes(1);
      expect(Redis).toHaveBeenCalledWith({
        host: 'redis.internal',
        port: 6380,
        db: 2,
        password: 'test-password',
        lazyConnect: true,
        enableOfflineQueue: false,
        retryStrategy: expect.any(Function),
      });
      const [options] = mockRedisConstructor.mock.calls[0];
      expect(options.retryStrategy?.(1)).toBeNull();
      expect(mockRedis.connect).toHaveBeenCalledTimes(1);
      expect(mockRedis.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should wrap a refused connection as QueueConnectionError and drop the client', async () => {
      mockRedis.connect.mockRejectedValueOnce(
        socketError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:6380'),
      );

      await expect(factory.create()).rejects.toBeInstanceOf(
        QueueConnectionError,
      );
      expect(mockRedis.disconnect).toHaveBeenCalledTimes(1);
    });
  });

  describe('connection', () => {
    it('should return the payload of a BLPOP reply', async () => {
      mockRedis.blpop.mockResolvedValueOnce(['processing_queue', '{"a":1}']);
      const connection = await factory.create();

      await expect(connection.pop('processing_queue', 30)).resolves.toBe(
        '{"a":1}',
      );
      expect(mockRedis.blpop).toHaveBeenCalledWith('processing_queue', 30);
    });

    it('should return null when BLPOP times out', async () => {
      mockRedis.blpop.mockResolvedValueOnce(null);
      const connection = await factory.create();

      await expect(connection.pop('processing_queue', 30)).resolves.toBeNull();
    });

    it('should rethrow connection failures during BLPOP as QueueConnectionError', async () => {
      mockRedis.blpop.mockRejectedValueOnce(new Error('Connection is closed.'));
      const connection = await factory.create();

      const failure = connection.pop('processing_queue', 30);

      await expect(failure).rejects.toBeInstanceOf(QueueConnectionError);
      await expect(failure).rejects.toThrow('Connection is closed.');
    });

    it('should let reply errors through unchanged', async () => {
      const replyError = new Error('WRONGTYPE Operation against a key');
      replyError.name = 'ReplyError';
      mockRedis.blpop.mockRejectedValueOnce(replyError);
      const connection = await factory.create();

      await expect(connection.pop('processing_queue', 30)).rejects.toBe(
        replyError,
      );
    });

    it('should probe with PING', async () => {
      const connection = await factory.create();

      await connection.ping();

      expect(mockRedis.ping).toHaveBeenCalledTimes(1);
    });

    it('should disconnect on close', async () => {
      const connection = await factory.create();

      connection.close();

      expect(mockRedis.disconnect).toHaveBeenCalledTimes(1);
    });
  });
});
