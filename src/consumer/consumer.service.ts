import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/environment';
import {
  QUEUE_CONNECTION_FACTORY,
  QueueConnection,
  QueueConnectionFactory,
} from '../messaging/interfaces/queue-connection.interface';
import { QueueConnectionError } from '../messaging/queue-connection.error';
import { CLOCK, Clock } from '../shared/clock';
import {
  ConnectionState,
  ConsumerState,
} from '../shared/constants/consumer-state.enum';
import { BACKOFF_POLICY, BackoffPolicy } from './backoff';
import { ItemProcessorService } from './item-processor.service';

/**
 * Long-running consumer for the work queue.
 *
 * @remarks
 * **Design Decision: Blocking Pop With a Bounded Wait**
 *
 * Each idle iteration issues one BLPOP that returns after at most
 * `QUEUE_POP_TIMEOUT` seconds, so a dead connection surfaces within that
 * window and the loop never blocks forever.
 *
 * **Design Decision: One Item at a Time**
 *
 * Items are processed sequentially, end to end. Throughput scales by running
 * more processes against the same list; BLPOP hands each item to exactly one
 * of them.
 *
 * **Design Decision: Unbounded Reconnects**
 *
 * A connection failure moves the loop to `reconnecting`. Every attempt builds
 * a fresh connection from the startup configuration and PINGs it; a failed
 * attempt waits according to the injected {@link BackoffPolicy}. There is no
 * attempt limit: the worker keeps trying until it is stopped.
 *
 * Any other error is logged and followed by a short fixed pause
 * (`ERROR_DELAY_MS`) before the next iteration.
 */
@Injectable()
export class ConsumerService implements OnApplicationShutdown {
  private readonly logger = new Logger(ConsumerService.name);
  private readonly queueName: string;
  private readonly popTimeoutSeconds: number;
  private readonly errorDelayMs: number;

  private connection: QueueConnection | null = null;
  private connectionState = ConnectionState.DISCONNECTED;
  private state = ConsumerState.STOPPED;
  private running = false;
  private stopping = false;
  private reconnectAttempt = 0;
  private hasConnected = false;

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    @Inject(QUEUE_CONNECTION_FACTORY)
    private readonly connectionFactory: QueueConnectionFactory,
    @Inject(BACKOFF_POLICY) private readonly backoff: BackoffPolicy,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly itemProcessor: ItemProcessorService,
  ) {
    this.queueName = this.configService.get('QUEUE_NAME', { infer: true });
    this.popTimeoutSeconds = this.configService.get('QUEUE_POP_TIMEOUT', {
      infer: true,
    });
    this.errorDelayMs = this.configService.get('ERROR_DELAY_MS', {
      infer: true,
    });
  }

  getState(): ConsumerState {
    return this.state;
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  /**
   * Consume until {@link requestStop} is called.
   *
   * @throws Error if the loop is already running
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Consumer is already running');
    }

    this.running = true;
    this.stopping = false;
    this.state = ConsumerState.IDLE;
    this.logger.log(`Starting consumer for queue: ${this.queueName}`);

    try {
      while (!this.stopping) {
        await this.tick();
      }
    } finally {
      this.closeConnection();
      this.running = false;
      this.state = ConsumerState.STOPPED;
      this.logger.log('Consumer stopped');
    }
  }

  /**
   * Ask the loop to exit. Closing the connection releases a pending BLPOP, so
   * the loop returns as soon as the current item (if any) is done.
   */
  requestStop(): void {
    if (!this.running) return;
    this.stopping = true;
    this.closeConnection();
  }

  onApplicationShutdown(): void {
    this.requestStop();
  }

  /**
   * One loop iteration: reconnect if needed, otherwise pop and process at most
   * one item. Never throws.
   */
  async tick(): Promise<void> {
    try {
      if (this.connectionState === ConnectionState.DISCONNECTED) {
        await this.reconnect();
        return;
      }
      await this.consumeNext();
    } catch (error) {
      // the connection was closed by requestStop()
      if (this.stopping) return;

      if (error instanceof QueueConnectionError) {
        this.logger.error(
          `Redis connection error (${error.message}). Attempting to reconnect...`,
        );
        this.markDisconnected();
        return;
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Unexpected error in main loop: ${message}`);
      this.state = ConsumerState.IDLE;
      await this.clock.sleep(this.errorDelayMs);
    }
  }

  private async consumeNext(): Promise<void> {
    const connection = this.connection;
    if (connection === null) {
      this.markDisconnected();
      return;
    }

    this.state = ConsumerState.IDLE;
    const payload = await connection.pop(
      this.queueName,
      this.popTimeoutSeconds,
    );
    if (payload === null) return;

    this.state = ConsumerState.PROCESSING;
    try {
      await this.itemProcessor.process(payload);
    } finally {
      this.state = ConsumerState.IDLE;
    }
  }

  private async reconnect(): Promise<void> {
    this.state = ConsumerState.RECONNECTING;
    this.closeConnection();

    try {
      const connection = await this.connectionFactory.create();
      this.connection = connection;
      await connection.ping();
    } catch (error) {
      if (this.stopping) return;

      const message = error instanceof Error ? error.message : 'Unknown error';
      const delayMs = this.backoff.delayFor(this.reconnectAttempt);
      this.reconnectAttempt += 1;
      this.logger.error(
        `Failed to ${this.hasConnected ? 'reconnect' : 'connect'} to Redis: ${message}. Retrying in ${delayMs}ms`,
      );
      await this.clock.sleep(delayMs);
      return;
    }

    this.connectionState = ConnectionState.CONNECTED;
    this.reconnectAttempt = 0;
    this.state = ConsumerState.IDLE;
    this.logger.log(
      this.hasConnected
        ? 'Redis reconnected successfully'
        : 'Connected to Redis',
    );
    this.hasConnected = true;
  }

  private markDisconnected(): void {
    this.connectionState = ConnectionState.DISCONNECTED;
    this.state = ConsumerState.RECONNECTING;
  }

  private closeConnection(): void {
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }
}
