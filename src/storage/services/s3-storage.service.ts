import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { stringify } from 'lossless-json';
import { EnvironmentVariables } from '../../config/environment';
import { CLOCK, Clock } from '../../shared/clock';
import { MergedRecord } from '../../shared/interfaces/record.interface';
import { PersistOutcome } from '../interfaces/persist-outcome.interface';

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

/**
 * Service for writing merged records to S3.
 *
 * @remarks
 * **Key layout**
 *
 * `{YYYY-MM-DD}/{YYYYMMDD_HHMMSS_ffffff}.json`, in UTC. The date prefix
 * partitions objects per day; the microsecond filename sorts in write order.
 * Two writes in the same microsecond would collide, which is accepted.
 *
 * **No retry**
 *
 * A failed write is logged and reported as `failed`; the record is dropped.
 *
 * The bucket is expected to exist already.
 */
@Injectable()
export class S3StorageService {
  private readonly logger = new Logger(S3StorageService.name);
  private s3Client: S3Client;
  private bucket: string;

  constructor(
    private configService: ConfigService<EnvironmentVariables, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.s3Client = new S3Client({
      region: this.configService.get('S3_REGION', { infer: true }),
      endpoint: this.configService.get('S3_ENDPOINT_URL', { infer: true }),
      credentials: {
        accessKeyId: this.configService.get('S3_ACCESS_KEY', { infer: true }),
        secretAccessKey: this.configService.get('S3_SECRET_KEY', {
          infer: true,
        }),
      },
      forcePathStyle: this.configService.get('S3_FORCE_PATH_STYLE', {
        infer: true,
      }),
    });
    this.bucket = this.configService.get('S3_BUCKET_NAME', { infer: true });
  }

  /**
   * Build the object key for a write happening at `epochMicros`.
   *
   * @returns key in format: {YYYY-MM-DD}/{YYYYMMDD_HHMMSS_ffffff}.json
   */
  generateKey(epochMicros: number): string {
    const at = new Date(Math.floor(epochMicros / 1000));
    const day = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
    const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
    const micros = pad(epochMicros % 1_000_000, 6);
    const folder = `${day.slice(0, 4)}-${day.slice(4, 6)}-${day.slice(6)}`;

    return `${folder}/${day}_${time}_${micros}.json`;
  }

  /**
   * Serialize `record` and upload it under a fresh timestamp key. Never throws.
   */
  async storeRecord(record: MergedRecord): Promise<PersistOutcome> {
    let key: string | undefined;

    try {
      // non-ASCII stays unescaped; numbers keep their source text
      const body = stringify(record);
      if (body === undefined) {
        throw new Error('record has no JSON representation');
      }
      key = this.generateKey(this.clock.nowMicros());

      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: 'application/json',
        }),
      );

      this.logger.log(`Successfully stored data in S3: ${key}`);
      return { kind: 'stored', key };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to store data in S3${key ? ` at ${key}` : ''}: ${message}`,
      );
      return { kind: 'failed', key, message };
    }
  }
}
