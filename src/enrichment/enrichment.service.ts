import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parse } from 'lossless-json';
import { EnvironmentVariables } from '../config/environment';
import { isJsonObject } from '../shared/interfaces/record.interface';
import { EnrichmentOutcome } from './interfaces/enrichment-outcome.interface';

/**
 * Client for the external detail view API.
 *
 * @remarks
 * **One attempt per item**
 *
 * A single `POST {"url": ...}` bounded by `API_TIMEOUT`. The timer stays armed
 * until the body is read, so a response that stalls mid-body also counts as a
 * timeout. There are no retries here: a failed item is logged and dropped, and
 * the consumer moves on to the next one.
 *
 * **Empty bodies count as success**
 *
 * A 2xx `{}` is a valid enrichment that adds no fields, so the item is stored
 * as it arrived. Only a missing, non-JSON or non-object body drops the item.
 */
@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {
    this.endpoint = this.configService.get('DETAIL_VIEW_API', { infer: true });
    this.timeoutMs =
      this.configService.get('API_TIMEOUT', { infer: true }) * 1000;
  }

  /**
   * Fetch details for `url`. Never throws.
   */
  async enrich(url: string): Promise<EnrichmentOutcome> {
    this.logger.log(`Calling detail view API for URL: ${url}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.request(url, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.error(
          `API request timed out after ${this.timeoutMs}ms for URL: ${url}`,
        );
        return { kind: 'timeout', timeoutMs: this.timeoutMs };
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`API request failed for URL ${url}: ${message}`);
      return { kind: 'transport-error', message };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async request(
    url: string,
    signal: AbortSignal,
  ): Promise<EnrichmentOutcome> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
      },
      body: JSON.stringify({ url }),
      signal,
    });

    if (!response.ok) {
      await response.text().catch(() => '');
      this.logger.error(
        `API request failed for URL ${url}: HTTP ${response.status}`,
      );
      return { kind: 'http-error', status: response.status };
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to parse API response for URL ${url}: ${message}`);
      return { kind: 'invalid-body', message };
    }

    if (!isJsonObject(body)) {
      const message = 'response body is not a JSON object';
      this.logger.error(`Failed to parse API response for URL ${url}: ${message}`);
      return { kind: 'invalid-body', message };
    }

    return { kind: 'enriched', data: body };
  }
}
