import { BackoffStrategy } from '../config/environment';

export const BACKOFF_POLICY = Symbol('BACKOFF_POLICY');

/**
 * Delay before the next reconnect attempt. `attempt` counts consecutive
 * failures, starting at 0, and resets after a successful reconnect.
 */
export interface BackoffPolicy {
  delayFor(attempt: number): number;
}

export class FixedBackoff implements BackoffPolicy {
  constructor(private readonly delayMs: number) {}

  delayFor(_attempt: number): number {
    return this.delayMs;
  }
}

export class ExponentialBackoff implements BackoffPolicy {
  constructor(
    private readonly baseDelayMs: number,
    private readonly maxDelayMs: number,
  ) {}

  delayFor(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt));
  }
}

export const createBackoffPolicy = (
  strategy: BackoffStrategy,
  delayMs: number,
  maxDelayMs: number,
): BackoffPolicy =>
  strategy === 'exponential'
    ? new ExponentialBackoff(delayMs, maxDelayMs)
    : new FixedBackoff(delayMs);
