import { Injectable } from '@nestjs/common';
import { performance } from 'perf_hooks';

export const CLOCK = Symbol('CLOCK');

/**
 * Time source for the worker. Injected so tests can pin timestamps and skip
 * real sleeps.
 */
export interface Clock {
  /** Wall-clock time in microseconds since the Unix epoch. */
  nowMicros(): number;

  sleep(ms: number): Promise<void>;
}

/**
 * Milliseconds come from `Date.now()`, so readings follow NTP steps and
 * suspends. `performance.now()` supplies only the sub-millisecond digits.
 */
@Injectable()
export class SystemClock implements Clock {
  private lastMicros = 0;

  nowMicros(): number {
    const fraction = Math.floor((performance.now() % 1) * 1000);
    const micros = Date.now() * 1000 + fraction;
    // strictly increasing within the process
    this.lastMicros = micros > this.lastMicros ? micros : this.lastMicros + 1;
    return this.lastMicros;
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
