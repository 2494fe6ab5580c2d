import type { Logger } from 'pino';
import { defaultWindowMs, parseWindowMs } from '../config.js';
import { monotonicClock, isWithinWindow, type Clock } from '../lib/clock.js';
import { forComponent } from '../logger.js';

export type WindowOptions = {
  /** Monotonic time source; defaults to `performance.now()`. */
  clock?: Clock;
  logger?: Logger;
};

/**
 * Shared state of the windowed collections: an immutable window, the clock
 * entries are stamped with, and the predicate eviction filters by.
 */
export abstract class TimeWindow<T> implements Iterable<T> {
  protected readonly clock: Clock;
  protected readonly log: Logger;
  private readonly windowMs: number;

  constructor(windowMs: number | undefined, options: WindowOptions = {}) {
    this.windowMs = parseWindowMs(windowMs ?? defaultWindowMs());
    this.clock = options.clock ?? monotonicClock;
    this.log = options.logger ?? forComponent('timewindow');
  }

  windowDuration(): number {
    return this.windowMs;
  }

  /** Evicts expired entries and returns the number of storage entries left. */
  abstract len(): number;

  /** Evicts expired entries, then yields the surviving values. */
  abstract iter(): IterableIterator<T>;

  /** Evicts expired entries, hands the survivors to the caller and empties the collection. */
  abstract drain(): T[];

  isEmpty(): boolean {
    return this.len() === 0;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.iter();
  }

  protected isFresh(timestamp: number): boolean {
    return isWithinWindow(this.clock, timestamp, this.windowMs);
  }

  protected now(): number {
    return this.clock.now();
  }

  protected logEviction(collection: string, evicted: number, remaining: number): void {
    if (evicted === 0) return;
    this.log.debug({ collection, evicted, remaining, windowMs: this.windowMs }, 'timewindow: evicted expired entries');
  }
}
