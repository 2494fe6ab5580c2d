import { TimeWindow, type WindowOptions } from './base.js';

type Entry<T> = { t: number; v: T };

/**
 * An append-only sequence whose entries expire once they are `windowMs` old.
 * Expired entries are purged when the sequence is read, never on push.
 * Duplicates are kept; iteration follows insertion order.
 */
export class WindowedSequence<T> extends TimeWindow<T> {
  private entries: Entry<T>[] = [];

  static withDuration<T>(windowMs: number, options?: WindowOptions): WindowedSequence<T> {
    return new WindowedSequence<T>(windowMs, options);
  }

  constructor(windowMs?: number, options?: WindowOptions) {
    super(windowMs, options);
  }

  push(value: T): void {
    this.entries.push({ t: this.now(), v: value });
  }

  /** Appends with a caller-chosen instant on the collection's clock. Not validated. */
  pushWithTimestamp(value: T, timestamp: number): void {
    this.entries.push({ t: timestamp, v: value });
  }

  len(): number {
    this.purge();
    return this.entries.length;
  }

  iter(): IterableIterator<T> {
    this.purge();
    return values(this.entries.slice());
  }

  drain(): T[] {
    this.purge();
    const out = this.entries.map((e) => e.v);
    this.entries = [];
    return out;
  }

  // Entries pushed with explicit timestamps may be out of order, so no suffix shortcut.
  private purge(): void {
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => this.isFresh(e.t));
    this.logEviction('sequence', before - this.entries.length, this.entries.length);
  }
}

function* values<T>(entries: readonly Entry<T>[]): IterableIterator<T> {
  for (const e of entries) yield e.v;
}
