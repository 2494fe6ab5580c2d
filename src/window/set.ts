import { TimeWindow, type WindowOptions } from './base.js';

export type WindowedSetOptions<T> = WindowOptions & {
  /**
   * Identity of a value. Two values are the same element when their keys are
   * SameValueZero-equal. Defaults to the value itself.
   */
  key?: (value: T) => unknown;
};

/**
 * A set of values that expire once they are `windowMs` old.
 *
 * Storage is keyed on the (timestamp, key) pair: inserting a value that is
 * already present at a different instant adds a second storage entry rather
 * than refreshing the first. `len()` and `iter()` see every storage entry,
 * `drain()` collapses them to one value per key.
 */
export class WindowedSet<T> extends TimeWindow<T> {
  // key -> (timestamp -> value)
  private buckets = new Map<unknown, Map<number, T>>();
  private readonly keyOf: (value: T) => unknown;

  static withDuration<T>(windowMs: number, options?: WindowedSetOptions<T>): WindowedSet<T> {
    return new WindowedSet<T>(windowMs, options);
  }

  /** Stamps every initial value with one shared instant, so duplicates collapse. */
  static fromCollection<T>(initial: Iterable<T>, windowMs?: number, options?: WindowedSetOptions<T>): WindowedSet<T> {
    const set = new WindowedSet<T>(windowMs, options);
    const t = set.now();
    for (const v of initial) set.insertWithTimestamp(v, t);
    return set;
  }

  constructor(windowMs?: number, options: WindowedSetOptions<T> = {}) {
    super(windowMs, options);
    this.keyOf = options.key ?? ((v) => v);
  }

  insert(value: T): void {
    this.insertWithTimestamp(value, this.now());
  }

  /** Inserts with a caller-chosen instant on the collection's clock. Not validated. */
  insertWithTimestamp(value: T, timestamp: number): void {
    const k = this.keyOf(value);
    let bucket = this.buckets.get(k);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(k, bucket);
    }
    // an existing (timestamp, key) entry keeps its stored value
    if (!bucket.has(timestamp)) bucket.set(timestamp, value);
  }

  has(value: T): boolean {
    this.purge();
    return this.buckets.has(this.keyOf(value));
  }

  /** Number of storage entries, counting a value stored at two instants twice. */
  len(): number {
    return this.purge();
  }

  iter(): IterableIterator<T> {
    this.purge();
    return storedValues([...this.buckets.values()].map((bucket) => [...bucket.values()]));
  }

  drain(): T[] {
    this.purge();
    const out: T[] = [];
    for (const bucket of this.buckets.values()) {
      const first = bucket.values().next();
      if (!first.done) out.push(first.value);
    }
    this.buckets = new Map();
    return out;
  }

  clone(): WindowedSet<T> {
    const copy = new WindowedSet<T>(this.windowDuration(), { clock: this.clock, logger: this.log, key: this.keyOf });
    for (const [k, bucket] of this.buckets) copy.buckets.set(k, new Map(bucket));
    return copy;
  }

  private purge(): number {
    const next = new Map<unknown, Map<number, T>>();
    let evicted = 0;
    let remaining = 0;
    for (const [k, bucket] of this.buckets) {
      const kept = new Map<number, T>();
      for (const [t, v] of bucket) {
        if (this.isFresh(t)) kept.set(t, v);
        else evicted++;
      }
      if (kept.size > 0) {
        next.set(k, kept);
        remaining += kept.size;
      }
    }
    this.buckets = next;
    this.logEviction('set', evicted, remaining);
    return remaining;
  }
}

function* storedValues<T>(buckets: readonly T[][]): IterableIterator<T> {
  for (const bucket of buckets) {
    for (const v of bucket) yield v;
  }
}
