import { performance } from 'node:perf_hooks';

/** A monotonic, non-decreasing millisecond clock. */
export type Clock = { now(): number };

export const monotonicClock: Clock = { now: () => performance.now() };

/** Milliseconds since `instant`, saturating at zero for instants ahead of the clock. */
export function elapsedSince(clock: Clock, instant: number): number {
  return Math.max(0, clock.now() - instant);
}

export function isWithinWindow(clock: Clock, instant: number, windowMs: number): boolean {
  return elapsedSince(clock, instant) < windowMs;
}
