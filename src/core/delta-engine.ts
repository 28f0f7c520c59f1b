/**
 * Delta Engine
 *
 * Turns successive snapshots of monotonically increasing counters into
 * per-interval deltas and per-second rates.
 *
 * Counter reset policy: a current value below its predecessor means the
 * counter was reset (usually a node restart). No negative figure is ever
 * produced; the cycle reports zero and the current value becomes the new
 * baseline once the caller stores the current snapshot.
 *
 * Latencies are deliberately not handled here. Sources report them as
 * lifetime averages and they are passed through as observed, so a Sample
 * mixes per-interval rates with lifetime latencies.
 */

import type { CounterSnapshot } from '../types/metrics.js';

/**
 * Per-interval increase of a cumulative counter (0 on reset).
 */
export function delta(currentValue: number, previousValue: number): number {
  if (currentValue < previousValue) {
    return 0;
  }
  return currentValue - previousValue;
}

/**
 * Per-second rate of a cumulative counter, truncated toward zero.
 *
 * @param intervalSeconds - Must be > 0
 * @throws {RangeError} if intervalSeconds is not positive
 *
 * @example
 * ```typescript
 * rate(1500, 1000, 2)   // => 250
 * rate(1001, 1000, 2)   // => 0
 * rate(10, 1000, 2)     // => 0 (reset)
 * ```
 */
export function rate(currentValue: number, previousValue: number, intervalSeconds: number): number {
  if (!(intervalSeconds > 0)) {
    throw new RangeError(`intervalSeconds must be > 0, got ${intervalSeconds}`);
  }
  return Math.trunc(delta(currentValue, previousValue) / intervalSeconds);
}

/**
 * Seconds between two snapshots, falling back to the nominal interval when
 * the clock did not move forward.
 */
export function elapsedSeconds(
  current: CounterSnapshot,
  previous: CounterSnapshot,
  nominalIntervalSeconds: number
): number {
  const elapsed = (current.capturedAt - previous.capturedAt) / 1000;
  return elapsed > 0 ? elapsed : nominalIntervalSeconds;
}

/**
 * Rates for every counter present in both snapshots.
 */
export function rates(
  current: CounterSnapshot,
  previous: CounterSnapshot,
  intervalSeconds: number
): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [name, value] of Object.entries(current.counters)) {
    const before = previous.counters[name];
    if (before !== undefined) {
      result[name] = rate(value, before, intervalSeconds);
    }
  }
  return result;
}

/**
 * Deltas for every counter present in both snapshots.
 */
export function deltas(current: CounterSnapshot, previous: CounterSnapshot): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [name, value] of Object.entries(current.counters)) {
    const before = previous.counters[name];
    if (before !== undefined) {
      result[name] = delta(value, before);
    }
  }
  return result;
}
