/**
 * Percentile Estimator
 *
 * Estimates latency percentiles from a bucketed histogram covering one
 * sampling interval. The estimate is the upper bound of the first bucket whose
 * running count strictly exceeds `floor(total * p / 100)`, converted from
 * microseconds to milliseconds.
 */

import type {
  HistogramBucket,
  HistogramRow,
  HistogramSnapshot,
  PercentileSummary,
} from '../types/metrics.js';

export type OperationKind = 'read' | 'write';

const MICROS_PER_MILLI = 1000;

/**
 * Decode raw rows into buckets, sorted by upper bound.
 *
 * Three-column rows carry `[bound, read, write]`; two-column rows come from
 * resources that recorded no writes and carry `[bound, read]`.
 */
export function decodeHistogram(rows: readonly HistogramRow[]): HistogramSnapshot {
  const buckets: HistogramBucket[] = rows.map((row) => {
    if (row.length === 3) {
      return { upperBound: row[0], readCount: row[1], writeCount: row[2] };
    }
    return { upperBound: row[0], readCount: row[1], writeCount: 0 };
  });

  return buckets.sort((a, b) => a.upperBound - b.upperBound);
}

function countFor(bucket: HistogramBucket, kind: OperationKind): number {
  return kind === 'read' ? bucket.readCount : bucket.writeCount;
}

/**
 * Estimate one percentile in milliseconds.
 *
 * Returns 0 when nothing was observed, or when no bucket crosses the
 * threshold.
 *
 * @param targetPercentile - Percentile expressed 0-100
 *
 * @example
 * ```typescript
 * const histogram = decodeHistogram([[10, 1, 0], [20, 2, 0], [30, 7, 0]]);
 * percentile(histogram, 99, 'read')   // => 0.03
 * ```
 */
export function percentile(
  histogram: HistogramSnapshot,
  targetPercentile: number,
  operationKind: OperationKind
): number {
  let total = 0;
  for (const bucket of histogram) {
    total += countFor(bucket, operationKind);
  }

  if (total === 0) {
    return 0;
  }

  const threshold = Math.floor((total * targetPercentile) / 100);

  let running = 0;
  for (const bucket of histogram) {
    running += countFor(bucket, operationKind);
    if (running > threshold) {
      return bucket.upperBound / MICROS_PER_MILLI;
    }
  }

  return 0;
}

/**
 * The four reported combinations: {read, write} x {99th, 95th}.
 */
export function estimatePercentiles(histogram: HistogramSnapshot): PercentileSummary {
  return {
    read99: percentile(histogram, 99, 'read'),
    read95: percentile(histogram, 95, 'read'),
    write99: percentile(histogram, 99, 'write'),
    write95: percentile(histogram, 95, 'write'),
  };
}

/**
 * Render an estimate: `0.00` for "nothing observed", three decimals otherwise.
 */
export function formatPercentile(latencyMs: number): string {
  return latencyMs === 0 ? '0.00' : latencyMs.toFixed(3);
}
