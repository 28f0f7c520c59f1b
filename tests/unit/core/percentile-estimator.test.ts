import { describe, it, expect } from 'vitest';
import {
  decodeHistogram,
  estimatePercentiles,
  formatPercentile,
  percentile,
} from '@/core/percentile-estimator.js';

describe('Percentile Estimator', () => {
  describe('percentile', () => {
    it('should pick the first bucket whose running count exceeds the threshold', () => {
      // total 10, threshold floor(9.9) = 9, running sums 1, 3, 10
      const histogram = decodeHistogram([
        [10, 1, 0],
        [20, 2, 0],
        [30, 7, 0],
      ]);

      expect(percentile(histogram, 99, 'read')).toBe(0.03);
      expect(formatPercentile(percentile(histogram, 99, 'read'))).toBe('0.030');
    });

    it('should require the running count to strictly exceed the threshold', () => {
      // total 20, p95 threshold 19: sums 10, 19, 20 -> third bucket
      const histogram = decodeHistogram([
        [100, 10, 0],
        [200, 9, 0],
        [300, 1, 0],
      ]);

      expect(percentile(histogram, 95, 'read')).toBe(0.3);
      // p50 threshold 10: sums 10 (not > 10), 19 -> second bucket
      expect(percentile(histogram, 50, 'read')).toBe(0.2);
    });

    it('should count reads and writes independently', () => {
      const histogram = decodeHistogram([
        [1000, 0, 50],
        [2000, 4, 50],
        [5000, 0, 0],
        [8000, 1, 0],
      ]);

      // reads: total 5, p99 threshold 4 -> sums 0, 4, 4, 5 -> 8000us
      expect(percentile(histogram, 99, 'read')).toBe(8);
      // writes: total 100, p95 threshold 95 -> sums 50, 100 -> 2000us
      expect(percentile(histogram, 95, 'write')).toBe(2);
    });

    it('should return 0 when nothing was observed', () => {
      const histogram = decodeHistogram([
        [10, 0, 0],
        [20, 0, 0],
      ]);

      expect(percentile(histogram, 99, 'read')).toBe(0);
      expect(percentile(histogram, 95, 'write')).toBe(0);
      expect(percentile(decodeHistogram([]), 99, 'read')).toBe(0);
    });
  });

  describe('decodeHistogram', () => {
    it('should decode three-column rows as bound, read, write', () => {
      expect(decodeHistogram([[10, 3, 4]])).toEqual([{ upperBound: 10, readCount: 3, writeCount: 4 }]);
    });

    it('should decode two-column rows as read-only buckets', () => {
      expect(decodeHistogram([[10, 3]])).toEqual([{ upperBound: 10, readCount: 3, writeCount: 0 }]);
    });

    it('should order buckets by upper bound', () => {
      const buckets = decodeHistogram([
        [30, 1],
        [10, 2, 1],
        [20, 3],
      ]);

      expect(buckets.map((bucket) => bucket.upperBound)).toEqual([10, 20, 30]);
    });

    it('should estimate writes as zero for read-only rows', () => {
      const histogram = decodeHistogram([
        [50, 1],
        [60, 1],
      ]);

      expect(percentile(histogram, 99, 'write')).toBe(0);
      expect(percentile(histogram, 99, 'read')).toBe(0.06);
    });
  });

  describe('estimatePercentiles', () => {
    it('should compute all four combinations', () => {
      const histogram = decodeHistogram([
        [1000, 90, 0],
        [2000, 5, 98],
        [4000, 5, 2],
      ]);

      // reads: total 100; p99 threshold 99 -> sums 90, 95, 100 -> 4000
      //        p95 threshold 95 -> 95 is not > 95 -> 4000
      // writes: total 100; p99 threshold 99 -> sums 0, 98, 100 -> 4000
      //         p95 threshold 95 -> 98 > 95 -> 2000
      expect(estimatePercentiles(histogram)).toEqual({
        read99: 4,
        read95: 4,
        write99: 4,
        write95: 2,
      });
    });

    it('should report zero for every combination on an all-zero histogram', () => {
      const histogram = decodeHistogram([
        [10, 0, 0],
        [20, 0, 0],
        [30, 0, 0],
      ]);

      expect(estimatePercentiles(histogram)).toEqual({ read99: 0, read95: 0, write99: 0, write95: 0 });
      expect(formatPercentile(0)).toBe('0.00');
    });
  });

  describe('formatPercentile', () => {
    it('should render three decimals', () => {
      expect(formatPercentile(1.5)).toBe('1.500');
      expect(formatPercentile(0.012)).toBe('0.012');
    });
  });
});
