import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import {
  parseCompactionStats,
  parseHistogram,
  parseTableStats,
  parseThreadPools,
} from '@/sources/nodetool-parsers.js';

function fixture(name: string): string {
  return readFileSync(new URL(`../../fixtures/nodetool/${name}`, import.meta.url), 'utf-8');
}

describe('nodetool parsers', () => {
  describe('parseTableStats', () => {
    const output = fixture('cfstats.txt');

    it('should read keyspace-level counters', () => {
      expect(parseTableStats(output, { keyspace: 'app' })).toEqual({
        readCount: 1200,
        writeCount: 3400,
        readLatencyMs: 0.532,
        writeLatencyMs: 0.041,
      });
    });

    it('should read table-level counters and cache hit rates', () => {
      expect(parseTableStats(output, { keyspace: 'app', table: 'users' })).toEqual({
        readCount: 800,
        writeCount: 2100,
        readLatencyMs: 0.61,
        writeLatencyMs: 0,
        keyCacheHitRate: 0.935,
      });
    });

    it('should not mix sections of different keyspaces', () => {
      expect(parseTableStats(output, { keyspace: 'system' })?.readCount).toBe(55);
    });

    it('should return null for an unknown keyspace or table', () => {
      expect(parseTableStats(output, { keyspace: 'missing' })).toBeNull();
      expect(parseTableStats(output, { keyspace: 'app', table: 'missing' })).toBeNull();
      expect(parseTableStats('', { keyspace: 'app' })).toBeNull();
    });
  });

  describe('parseThreadPools', () => {
    it('should read read-stage and read-repair-stage rows', () => {
      expect(parseThreadPools(fixture('tpstats.txt'))).toEqual({
        readStage: { active: 2, pending: 5, completed: 123456 },
        readRepairStage: { active: 0, pending: 1, completed: 789 },
      });
    });

    it('should treat a missing read-repair stage as idle', () => {
      const output = 'Pool Name   Active Pending Completed\nReadStage        0       0        10\n';

      expect(parseThreadPools(output)?.readRepairStage).toEqual({ active: 0, pending: 0, completed: 0 });
    });

    it('should return null without a read stage', () => {
      expect(parseThreadPools('Pool Name   Active Pending Completed\n')).toBeNull();
    });
  });

  describe('parseHistogram', () => {
    it('should map latency columns from the header', () => {
      expect(parseHistogram(fixture('cfhistograms.txt'))).toEqual([
        [1, 0, 0],
        [10, 1, 4],
        [20, 2, 6],
        [30, 7, 0],
      ]);
    });

    it('should emit read-only rows without a write column', () => {
      expect(parseHistogram(fixture('cfhistograms-read-only.txt'))).toEqual([
        [10, 1],
        [20, 2],
      ]);
    });

    it('should return null without a header', () => {
      expect(parseHistogram('nothing here')).toBeNull();
    });
  });

  describe('parseCompactionStats', () => {
    it('should read pending count and active tasks', () => {
      expect(parseCompactionStats(fixture('compactionstats.txt'))).toEqual({
        pendingTasks: 3,
        tasks: [
          { type: 'Compaction', percentComplete: 25 },
          { type: 'Validation', percentComplete: 50 },
        ],
      });
    });

    it('should accept an idle node', () => {
      expect(parseCompactionStats('pending tasks: 0\n')).toEqual({ pendingTasks: 0, tasks: [] });
    });

    it('should return null without a pending count', () => {
      expect(parseCompactionStats('error: connection refused')).toBeNull();
    });
  });
});
