/**
 * Metric Snapshot Types
 *
 * Typed shapes returned by the metric sources and the per-cycle Sample record
 * assembled by the sampling orchestrator.
 *
 * @module types/metrics
 */

import type { LogEvent } from './log-events.js';

/**
 * Keyspace (or keyspace.table) operation counters.
 *
 * Counts are cumulative over the lifetime of the node process. Latencies are
 * lifetime averages as reported by the node, not per-interval figures.
 */
export interface KeyspaceStats {
  readCount: number;
  writeCount: number;
  readLatencyMs: number;
  writeLatencyMs: number;
  keyCacheHitRate?: number;
  rowCacheHitRate?: number;
}

export interface ThreadPoolCounters {
  active: number;
  pending: number;
  completed: number;
}

export interface ThreadPoolStats {
  readStage: ThreadPoolCounters;
  readRepairStage: ThreadPoolCounters;
}

/**
 * One raw histogram row as supplied by a source.
 *
 * `[upperBound, readCount, writeCount]`, or `[upperBound, readCount]` when the
 * resource recorded no writes. Upper bounds are in microseconds.
 */
export type HistogramRow = readonly [number, number, number] | readonly [number, number];

export interface HistogramBucket {
  upperBound: number;
  readCount: number;
  writeCount: number;
}

export type HistogramSnapshot = readonly HistogramBucket[];

export interface CompactionTask {
  type: string;
  percentComplete: number;
}

export interface CompactionStats {
  pendingTasks: number;
  tasks: CompactionTask[];
}

export interface DiskCounters {
  readsCompleted: number;
  sectorsRead: number;
  writesCompleted: number;
  sectorsWritten: number;
}

/**
 * Cumulative CPU time per mode, in clock ticks.
 */
export interface CpuCounters {
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
  steal: number;
}

export interface NetworkCounters {
  rxBytes: number;
  txBytes: number;
}

/**
 * Named set of non-negative cumulative counters captured at one instant.
 */
export interface CounterSnapshot {
  /** Epoch milliseconds at capture */
  capturedAt: number;
  counters: Readonly<Record<string, number>>;
}

export interface CpuBreakdown {
  user: number;
  nice: number;
  system: number;
  iowait: number;
  steal: number;
  idle: number;
}

export interface DiskRates {
  readsPerSec: number;
  writesPerSec: number;
  readKBps: number;
  writeKBps: number;
}

export interface NetworkRates {
  rxKBps: number;
  txKBps: number;
}

export interface CacheSummary {
  keyCacheHitRate: number | null;
  rowCacheHitRate: number | null;
  readStagePending: number;
}

/**
 * Latency percentiles in milliseconds. Zero means nothing was observed.
 */
export interface PercentileSummary {
  read99: number;
  read95: number;
  write99: number;
  write95: number;
}

export interface CompactionSummary {
  pending: number;
  tasks: readonly CompactionTask[];
}

/**
 * Per-cycle output record. Rate fields are per second over the cycle;
 * latency fields are the node's lifetime averages at sample time.
 */
export interface Sample {
  readonly sequence: number;
  readonly timestamp?: string;
  readonly epoch?: number;
  readonly reads: number;
  readonly writes: number;
  readonly readLatencyMs: number;
  readonly writeLatencyMs: number;
  readonly cache?: Readonly<CacheSummary>;
  readonly cpu: Readonly<CpuBreakdown>;
  readonly disk: Readonly<DiskRates>;
  readonly network: Readonly<NetworkRates>;
  readonly readRepairs?: number;
  readonly percentiles?: Readonly<PercentileSummary>;
  readonly compaction?: Readonly<CompactionSummary>;
  readonly events: readonly LogEvent[];
}

export type CycleOutcome =
  | { kind: 'sample'; sample: Sample }
  | { kind: 'unresponsive'; sequence: number; at: number }
  | { kind: 'baseline'; sequence: number };
