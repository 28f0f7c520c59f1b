/**
 * Metric source capability interfaces.
 *
 * Every query is awaited on its own; the orchestrator never overlaps two
 * queries. `null` means the source returned nothing for the requested target.
 */

import type {
  CompactionStats,
  CpuCounters,
  DiskCounters,
  HistogramRow,
  KeyspaceStats,
  NetworkCounters,
  ThreadPoolStats,
} from '../types/metrics.js';

export interface TargetRef {
  keyspace: string;
  table?: string | null;
}

/**
 * Database-level statistics. `readKeyspace` is the primary query: a `null`
 * result marks the node unresponsive for the cycle.
 */
export interface DatabaseStatsSource {
  readKeyspace(target: TargetRef): Promise<KeyspaceStats | null>;
  readThreadPools(): Promise<ThreadPoolStats | null>;
  readHistogram(target: { keyspace: string; table: string }): Promise<HistogramRow[] | null>;
  readCompactions(): Promise<CompactionStats | null>;
}

/**
 * Operating-system counters.
 */
export interface HostStatsSource {
  readDisk(device: string): Promise<DiskCounters | null>;
  readCpu(): Promise<CpuCounters | null>;
  readNetwork(iface: string): Promise<NetworkCounters | null>;
}
