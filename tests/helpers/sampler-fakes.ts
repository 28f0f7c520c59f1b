/**
 * In-process stand-ins for metric sources and the clock.
 */

import { pino } from 'pino';
import { validateConfig } from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import type { DatabaseStatsSource, HostStatsSource, TargetRef } from '../../src/sources/types.js';
import type { Clock } from '../../src/utils/time.js';
import type {
  CompactionStats,
  CpuCounters,
  DiskCounters,
  HistogramRow,
  KeyspaceStats,
  NetworkCounters,
  ThreadPoolStats,
} from '../../src/types/metrics.js';
import type { SamplerConfig, SamplerConfigInput } from '../../src/types/schemas/config.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Clock whose sleep() advances time instantly.
 */
export class ManualClock implements Clock {
  public sleeps: number[] = [];

  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/**
 * Database source replaying scripted keyspace readings; `null` entries
 * simulate an unresponsive node. The last entry repeats once the script is
 * exhausted.
 */
export class ScriptedDatabase implements DatabaseStatsSource {
  public keyspaceCalls: TargetRef[] = [];
  public threadPoolCalls = 0;
  public histogramCalls = 0;
  public compactionCalls = 0;

  public threadPools: Array<ThreadPoolStats | null> = [];
  public histogram: HistogramRow[] | null = null;
  public compactions: CompactionStats | null = null;

  constructor(private readonly keyspaces: Array<KeyspaceStats | null>) {}

  async readKeyspace(target: TargetRef): Promise<KeyspaceStats | null> {
    const index = Math.min(this.keyspaceCalls.length, this.keyspaces.length - 1);
    this.keyspaceCalls.push(target);
    return this.keyspaces[index] ?? null;
  }

  async readThreadPools(): Promise<ThreadPoolStats | null> {
    const index = Math.min(this.threadPoolCalls, this.threadPools.length - 1);
    this.threadPoolCalls++;
    return index < 0 ? null : (this.threadPools[index] ?? null);
  }

  async readHistogram(): Promise<HistogramRow[] | null> {
    this.histogramCalls++;
    return this.histogram;
  }

  async readCompactions(): Promise<CompactionStats | null> {
    this.compactionCalls++;
    return this.compactions;
  }
}

/**
 * Host source replaying scripted readings (last entry repeats).
 */
export class ScriptedHost implements HostStatsSource {
  public diskCalls = 0;
  public cpuCalls = 0;
  public networkCalls = 0;

  constructor(
    private readonly disks: DiskCounters[] = [{ readsCompleted: 0, sectorsRead: 0, writesCompleted: 0, sectorsWritten: 0 }],
    private readonly cpus: CpuCounters[] = [cpu({})],
    private readonly networks: NetworkCounters[] = [{ rxBytes: 0, txBytes: 0 }]
  ) {}

  async readDisk(): Promise<DiskCounters | null> {
    return this.disks[Math.min(this.diskCalls++, this.disks.length - 1)] ?? null;
  }

  async readCpu(): Promise<CpuCounters | null> {
    return this.cpus[Math.min(this.cpuCalls++, this.cpus.length - 1)] ?? null;
  }

  async readNetwork(): Promise<NetworkCounters | null> {
    return this.networks[Math.min(this.networkCalls++, this.networks.length - 1)] ?? null;
  }
}

export function cpu(values: Partial<CpuCounters>): CpuCounters {
  return { user: 0, nice: 0, system: 0, idle: 0, iowait: 0, irq: 0, softirq: 0, steal: 0, ...values };
}

export function keyspace(readCount: number, writeCount: number, extra: Partial<KeyspaceStats> = {}): KeyspaceStats {
  return { readCount, writeCount, readLatencyMs: 0.5, writeLatencyMs: 0.1, ...extra };
}

/**
 * Valid configuration with test-friendly defaults (2s interval, keyspace "app").
 */
export function makeConfig(overrides: SamplerConfigInput = {}): SamplerConfig {
  return validateConfig({
    target: { ...DEFAULT_CONFIG.target, keyspace: 'app', ...overrides.target },
    sampling: { ...DEFAULT_CONFIG.sampling, interval_seconds: 2, ...overrides.sampling },
    host: { ...DEFAULT_CONFIG.host, ...overrides.host },
    columns: { ...DEFAULT_CONFIG.columns, ...overrides.columns },
    log: { ...DEFAULT_CONFIG.log, ...overrides.log },
    output: { ...DEFAULT_CONFIG.output, ...overrides.output },
    nodetool: { ...DEFAULT_CONFIG.nodetool, ...overrides.nodetool },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  });
}
