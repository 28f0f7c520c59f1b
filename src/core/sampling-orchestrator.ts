/**
 * Sampling Orchestrator
 *
 * Drives the fixed-interval sampling loop:
 *
 *   Priming -> (Sampling -> Responsive|Unresponsive -> Emit -> Idle)* -> Terminal
 *
 * Priming reads baseline counters without emitting anything. Each cycle then
 * waits one interval, takes exactly one host (disk/CPU/network) reading,
 * queries the enabled database sources in sequence and emits either a Sample
 * or an unresponsive marker. An unresponsive cycle leaves the previous
 * counters untouched, so the next successful cycle covers the whole gap.
 *
 * The loop ends when the configured cycle count is reached or stop() is
 * called; there is no other termination condition.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ConfigurationError, toSamplerError, type SamplerError } from '../api/errors.js';
import type { SamplerConfig } from '../types/schemas/config.js';
import type { LogEvent } from '../types/log-events.js';
import type {
  CompactionStats,
  CounterSnapshot,
  CpuBreakdown,
  CpuCounters,
  CycleOutcome,
  DiskCounters,
  HistogramRow,
  KeyspaceStats,
  NetworkCounters,
  Sample,
  ThreadPoolStats,
} from '../types/metrics.js';
import type { DatabaseStatsSource, HostStatsSource } from '../sources/types.js';
import { deltas, elapsedSeconds, rates } from './delta-engine.js';
import { decodeHistogram, estimatePercentiles } from './percentile-estimator.js';
import { extractEvents } from './log-event-classifier.js';
import { LogWatermark } from './log-watermark.js';
import { percentOf, roundTo } from '../utils/math-helpers.js';
import { formatClockTime, systemClock, toEpochSeconds, type Clock } from '../utils/time.js';

export type SamplerState =
  | 'idle'
  | 'priming'
  | 'sampling'
  | 'responsive'
  | 'unresponsive'
  | 'emit'
  | 'terminal';

export interface UnresponsiveInfo {
  sequence: number;
  at: number;
}

/**
 * Orchestrator events
 */
export interface SamplingOrchestratorEvents {
  state: (state: SamplerState) => void;
  sample: (sample: Sample) => void;
  unresponsive: (info: UnresponsiveInfo) => void;
  logEvent: (event: LogEvent) => void;
  error: (error: SamplerError) => void;
}

export interface SamplingOrchestratorOptions {
  config: SamplerConfig;
  database: DatabaseStatsSource;
  host: HostStatsSource;
  logger?: Logger;
  clock?: Clock;
}

export interface RunSummary {
  cycles: number;
  samples: number;
  unresponsive: number;
}

interface HostReading {
  disk: DiskCounters | null;
  cpu: CpuCounters | null;
  network: NetworkCounters | null;
}

const SECTOR_BYTES = 512;
const CPU_FIELDS = ['user', 'nice', 'system', 'idle', 'iowait', 'irq', 'softirq', 'steal'] as const;

/**
 * Flatten one cycle's readings into a named counter snapshot.
 */
function buildSnapshot(
  capturedAt: number,
  keyspace: KeyspaceStats,
  pools: ThreadPoolStats | null,
  host: HostReading
): CounterSnapshot {
  const counters: Record<string, number> = {
    reads: keyspace.readCount,
    writes: keyspace.writeCount,
  };

  if (pools) {
    counters.readRepairs = pools.readRepairStage.completed;
  }
  if (host.disk) {
    counters['disk.reads'] = host.disk.readsCompleted;
    counters['disk.writes'] = host.disk.writesCompleted;
    counters['disk.sectorsRead'] = host.disk.sectorsRead;
    counters['disk.sectorsWritten'] = host.disk.sectorsWritten;
  }
  if (host.network) {
    counters['net.rxBytes'] = host.network.rxBytes;
    counters['net.txBytes'] = host.network.txBytes;
  }
  if (host.cpu) {
    for (const field of CPU_FIELDS) {
      counters[`cpu.${field}`] = host.cpu[field];
    }
  }

  return { capturedAt, counters };
}

function cpuBreakdown(cpuDeltas: Record<string, number>): CpuBreakdown {
  let total = 0;
  for (const field of CPU_FIELDS) {
    total += cpuDeltas[`cpu.${field}`] ?? 0;
  }
  const share = (field: (typeof CPU_FIELDS)[number]): number => percentOf(cpuDeltas[`cpu.${field}`] ?? 0, total);

  return {
    user: share('user'),
    nice: share('nice'),
    system: share('system'),
    iowait: share('iowait'),
    steal: share('steal'),
    idle: share('idle'),
  };
}

export class SamplingOrchestrator extends EventEmitter<SamplingOrchestratorEvents> {
  private readonly config: SamplerConfig;
  private readonly database: DatabaseStatsSource;
  private readonly host: HostStatsSource;
  private readonly logger?: Logger;
  private readonly clock: Clock;

  private previous: CounterSnapshot | null = null;
  private watermark: LogWatermark | null = null;
  private state: SamplerState = 'idle';
  private sequence = 0;
  private primed = false;
  private stopRequested = false;

  constructor(options: SamplingOrchestratorOptions) {
    super();
    this.config = options.config;
    this.database = options.database;
    this.host = options.host;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;

    if (this.config.columns.percentiles && !this.config.target.table) {
      throw new ConfigurationError('Percentile column requires a table (sub-resource) to be configured');
    }
  }

  public getState(): SamplerState {
    return this.state;
  }

  /**
   * Counters the next cycle's rates are computed against
   */
  public getPreviousSnapshot(): CounterSnapshot | null {
    return this.previous;
  }

  public getWatermark(): number | null {
    return this.watermark?.value ?? null;
  }

  /**
   * Read baseline counters and position the log watermark at the end of the
   * log. Emits nothing.
   */
  public async prime(): Promise<void> {
    this.setState('priming');

    if (this.config.log.path) {
      this.watermark = await this.openWatermark(this.config.log.path);
    }

    const capturedAt = this.clock.now();
    const host = await this.readHost();
    const keyspace = await this.database.readKeyspace(this.config.target);
    const pools = keyspace && this.needsThreadPools() ? await this.database.readThreadPools() : null;

    if (keyspace) {
      this.previous = buildSnapshot(capturedAt, keyspace, pools, host);
    } else {
      this.logger?.warn(
        { keyspace: this.config.target.keyspace },
        'No baseline: source unresponsive while priming'
      );
    }

    this.primed = true;
    this.setState('idle');
  }

  /**
   * Run one full cycle: wait, collect, compute, emit.
   */
  public async runCycle(): Promise<CycleOutcome> {
    if (!this.primed) {
      await this.prime();
    }

    this.setState('sampling');
    await this.clock.sleep(this.config.sampling.interval_seconds * 1000);

    const capturedAt = this.clock.now();
    const host = await this.readHost();
    const keyspace = await this.database.readKeyspace(this.config.target);
    const sequence = ++this.sequence;

    if (!keyspace) {
      this.setState('unresponsive');
      this.logger?.warn({ sequence, keyspace: this.config.target.keyspace }, 'Source unresponsive');
      this.setState('emit');
      this.emit('unresponsive', { sequence, at: capturedAt });
      this.setState('idle');
      return { kind: 'unresponsive', sequence, at: capturedAt };
    }

    this.setState('responsive');

    const { columns, target } = this.config;
    const pools = this.needsThreadPools() ? await this.database.readThreadPools() : null;
    const histogram =
      columns.percentiles && target.table
        ? await this.database.readHistogram({ keyspace: target.keyspace, table: target.table })
        : null;
    const compaction = columns.compaction ? await this.database.readCompactions() : null;

    const current = buildSnapshot(capturedAt, keyspace, pools, host);
    const previous = this.previous;

    if (!previous) {
      this.previous = current;
      this.logger?.info({ sequence }, 'Baseline established');
      this.setState('idle');
      return { kind: 'baseline', sequence };
    }

    this.setState('emit');

    const events = await this.readEvents();
    const sample = this.assemble({
      sequence,
      current,
      previous,
      keyspace,
      pools,
      histogram,
      compaction,
      events,
    });

    this.previous = current;

    this.emit('sample', sample);
    for (const event of events) {
      this.emit('logEvent', event);
    }

    this.setState('idle');
    return { kind: 'sample', sample };
  }

  /**
   * Prime (if needed) and loop until the cycle budget is spent or stop() is
   * called.
   */
  public async run(): Promise<RunSummary> {
    const summary: RunSummary = { cycles: 0, samples: 0, unresponsive: 0 };
    const limit = this.config.sampling.count ?? Number.POSITIVE_INFINITY;

    this.logger?.info(
      {
        keyspace: this.config.target.keyspace,
        table: this.config.target.table,
        intervalSeconds: this.config.sampling.interval_seconds,
        count: this.config.sampling.count,
      },
      'Sampling started'
    );

    if (!this.primed) {
      await this.prime();
    }

    while (!this.stopRequested && summary.cycles < limit) {
      const outcome = await this.runCycle();
      summary.cycles++;
      if (outcome.kind === 'sample') {
        summary.samples++;
      } else if (outcome.kind === 'unresponsive') {
        summary.unresponsive++;
      }
    }

    this.setState('terminal');
    this.logger?.info({ ...summary }, 'Sampling finished');
    return summary;
  }

  /**
   * Finish after the cycle in progress.
   */
  public stop(): void {
    this.stopRequested = true;
  }

  /**
   * A log that exists but cannot be read at startup is a configuration
   * problem; later read failures are not.
   */
  private async openWatermark(logPath: string): Promise<LogWatermark> {
    try {
      return await LogWatermark.atEndOf(logPath);
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read log ${logPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: logPath },
        { cause: err }
      );
    }
  }

  private needsThreadPools(): boolean {
    return this.config.columns.cache || this.config.columns.read_repair;
  }

  private async readHost(): Promise<HostReading> {
    const { disk, network_interface } = this.config.host;
    return {
      disk: await this.host.readDisk(disk),
      cpu: await this.host.readCpu(),
      network: await this.host.readNetwork(network_interface),
    };
  }

  private async readEvents(): Promise<LogEvent[]> {
    const logPath = this.config.log.path;
    if (!logPath || !this.watermark) {
      return [];
    }

    try {
      const result = await extractEvents(logPath, this.watermark.value);
      this.watermark.advanceTo(result.watermark);
      return result.events;
    } catch (err) {
      const error = toSamplerError(err, 'LogReadError');
      this.logger?.warn({ err: error.toObject(), logPath }, 'Failed to read log; watermark unchanged');
      this.emit('error', error);
      return [];
    }
  }

  private assemble(input: {
    sequence: number;
    current: CounterSnapshot;
    previous: CounterSnapshot;
    keyspace: KeyspaceStats;
    pools: ThreadPoolStats | null;
    histogram: HistogramRow[] | null;
    compaction: CompactionStats | null;
    events: LogEvent[];
  }): Sample {
    const { columns } = this.config;
    const { current, previous, keyspace } = input;

    const seconds = elapsedSeconds(current, previous, this.config.sampling.interval_seconds);
    const perSecond = rates(current, previous, seconds);
    const perInterval = deltas(current, previous);

    return {
      sequence: input.sequence,
      ...(columns.timestamp && { timestamp: formatClockTime(current.capturedAt) }),
      ...(columns.epoch && { epoch: toEpochSeconds(current.capturedAt) }),
      reads: perSecond.reads ?? 0,
      writes: perSecond.writes ?? 0,
      readLatencyMs: keyspace.readLatencyMs,
      writeLatencyMs: keyspace.writeLatencyMs,
      ...(columns.cache && {
        cache: {
          keyCacheHitRate: keyspace.keyCacheHitRate ?? null,
          rowCacheHitRate: keyspace.rowCacheHitRate ?? null,
          readStagePending: input.pools?.readStage.pending ?? 0,
        },
      }),
      cpu: cpuBreakdown(perInterval),
      disk: {
        readsPerSec: perSecond['disk.reads'] ?? 0,
        writesPerSec: perSecond['disk.writes'] ?? 0,
        readKBps: roundTo(((perSecond['disk.sectorsRead'] ?? 0) * SECTOR_BYTES) / 1024, 1),
        writeKBps: roundTo(((perSecond['disk.sectorsWritten'] ?? 0) * SECTOR_BYTES) / 1024, 1),
      },
      network: {
        rxKBps: roundTo((perSecond['net.rxBytes'] ?? 0) / 1024, 1),
        txKBps: roundTo((perSecond['net.txBytes'] ?? 0) / 1024, 1),
      },
      ...(columns.read_repair && { readRepairs: perInterval.readRepairs ?? 0 }),
      ...(columns.percentiles && {
        percentiles: estimatePercentiles(decodeHistogram(input.histogram ?? [])),
      }),
      ...(columns.compaction && {
        compaction: {
          pending: input.compaction?.pendingTasks ?? 0,
          tasks: input.compaction?.tasks ?? [],
        },
      }),
      events: input.events,
    };
  }

  private setState(next: SamplerState): void {
    this.state = next;
    this.emit('state', next);
  }
}
