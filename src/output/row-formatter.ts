/**
 * Row Formatter
 *
 * Fixed-width text rendering of Samples. Which columns appear follows the
 * `columns` section of the configuration.
 */

import { formatPercentile } from '../core/percentile-estimator.js';
import type { LogEvent } from '../types/log-events.js';
import type { Sample } from '../types/metrics.js';
import type { SamplerConfig } from '../types/schemas/config.js';
import { formatClockTime, toEpochSeconds } from '../utils/time.js';

export const UNRESPONSIVE_MARKER = '*** source unresponsive ***';

interface Column {
  header: string;
  width: number;
  render: (sample: Sample) => string;
}

function fixed(value: number, digits: number): string {
  return value.toFixed(digits);
}

function hitRate(value: number | null | undefined): string {
  return value === null || value === undefined ? '-' : value.toFixed(2);
}

function column(header: string, width: number, render: (sample: Sample) => string): Column {
  return { header, width, render };
}

export class RowFormatter {
  private readonly prefixColumns: Column[];
  private readonly metricColumns: Column[];

  constructor(columns: SamplerConfig['columns']) {
    this.prefixColumns = [
      ...(columns.epoch ? [column('epoch', 10, (s) => String(s.epoch ?? ''))] : []),
      ...(columns.timestamp ? [column('time', 8, (s) => s.timestamp ?? '')] : []),
    ];

    this.metricColumns = [
      column('reads', 7, (s) => String(s.reads)),
      column('writes', 7, (s) => String(s.writes)),
      column('rlat', 7, (s) => fixed(s.readLatencyMs, 3)),
      column('wlat', 7, (s) => fixed(s.writeLatencyMs, 3)),
      ...(columns.cache
        ? [
            column('kch', 5, (s) => hitRate(s.cache?.keyCacheHitRate)),
            column('rch', 5, (s) => hitRate(s.cache?.rowCacheHitRate)),
            column('rpnd', 5, (s) => String(s.cache?.readStagePending ?? 0)),
          ]
        : []),
      column('usr', 5, (s) => fixed(s.cpu.user, 1)),
      column('sys', 5, (s) => fixed(s.cpu.system, 1)),
      column('iow', 5, (s) => fixed(s.cpu.iowait, 1)),
      column('idl', 5, (s) => fixed(s.cpu.idle, 1)),
      column('dr/s', 6, (s) => String(s.disk.readsPerSec)),
      column('dw/s', 6, (s) => String(s.disk.writesPerSec)),
      column('drkB', 8, (s) => fixed(s.disk.readKBps, 1)),
      column('dwkB', 8, (s) => fixed(s.disk.writeKBps, 1)),
      column('rxkB', 8, (s) => fixed(s.network.rxKBps, 1)),
      column('txkB', 8, (s) => fixed(s.network.txKBps, 1)),
      ...(columns.read_repair ? [column('rrep', 5, (s) => String(s.readRepairs ?? 0))] : []),
      ...(columns.percentiles
        ? [
            column('r99', 8, (s) => formatPercentile(s.percentiles?.read99 ?? 0)),
            column('r95', 8, (s) => formatPercentile(s.percentiles?.read95 ?? 0)),
            column('w99', 8, (s) => formatPercentile(s.percentiles?.write99 ?? 0)),
            column('w95', 8, (s) => formatPercentile(s.percentiles?.write95 ?? 0)),
          ]
        : []),
      ...(columns.compaction
        ? [
            column('cmp', 4, (s) => String(s.compaction?.pending ?? 0)),
            column('tasks', 0, (s) =>
              s.compaction && s.compaction.tasks.length > 0
                ? s.compaction.tasks.map((task) => `${task.type}:${fixed(task.percentComplete, 1)}%`).join(',')
                : '-'
            ),
          ]
        : []),
    ];
  }

  public header(): string {
    return [...this.prefixColumns, ...this.metricColumns]
      .map((col) => col.header.padStart(col.width))
      .join(' ');
  }

  public row(sample: Sample): string {
    return [...this.prefixColumns, ...this.metricColumns]
      .map((col) => col.render(sample).padStart(col.width))
      .join(' ');
  }

  /**
   * Sentinel row for a cycle where the primary source returned nothing.
   */
  public unresponsive(at: number): string {
    const prefix = this.prefixColumns.map((col) => {
      const value = col.header === 'epoch' ? String(toEpochSeconds(at)) : formatClockTime(at);
      return value.padStart(col.width);
    });
    return [...prefix, UNRESPONSIVE_MARKER].join(' ');
  }

  public event(event: LogEvent): string {
    return ['event', event.timestamp, event.tag, ...event.fields].join(' ');
  }
}
