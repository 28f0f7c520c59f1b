/**
 * Parsers for nodetool text output.
 *
 * Each parser returns `null` when the output does not contain the expected
 * section, which the source reports as an empty result.
 */

import type {
  CompactionStats,
  CompactionTask,
  HistogramRow,
  KeyspaceStats,
  ThreadPoolCounters,
  ThreadPoolStats,
} from '../types/metrics.js';
import type { TargetRef } from './types.js';

type Section = Map<string, string>;

interface KeyspaceSection {
  fields: Section;
  tables: Map<string, Section>;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

function firstOf(section: Section, labels: readonly string[]): string | undefined {
  for (const label of labels) {
    const value = section.get(label);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Split `tablestats`/`cfstats` output into keyspace and table sections of
 * lower-cased `label -> value` pairs.
 */
function splitTableStats(output: string): Map<string, KeyspaceSection> {
  const keyspaces = new Map<string, KeyspaceSection>();
  let keyspace: KeyspaceSection | undefined;
  let table: Section | undefined;

  for (const line of output.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }
    const label = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    if (label === 'keyspace' || label === 'keyspace name') {
      keyspace = { fields: new Map(), tables: new Map() };
      keyspaces.set(value, keyspace);
      table = undefined;
    } else if (label === 'table' || label === 'column family') {
      if (keyspace) {
        table = new Map();
        keyspace.tables.set(value, table);
      }
    } else if (table) {
      table.set(label, value);
    } else if (keyspace) {
      keyspace.fields.set(label, value);
    }
  }

  return keyspaces;
}

/**
 * Extract keyspace (or keyspace.table) counters from `tablestats` output.
 */
export function parseTableStats(output: string, target: TargetRef): KeyspaceStats | null {
  const keyspace = splitTableStats(output).get(target.keyspace);
  if (!keyspace) {
    return null;
  }

  const section = target.table ? keyspace.tables.get(target.table) : keyspace.fields;
  if (!section) {
    return null;
  }

  const readCount = parseNumber(firstOf(section, ['read count', 'local read count']));
  const writeCount = parseNumber(firstOf(section, ['write count', 'local write count']));
  if (readCount === undefined || writeCount === undefined) {
    return null;
  }

  const stats: KeyspaceStats = {
    readCount,
    writeCount,
    readLatencyMs: parseNumber(firstOf(section, ['read latency', 'local read latency'])) ?? 0,
    writeLatencyMs: parseNumber(firstOf(section, ['write latency', 'local write latency'])) ?? 0,
  };

  const keyCacheHitRate = parseNumber(section.get('key cache hit rate'));
  if (keyCacheHitRate !== undefined) {
    stats.keyCacheHitRate = keyCacheHitRate;
  }
  const rowCacheHitRate = parseNumber(section.get('row cache hit rate'));
  if (rowCacheHitRate !== undefined) {
    stats.rowCacheHitRate = rowCacheHitRate;
  }

  return stats;
}

/**
 * Extract ReadStage and ReadRepairStage rows from `tpstats` output.
 *
 * Newer nodes have no ReadRepairStage; it then reads as all zeros.
 */
export function parseThreadPools(output: string): ThreadPoolStats | null {
  const pools = new Map<string, ThreadPoolCounters>();

  for (const line of output.split('\n')) {
    const tokens = line.trim().split(/\s+/);
    if (tokens.length < 4) {
      continue;
    }
    const [name, active, pending, completed] = tokens;
    const counters = {
      active: parseNumber(active),
      pending: parseNumber(pending),
      completed: parseNumber(completed),
    };
    if (
      name !== undefined &&
      counters.active !== undefined &&
      counters.pending !== undefined &&
      counters.completed !== undefined
    ) {
      pools.set(name, { active: counters.active, pending: counters.pending, completed: counters.completed });
    }
  }

  const readStage = pools.get('ReadStage');
  if (!readStage) {
    return null;
  }

  return {
    readStage,
    readRepairStage: pools.get('ReadRepairStage') ?? { active: 0, pending: 0, completed: 0 },
  };
}

/**
 * Extract bucket rows from `cfhistograms` output.
 *
 * Column positions come from the header line. Without a Write Latency column
 * rows are emitted in the read-only shape.
 */
export function parseHistogram(output: string): HistogramRow[] | null {
  const lines = output.split('\n');
  const headerIndex = lines.findIndex((line) => /^\s*Offset\s/.test(line));
  if (headerIndex === -1) {
    return null;
  }

  const columns = lines[headerIndex].trim().split(/\s{2,}/).map((column) => column.toLowerCase());
  const readColumn = columns.indexOf('read latency');
  const writeColumn = columns.indexOf('write latency');
  if (readColumn === -1) {
    return null;
  }

  const rows: HistogramRow[] = [];
  for (const line of lines.slice(headerIndex + 1)) {
    const cells = line.trim().split(/\s+/).map((cell) => parseNumber(cell));
    const bound = cells[0];
    const read = cells[readColumn];
    if (bound === undefined || read === undefined) {
      continue;
    }
    const write = writeColumn === -1 ? undefined : cells[writeColumn];
    rows.push(write === undefined ? [bound, read] : [bound, read, write]);
  }

  return rows;
}

/**
 * Extract pending count and active tasks from `compactionstats` output.
 */
export function parseCompactionStats(output: string): CompactionStats | null {
  const pendingMatch = /pending tasks:\s*(\d+)/i.exec(output);
  if (!pendingMatch) {
    return null;
  }

  const tasks: CompactionTask[] = [];
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.endsWith('%')) {
      continue;
    }
    const columns = trimmed.split(/\s{2,}/);
    const percentComplete = parseNumber(columns[columns.length - 1]);
    if (columns.length < 2 || percentComplete === undefined) {
      continue;
    }
    tasks.push({ type: columns[0], percentComplete });
  }

  return { pendingTasks: Number.parseInt(pendingMatch[1], 10), tasks };
}
