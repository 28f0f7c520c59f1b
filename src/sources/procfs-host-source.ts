/**
 * procfs host source
 *
 * Reads disk, CPU and network counters from a Linux /proc tree.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { CpuCounters, DiskCounters, NetworkCounters } from '../types/metrics.js';
import type { HostStatsSource } from './types.js';

export interface ProcfsHostSourceOptions {
  /** Root of the proc filesystem (default: /proc) */
  procRoot?: string;
  logger?: Logger;
}

function toInt(token: string | undefined): number {
  const value = Number.parseInt(token ?? '', 10);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Parse /proc/diskstats for one device.
 *
 * Columns: major minor name reads merged sectorsRead msReading writes merged
 * sectorsWritten ...
 */
export function parseDiskStats(content: string, device: string): DiskCounters | null {
  for (const line of content.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 10 || fields[2] !== device) {
      continue;
    }
    return {
      readsCompleted: toInt(fields[3]),
      sectorsRead: toInt(fields[5]),
      writesCompleted: toInt(fields[7]),
      sectorsWritten: toInt(fields[9]),
    };
  }
  return null;
}

/**
 * Parse the aggregate `cpu` line of /proc/stat.
 */
export function parseCpuStats(content: string): CpuCounters | null {
  const line = content.split('\n').find((candidate) => /^cpu\s/.test(candidate));
  if (!line) {
    return null;
  }
  const fields = line.trim().split(/\s+/);
  return {
    user: toInt(fields[1]),
    nice: toInt(fields[2]),
    system: toInt(fields[3]),
    idle: toInt(fields[4]),
    iowait: toInt(fields[5]),
    irq: toInt(fields[6]),
    softirq: toInt(fields[7]),
    steal: toInt(fields[8]),
  };
}

/**
 * Parse /proc/net/dev for one interface.
 *
 * After `<iface>:` come 8 receive columns then 8 transmit columns; bytes are
 * the first of each group.
 */
export function parseNetDev(content: string, iface: string): NetworkCounters | null {
  for (const line of content.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1 || line.slice(0, colon).trim() !== iface) {
      continue;
    }
    const fields = line.slice(colon + 1).trim().split(/\s+/);
    return {
      rxBytes: toInt(fields[0]),
      txBytes: toInt(fields[8]),
    };
  }
  return null;
}

export class ProcfsHostSource implements HostStatsSource {
  private readonly procRoot: string;
  private readonly logger?: Logger;

  constructor(options: ProcfsHostSourceOptions = {}) {
    this.procRoot = options.procRoot ?? '/proc';
    this.logger = options.logger;
  }

  public async readDisk(device: string): Promise<DiskCounters | null> {
    const content = await this.read('diskstats');
    const counters = content === null ? null : parseDiskStats(content, device);
    if (content !== null && counters === null) {
      this.logger?.warn({ device }, 'Disk not found in diskstats');
    }
    return counters;
  }

  public async readCpu(): Promise<CpuCounters | null> {
    const content = await this.read('stat');
    return content === null ? null : parseCpuStats(content);
  }

  public async readNetwork(iface: string): Promise<NetworkCounters | null> {
    const content = await this.read(join('net', 'dev'));
    const counters = content === null ? null : parseNetDev(content, iface);
    if (content !== null && counters === null) {
      this.logger?.warn({ iface }, 'Network interface not found in net/dev');
    }
    return counters;
  }

  private async read(relativePath: string): Promise<string | null> {
    const path = join(this.procRoot, relativePath);
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      this.logger?.warn({ err, path }, 'Failed to read host counters');
      return null;
    }
  }
}
