/**
 * Default configuration values
 *
 * Every key of the schema has a default except `target.keyspace`, which must
 * come from the YAML file or the command line.
 */

import type { SamplerConfigInput } from '../types/schemas/config.js';

export const DEFAULT_HEADER_EVERY = 10;

export const DEFAULT_CONFIG = {
  target: {
    table: null,
  },
  sampling: {
    interval_seconds: 5,
    count: null,
  },
  host: {
    disk: 'sda',
    network_interface: 'eth0',
    proc_root: '/proc',
  },
  columns: {
    epoch: false,
    timestamp: false,
    cache: false,
    read_repair: false,
    compaction: false,
    percentiles: false,
  },
  log: {
    path: null,
    events_output: null,
  },
  output: {
    headers: true,
    header_every: DEFAULT_HEADER_EVERY,
  },
  nodetool: {
    command: 'nodetool',
    host: '127.0.0.1',
    port: 7199,
  },
  logging: {
    level: 'info',
  },
} satisfies SamplerConfigInput;
