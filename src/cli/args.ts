/**
 * Command-line flag parsing for the nodestat CLI.
 */

import { ConfigurationError } from '../api/errors.js';
import type { SamplerConfigInput } from '../types/schemas/config.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/logger.js';

export interface CLIArgs {
  epoch: boolean;
  timestamp: boolean;
  noHeader: boolean;
  readRepair: boolean;
  compaction: boolean;
  percentiles: boolean;
  cache: boolean;
  help: boolean;
  version: boolean;
  config?: string;
  log?: string;
  eventsOut?: string;
  interval?: number;
  count?: number;
  keyspace?: string;
  table?: string;
  disk?: string;
  iface?: string;
  nodetoolHost?: string;
  nodetoolPort?: number;
  logLevel?: LogLevel;
}

type BooleanFlag = 'epoch' | 'timestamp' | 'noHeader' | 'readRepair' | 'compaction' | 'percentiles' | 'cache' | 'help' | 'version';
type StringFlag = 'config' | 'log' | 'eventsOut' | 'keyspace' | 'table' | 'disk' | 'iface' | 'nodetoolHost';
type NumberFlag = 'interval' | 'count' | 'nodetoolPort';

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
  '--epoch': 'epoch',
  '--timestamp': 'timestamp',
  '--no-header': 'noHeader',
  '--read-repair': 'readRepair',
  '--compaction': 'compaction',
  '--percentiles': 'percentiles',
  '--cache': 'cache',
  '--help': 'help',
  '-h': 'help',
  '--version': 'version',
};

const STRING_FLAGS: Record<string, StringFlag> = {
  '--config': 'config',
  '--log': 'log',
  '--events-out': 'eventsOut',
  '--keyspace': 'keyspace',
  '-k': 'keyspace',
  '--table': 'table',
  '-t': 'table',
  '--disk': 'disk',
  '--iface': 'iface',
  '--nodetool-host': 'nodetoolHost',
};

const NUMBER_FLAGS: Record<string, NumberFlag> = {
  '--interval': 'interval',
  '-i': 'interval',
  '--count': 'count',
  '-n': 'count',
  '--nodetool-port': 'nodetoolPort',
};

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {ConfigurationError} on unknown flags, missing values or bad numbers
 */
export function parseArgs(argv: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    epoch: false,
    timestamp: false,
    noHeader: false,
    readRepair: false,
    compaction: false,
    percentiles: false,
    cache: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const booleanFlag = BOOLEAN_FLAGS[arg];
    if (booleanFlag) {
      result[booleanFlag] = true;
      continue;
    }

    const stringFlag = STRING_FLAGS[arg];
    const numberFlag = NUMBER_FLAGS[arg];
    if (!stringFlag && !numberFlag && arg !== '--log-level') {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Option ${arg} requires a value`);
    }
    i++;

    if (stringFlag) {
      result[stringFlag] = value;
    } else if (numberFlag) {
      const parsed = Number(value);
      if (!Number.isInteger(parsed)) {
        throw new ConfigurationError(`Option ${arg} expects an integer, got "${value}"`);
      }
      result[numberFlag] = parsed;
    } else if (isLogLevel(value)) {
      result.logLevel = value;
    } else {
      throw new ConfigurationError(`Option --log-level expects one of ${LOG_LEVELS.join(', ')}`);
    }
  }

  return result;
}

/**
 * Map parsed flags onto configuration overrides. Flags that were not given
 * leave the file or default value in place; boolean column flags can only
 * switch a column on.
 */
export function toConfigOverrides(args: CLIArgs): SamplerConfigInput {
  return {
    target: {
      ...(args.keyspace !== undefined && { keyspace: args.keyspace }),
      ...(args.table !== undefined && { table: args.table }),
    },
    sampling: {
      ...(args.interval !== undefined && { interval_seconds: args.interval }),
      ...(args.count !== undefined && { count: args.count }),
    },
    host: {
      ...(args.disk !== undefined && { disk: args.disk }),
      ...(args.iface !== undefined && { network_interface: args.iface }),
    },
    columns: {
      ...(args.epoch && { epoch: true }),
      ...(args.timestamp && { timestamp: true }),
      ...(args.cache && { cache: true }),
      ...(args.readRepair && { read_repair: true }),
      ...(args.compaction && { compaction: true }),
      ...(args.percentiles && { percentiles: true }),
    },
    log: {
      ...(args.log !== undefined && { path: args.log }),
      ...(args.eventsOut !== undefined && { events_output: args.eventsOut }),
    },
    output: {
      ...(args.noHeader && { headers: false }),
    },
    nodetool: {
      ...(args.nodetoolHost !== undefined && { host: args.nodetoolHost }),
      ...(args.nodetoolPort !== undefined && { port: args.nodetoolPort }),
    },
    logging: {
      ...(args.logLevel !== undefined && { level: args.logLevel }),
    },
  };
}

export const HELP_TEXT = `
nodestat - fixed-interval metrics sampler for a database node

USAGE:
  nodestat --keyspace <name> [options]

TARGET:
  -k, --keyspace <name>        Keyspace to sample (required)
  -t, --table <name>           Table (sub-resource) to scope counters to
      --nodetool-host <host>   Node admin host (default: 127.0.0.1)
      --nodetool-port <port>   Node admin port (default: 7199)

SAMPLING:
  -i, --interval <seconds>     Sampling interval, >= 2 (default: 5)
  -n, --count <n>              Stop after n cycles (default: run forever)

COLUMNS:
      --epoch                  Prefix rows with epoch seconds
      --timestamp              Prefix rows with HH:MM:SS
      --cache                  Key/row cache hit rates and read-stage queue
      --read-repair            Read repairs per interval
      --compaction             Pending and active compactions
      --percentiles            95th/99th read/write latency (needs --table)
      --disk <name>            Disk to report (default: sda)
      --iface <name>           Network interface to report (default: eth0)

OUTPUT:
      --log <path>             Node log to classify events from
      --events-out <path>      Write events to this file instead of inline
      --no-header              Do not print column headers
      --config <path>          YAML configuration file
      --log-level <level>      Diagnostic log level (stderr)
  -h, --help                   Show this help message
      --version                Show version

ENVIRONMENT VARIABLES:
  NODESTAT_LOG_LEVEL           Overrides the diagnostic log level
`;
