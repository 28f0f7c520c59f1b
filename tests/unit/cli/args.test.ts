import { describe, it, expect } from 'vitest';
import { HELP_TEXT, parseArgs, toConfigOverrides } from '@/cli/args.js';
import { ConfigurationError } from '@/api/errors.js';

describe('CLI args', () => {
  describe('parseArgs', () => {
    it('should default every switch to off', () => {
      expect(parseArgs([])).toEqual({
        epoch: false,
        timestamp: false,
        noHeader: false,
        readRepair: false,
        compaction: false,
        percentiles: false,
        cache: false,
        help: false,
        version: false,
      });
    });

    it('should parse switches, values and short aliases', () => {
      const args = parseArgs([
        '-k',
        'app',
        '-t',
        'users',
        '-i',
        '10',
        '-n',
        '3',
        '--percentiles',
        '--timestamp',
        '--log',
        '/var/log/node/system.log',
        '--nodetool-port',
        '7299',
        '--log-level',
        'debug',
      ]);

      expect(args).toMatchObject({
        keyspace: 'app',
        table: 'users',
        interval: 10,
        count: 3,
        percentiles: true,
        timestamp: true,
        epoch: false,
        log: '/var/log/node/system.log',
        nodetoolPort: 7299,
        logLevel: 'debug',
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    });

    it('should reject an option without its value', () => {
      expect(() => parseArgs(['--keyspace'])).toThrow('Option --keyspace requires a value');
      expect(() => parseArgs(['--table', '--cache'])).toThrow(ConfigurationError);
    });

    it('should reject non-integer numbers', () => {
      expect(() => parseArgs(['--interval', '2.5'])).toThrow('Option --interval expects an integer, got "2.5"');
      expect(() => parseArgs(['-n', 'many'])).toThrow(ConfigurationError);
    });

    it('should reject unknown log levels', () => {
      expect(() => parseArgs(['--log-level', 'loud'])).toThrow(ConfigurationError);
    });
  });

  describe('HELP_TEXT', () => {
    it('should describe the count as a cycle budget', () => {
      expect(HELP_TEXT).toContain('-n, --count <n>              Stop after n cycles (default: run forever)');
    });
  });

  describe('toConfigOverrides', () => {
    it('should leave unset flags out of the overrides', () => {
      expect(toConfigOverrides(parseArgs([]))).toEqual({
        target: {},
        sampling: {},
        host: {},
        columns: {},
        log: {},
        output: {},
        nodetool: {},
        logging: {},
      });
    });

    it('should map flags onto configuration sections', () => {
      const overrides = toConfigOverrides(
        parseArgs([
          '--keyspace',
          'app',
          '--interval',
          '4',
          '--iface',
          'bond0',
          '--cache',
          '--read-repair',
          '--no-header',
          '--events-out',
          '/tmp/events.log',
        ])
      );

      expect(overrides).toEqual({
        target: { keyspace: 'app' },
        sampling: { interval_seconds: 4 },
        host: { network_interface: 'bond0' },
        columns: { cache: true, read_repair: true },
        log: { events_output: '/tmp/events.log' },
        output: { headers: false },
        nodetool: {},
        logging: {},
      });
    });
  });
});
