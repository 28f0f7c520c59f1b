#!/usr/bin/env node

/**
 * nodestat CLI
 *
 * Samples a database node every interval and prints one row per cycle.
 *
 * Usage:
 *   nodestat --keyspace app --table users --percentiles -n 10
 *   nodestat --config config/nodestat.yaml --log /var/log/node/system.log
 */

import { readFileSync } from 'node:fs';
import { loadConfig } from '../config/loader.js';
import { isConfigurationError, toSamplerError } from '../api/errors.js';
import { SamplingOrchestrator } from '../core/sampling-orchestrator.js';
import { NodetoolSource } from '../sources/nodetool-source.js';
import { ProcfsHostSource } from '../sources/procfs-host-source.js';
import { RowFormatter } from '../output/row-formatter.js';
import { SampleWriter } from '../output/sample-writer.js';
import { closeEventsOutput, openEventsOutput } from '../output/events-output.js';
import { createLogger } from '../utils/logger.js';
import { HELP_TEXT, parseArgs, toConfigOverrides } from './args.js';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return 'unknown';
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.version) {
    console.log(`nodestat v${readVersion()}`);
    return 0;
  }

  const config = await loadConfig({ path: args.config, overrides: toConfigOverrides(args) });
  const logger = createLogger({ level: config.logging.level });

  const orchestrator = new SamplingOrchestrator({
    config,
    database: new NodetoolSource({
      command: config.nodetool.command,
      host: config.nodetool.host,
      port: config.nodetool.port,
      logger: logger.child({ component: 'NodetoolSource' }),
    }),
    host: new ProcfsHostSource({
      procRoot: config.host.proc_root,
      logger: logger.child({ component: 'ProcfsHostSource' }),
    }),
    logger: logger.child({ component: 'SamplingOrchestrator' }),
  });

  const eventsStream = config.log.events_output ? await openEventsOutput(config.log.events_output) : undefined;
  eventsStream?.on('error', (err) => {
    logger.error({ err, path: config.log.events_output }, 'Events output failed; stopping after current cycle');
    orchestrator.stop();
  });

  const writer = new SampleWriter({
    formatter: new RowFormatter(config.columns),
    out: process.stdout,
    events: eventsStream,
    headers: config.output.headers,
    headerEvery: config.output.header_every,
  });
  writer.attach(orchestrator);

  const stop = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Stopping after current cycle');
    orchestrator.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await orchestrator.run();
  } finally {
    if (eventsStream) {
      await closeEventsOutput(eventsStream);
    }
  }

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const samplerError = toSamplerError(error);
    if (isConfigurationError(error)) {
      console.error(`nodestat: ${samplerError.message}`);
      console.error('Run nodestat --help for usage.');
    } else {
      console.error(`nodestat: ${samplerError.code}: ${samplerError.message}`);
    }
    process.exitCode = 1;
  });
