/**
 * nodestat - fixed-interval metrics sampler for a database node
 *
 * @example
 * ```typescript
 * import { loadConfig, SamplingOrchestrator, NodetoolSource, ProcfsHostSource } from 'nodestat';
 *
 * const config = await loadConfig({ overrides: { target: { keyspace: 'app' }, sampling: { count: 3 } } });
 * const sampler = new SamplingOrchestrator({
 *   config,
 *   database: new NodetoolSource(),
 *   host: new ProcfsHostSource(),
 * });
 * sampler.on('sample', (sample) => console.log(sample.reads, sample.writes));
 * await sampler.run();
 * ```
 */

export * from './types/index.js';

export { delta, deltas, elapsedSeconds, rate, rates } from './core/delta-engine.js';
export {
  decodeHistogram,
  estimatePercentiles,
  formatPercentile,
  percentile,
  type OperationKind,
} from './core/percentile-estimator.js';
export {
  LOG_EVENT_TEMPLATES,
  TIMESTAMP_TOKEN_INDEX,
  classifyLine,
  countLines,
  extractEvents,
  type ExtractResult,
} from './core/log-event-classifier.js';
export { LogWatermark } from './core/log-watermark.js';
export {
  SamplingOrchestrator,
  type RunSummary,
  type SamplerState,
  type SamplingOrchestratorEvents,
  type SamplingOrchestratorOptions,
  type UnresponsiveInfo,
} from './core/sampling-orchestrator.js';

export type { DatabaseStatsSource, HostStatsSource, TargetRef } from './sources/types.js';
export { NodetoolSource, execaRunner, type CommandResult, type CommandRunner } from './sources/nodetool-source.js';
export { ProcfsHostSource } from './sources/procfs-host-source.js';

export { RowFormatter, UNRESPONSIVE_MARKER } from './output/row-formatter.js';
export { SampleWriter, type LineSink, type SampleWriterOptions } from './output/sample-writer.js';
export { closeEventsOutput, openEventsOutput } from './output/events-output.js';

export { loadConfig, validateConfig, type LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { SamplerConfigSchema, MIN_INTERVAL_SECONDS } from './types/schemas/config.js';

export {
  ConfigurationError,
  SamplerError,
  SourceCommandError,
  toSamplerError,
  type SamplerErrorCode,
} from './api/errors.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
export { systemClock, type Clock } from './utils/time.js';
