/**
 * Main type exports for nodestat
 */

export * from './metrics.js';
export * from './log-events.js';
export type { SamplerConfig, SamplerConfigInput } from './schemas/config.js';
