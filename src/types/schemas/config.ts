/**
 * Sampler Configuration Schemas
 *
 * Zod schemas for validating the merged configuration (defaults, YAML file,
 * command-line overrides) with cross-field validation.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/** Shortest supported sampling interval */
export const MIN_INTERVAL_SECONDS = 2;

/**
 * Monitored target
 */
export const TargetConfigSchema = z.object({
  keyspace: z
    .string({ required_error: 'Target keyspace is required', invalid_type_error: 'Target keyspace is required' })
    .min(1, 'Target keyspace is required'),
  table: z.string().min(1, 'Table name cannot be empty').nullable(),
});

/**
 * Sampling loop
 */
export const SamplingConfigSchema = z.object({
  interval_seconds: z
    .number()
    .int('Interval must be a whole number of seconds')
    .min(MIN_INTERVAL_SECONDS, `Interval must be >= ${MIN_INTERVAL_SECONDS} seconds`),
  count: z.number().int().positive('Sample count must be positive').nullable(),
});

/**
 * Host-level counters
 */
export const HostConfigSchema = z.object({
  disk: z.string().min(1, 'Disk name cannot be empty'),
  network_interface: z.string().min(1, 'Network interface cannot be empty'),
  proc_root: z.string().min(1, 'proc root cannot be empty'),
});

/**
 * Optional output columns
 */
export const ColumnsConfigSchema = z.object({
  epoch: z.boolean(),
  timestamp: z.boolean(),
  cache: z.boolean(),
  read_repair: z.boolean(),
  compaction: z.boolean(),
  percentiles: z.boolean(),
});

/**
 * Log tailing
 */
export const LogConfigSchema = z.object({
  path: z.string().min(1, 'Log path cannot be empty').nullable(),
  events_output: z.string().min(1, 'Events output path cannot be empty').nullable(),
});

export const OutputConfigSchema = z.object({
  headers: z.boolean(),
  header_every: z.number().int().positive('Header interval must be positive'),
});

export const NodetoolConfigSchema = z.object({
  command: z.string().min(1, 'nodetool command cannot be empty'),
  host: z.string().min(1, 'nodetool host cannot be empty'),
  port: z.number().int().min(1).max(65535),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Complete sampler configuration
 */
export const SamplerConfigSchema = z
  .object({
    target: TargetConfigSchema,
    sampling: SamplingConfigSchema,
    host: HostConfigSchema,
    columns: ColumnsConfigSchema,
    log: LogConfigSchema,
    output: OutputConfigSchema,
    nodetool: NodetoolConfigSchema,
    logging: LoggingConfigSchema,
  })
  .superRefine((data, ctx) => {
    if (data.columns.percentiles && data.target.table === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Percentile column requires a table (sub-resource) to be configured',
        path: ['target', 'table'],
      });
    }

    if (data.log.events_output !== null && data.log.path === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Separate events output requires a log path',
        path: ['log', 'events_output'],
      });
    }
  });

export type SamplerConfig = z.infer<typeof SamplerConfigSchema>;

/**
 * Partial configuration as accepted from YAML files and CLI flags.
 */
export type SamplerConfigInput = {
  [K in keyof SamplerConfig]?: Partial<SamplerConfig[K]>;
};
