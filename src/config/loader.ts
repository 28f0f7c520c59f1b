/**
 * Configuration Loader
 *
 * Builds the sampler configuration from built-in defaults, an optional YAML
 * file and command-line overrides (in that order of precedence, lowest
 * first), then validates the result.
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigurationError, createConfigurationError } from '../api/errors.js';
import {
  SamplerConfigSchema,
  type SamplerConfig,
  type SamplerConfigInput,
} from '../types/schemas/config.js';
import { DEFAULT_CONFIG } from './defaults.js';

export interface LoadConfigOptions {
  /** Path to a YAML configuration file */
  path?: string;
  /** Values that take precedence over the file (usually CLI flags) */
  overrides?: SamplerConfigInput;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `undefined` in the source never overwrites.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Read and parse a YAML configuration file.
 *
 * @throws {ConfigurationError} if the file cannot be read or is not a mapping
 */
export async function readConfigFile(path: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path },
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path },
      { cause: error }
    );
  }

  // An empty file is an empty mapping
  if (parsed === undefined || parsed === null) {
    return {};
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Configuration in ${path} must be a YAML mapping`, { path });
  }

  return parsed;
}

/**
 * Validate a merged configuration object.
 *
 * @throws {ConfigurationError} listing every failed rule
 */
export function validateConfig(raw: unknown, source?: string): SamplerConfig {
  try {
    return SamplerConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw createConfigurationError(error, source);
    }
    throw error;
  }
}

/**
 * Load, merge and validate configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   path: 'config/nodestat.yaml',
 *   overrides: { target: { keyspace: 'app' }, sampling: { count: 3 } },
 * });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SamplerConfig> {
  let merged: PlainObject = deepMerge({}, DEFAULT_CONFIG);

  if (options.path) {
    merged = deepMerge(merged, await readConfigFile(options.path));
  }

  if (options.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged, options.path);
}
