/**
 * Sampler error utilities.
 *
 * Provides a consistent error type for the sampler and helpers to convert
 * lower-level failures (zod validation, child process, filesystem) into
 * SamplerError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced by the sampler.
 *
 * Only `ConfigurationError` is fatal; it is raised before the sampling loop
 * starts. Everything else is absorbed by the orchestrator and reflected as a
 * degraded cycle.
 */
export type SamplerErrorCode =
  | 'ConfigurationError'
  | 'SourceCommandError'
  | 'LogReadError'
  | 'UnknownError';

export interface SamplerErrorShape {
  code: SamplerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SamplerError extends Error implements SamplerErrorShape {
  public readonly code: SamplerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SamplerErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SamplerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for structured logs).
   */
  public toObject(): SamplerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Missing or invalid configuration. Fatal, reported before the loop starts.
 */
export class ConfigurationError extends SamplerError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('ConfigurationError', message, details, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An external stats command could not be run or exited with a failure.
 */
export class SourceCommandError extends SamplerError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    options?: { cause?: unknown }
  ) {
    super('SourceCommandError', message, { command, exitCode }, options);
    this.name = 'SourceCommandError';
  }
}

/**
 * Convert zod validation issues into a ConfigurationError.
 */
export function createConfigurationError(error: ZodError, source?: string): ConfigurationError {
  const issues = error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path || '<root>'}: ${issue.message}`).join('; ');

  return new ConfigurationError(`Invalid configuration${source ? ` in ${source}` : ''}: ${summary}`, {
    issues,
    ...(source && { source }),
  });
}

/**
 * Map unknown errors into SamplerError instances.
 *
 * @param error - Error thrown by a source, the filesystem or a child process
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSamplerError(
  error: unknown,
  fallbackCode: SamplerErrorCode = 'UnknownError'
): SamplerError {
  if (error instanceof SamplerError) {
    return error;
  }

  if (error instanceof Error) {
    return new SamplerError(fallbackCode, error.message, { name: error.name }, { cause: error });
  }

  return new SamplerError(fallbackCode, String(error));
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
