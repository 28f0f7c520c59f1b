/**
 * nodetool source
 *
 * Database statistics obtained by running the node's admin tool. A failed
 * command or an output without the requested section is an empty result.
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import { SourceCommandError } from '../api/errors.js';
import type { CompactionStats, HistogramRow, KeyspaceStats, ThreadPoolStats } from '../types/metrics.js';
import {
  parseCompactionStats,
  parseHistogram,
  parseTableStats,
  parseThreadPools,
} from './nodetool-parsers.js';
import type { DatabaseStatsSource, TargetRef } from './types.js';

export interface CommandResult {
  stdout: string;
  failed: boolean;
  exitCode?: number;
  stderr?: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export interface NodetoolSourceOptions {
  command?: string;
  host?: string;
  port?: number;
  logger?: Logger;
  /** Replaces process spawning (tests) */
  runner?: CommandRunner;
}

/**
 * Run a command without throwing on non-zero exit.
 */
export const execaRunner: CommandRunner = async (command, args) => {
  const result = await execa(command, [...args], { reject: false });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    failed: result.failed,
    exitCode: result.exitCode,
  };
};

export class NodetoolSource implements DatabaseStatsSource {
  private readonly command: string;
  private readonly connectionArgs: readonly string[];
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  constructor(options: NodetoolSourceOptions = {}) {
    this.command = options.command ?? 'nodetool';
    this.connectionArgs = ['-h', options.host ?? '127.0.0.1', '-p', String(options.port ?? 7199)];
    this.runner = options.runner ?? execaRunner;
    this.logger = options.logger;
  }

  public async readKeyspace(target: TargetRef): Promise<KeyspaceStats | null> {
    const scope = target.table ? `${target.keyspace}.${target.table}` : target.keyspace;
    const output = await this.run(['cfstats', scope]);
    return output === null ? null : parseTableStats(output, target);
  }

  public async readThreadPools(): Promise<ThreadPoolStats | null> {
    const output = await this.run(['tpstats']);
    return output === null ? null : parseThreadPools(output);
  }

  public async readHistogram(target: { keyspace: string; table: string }): Promise<HistogramRow[] | null> {
    const output = await this.run(['cfhistograms', target.keyspace, target.table]);
    return output === null ? null : parseHistogram(output);
  }

  public async readCompactions(): Promise<CompactionStats | null> {
    const output = await this.run(['compactionstats']);
    return output === null ? null : parseCompactionStats(output);
  }

  private async run(subcommand: readonly string[]): Promise<string | null> {
    const args = [...this.connectionArgs, ...subcommand];
    try {
      const result = await this.runner(this.command, args);
      if (result.failed) {
        const error = new SourceCommandError(
          `${this.command} ${subcommand[0]} failed`,
          this.command,
          result.exitCode
        );
        this.logger?.warn({ err: error.toObject(), stderr: result.stderr }, 'nodetool command failed');
        return null;
      }
      return result.stdout;
    } catch (err) {
      this.logger?.warn({ err, args }, 'nodetool command could not be run');
      return null;
    }
  }
}
