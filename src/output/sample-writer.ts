/**
 * Sample Writer
 *
 * Writes formatted rows to the results stream, repeating the header every
 * N rows, and routes classified log events either inline or to their own
 * stream.
 */

import type { SamplingOrchestrator, UnresponsiveInfo } from '../core/sampling-orchestrator.js';
import type { Sample } from '../types/metrics.js';
import type { RowFormatter } from './row-formatter.js';

/**
 * Anything with a string `write` (process.stdout, fs.WriteStream, a test
 * buffer).
 */
export interface LineSink {
  write(chunk: string): unknown;
}

export interface SampleWriterOptions {
  formatter: RowFormatter;
  out: LineSink;
  /** Separate destination for events; inline with rows when omitted */
  events?: LineSink;
  headers: boolean;
  headerEvery: number;
}

export class SampleWriter {
  private readonly formatter: RowFormatter;
  private readonly out: LineSink;
  private readonly events: LineSink;
  private readonly headers: boolean;
  private readonly headerEvery: number;
  private rows = 0;

  constructor(options: SampleWriterOptions) {
    this.formatter = options.formatter;
    this.out = options.out;
    this.events = options.events ?? options.out;
    this.headers = options.headers;
    this.headerEvery = options.headerEvery;
  }

  /**
   * Subscribe to an orchestrator's output events.
   */
  public attach(orchestrator: SamplingOrchestrator): void {
    orchestrator.on('sample', (sample) => this.writeSample(sample));
    orchestrator.on('unresponsive', (info) => this.writeUnresponsive(info));
  }

  public writeSample(sample: Sample): void {
    this.writeRow(this.formatter.row(sample));
    for (const event of sample.events) {
      this.events.write(`${this.formatter.event(event)}\n`);
    }
  }

  public writeUnresponsive(info: UnresponsiveInfo): void {
    this.writeRow(this.formatter.unresponsive(info.at));
  }

  public getRowCount(): number {
    return this.rows;
  }

  private writeRow(line: string): void {
    if (this.headers && this.rows % this.headerEvery === 0) {
      this.out.write(`${this.formatter.header()}\n`);
    }
    this.out.write(`${line}\n`);
    this.rows++;
  }
}
