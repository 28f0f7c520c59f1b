/**
 * Log Watermark
 *
 * Count of log lines already consumed. Starts at the log's length when the
 * sampler starts, so lines written before then are never replayed.
 */

import { countLines } from './log-event-classifier.js';

export class LogWatermark {
  private position: number;

  constructor(initial = 0) {
    if (!Number.isInteger(initial) || initial < 0) {
      throw new RangeError(`Watermark must be a non-negative integer, got ${initial}`);
    }
    this.position = initial;
  }

  /**
   * Watermark positioned after the last complete line of the log.
   */
  static async atEndOf(logPath: string): Promise<LogWatermark> {
    return new LogWatermark(await countLines(logPath));
  }

  get value(): number {
    return this.position;
  }

  /**
   * Move forward. Positions at or behind the current one are ignored.
   */
  advanceTo(next: number): void {
    if (next > this.position) {
      this.position = next;
    }
  }
}
