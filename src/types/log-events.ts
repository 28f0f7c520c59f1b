/**
 * Log Event Types
 *
 * @module types/log-events
 */

export type LogEventTag =
  | 'CommitlogCreated'
  | 'FlushCompleted'
  | 'MajorCompactionStarted'
  | 'TreeSent'
  | 'RepairStarted'
  | 'ManualRepairSession'
  | 'StreamingRepairProgress'
  | 'StreamingRepairFinished'
  | 'RepairCommandFinished'
  | 'CompactionCompleted';

/**
 * Structured event classified from one newly appended log line.
 */
export interface LogEvent {
  /** Timestamp token copied verbatim from the log line */
  timestamp: string;
  tag: LogEventTag;
  /** Payload tokens in template order (empty strings for missing tokens) */
  fields: string[];
}

/**
 * Pattern that turns a log line into a LogEvent.
 */
export interface LogEventTemplate {
  /** Substring that must appear in the line */
  trigger: string;
  tag: LogEventTag;
  /** Token offsets after the trigger phrase, 0 being the first token after it */
  fieldOffsets: readonly number[];
}
