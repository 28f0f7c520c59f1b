/**
 * Log Event Classifier
 *
 * Incrementally scans an append-only log. Each cycle only the lines appended
 * since the watermark are considered; each is matched against an ordered
 * template table and turned into a structured event. First match wins;
 * unmatched lines are dropped.
 *
 * Truncation or rotation is not detected: a log that shrinks simply yields no
 * events until it grows past the old watermark again.
 */

import { createReadStream } from 'node:fs';
import type { LogEvent, LogEventTemplate } from '../types/log-events.js';

/** Whitespace token (0-based) holding the time of day in a node log line */
export const TIMESTAMP_TOKEN_INDEX = 3;

/**
 * Classification vocabulary, in priority order.
 *
 * Field offsets count tokens after the trigger phrase, e.g. for
 * `... repair started for 12 ranges` offset 1 is `12`.
 */
export const LOG_EVENT_TEMPLATES: readonly LogEventTemplate[] = [
  { trigger: 'new commitlog created', tag: 'CommitlogCreated', fieldOffsets: [] },
  { trigger: 'flush completed', tag: 'FlushCompleted', fieldOffsets: [] },
  { trigger: 'major compaction started', tag: 'MajorCompactionStarted', fieldOffsets: [] },
  // sent to <host> <keyspace> <table>
  { trigger: 'anti-entropy tree sent', tag: 'TreeSent', fieldOffsets: [1, 2, 3] },
  // started for <n> ranges
  { trigger: 'repair started', tag: 'RepairStarted', fieldOffsets: [1] },
  // session for range <range>
  { trigger: 'manual repair session', tag: 'ManualRepairSession', fieldOffsets: [2] },
  // in progress for <n> ranges, range <i> of <total>
  { trigger: 'streaming repair in progress', tag: 'StreamingRepairProgress', fieldOffsets: [1, 4, 6] },
  { trigger: 'streaming repair finished', tag: 'StreamingRepairFinished', fieldOffsets: [] },
  // Shares "finished" semantics with the streaming template but keeps its own tag
  { trigger: 'repair command issued', tag: 'RepairCommandFinished', fieldOffsets: [] },
  { trigger: 'compaction output written', tag: 'CompactionCompleted', fieldOffsets: [] },
];

export interface ExtractResult {
  events: LogEvent[];
  watermark: number;
}

function tokenize(text: string): string[] {
  const trimmed = text.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Classify one line against the template table.
 */
export function classifyLine(
  line: string,
  templates: readonly LogEventTemplate[] = LOG_EVENT_TEMPLATES
): LogEvent | null {
  for (const template of templates) {
    const at = line.indexOf(template.trigger);
    if (at === -1) {
      continue;
    }

    const tokens = tokenize(line);
    const after = tokenize(line.slice(at + template.trigger.length));

    return {
      timestamp: tokens[TIMESTAMP_TOKEN_INDEX] ?? '',
      tag: template.tag,
      fields: template.fieldOffsets.map((offset) => after[offset] ?? ''),
    };
  }

  return null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stream the log and visit each complete line with its 0-based index. A
 * trailing segment without a newline is not a line yet. Only the current
 * partial line is held in memory.
 *
 * @returns number of complete lines, 0 when the file does not exist
 */
async function scanLines(logPath: string, visit?: (line: string, index: number) => void): Promise<number> {
  let count = 0;
  let pending = '';

  try {
    for await (const chunk of createReadStream(logPath, { encoding: 'utf-8' })) {
      const segments = `${pending}${String(chunk)}`.split('\n');
      pending = segments.pop() ?? '';
      for (const line of segments) {
        visit?.(line, count);
        count++;
      }
    }
  } catch (error) {
    if (isMissingFile(error)) {
      return 0;
    }
    throw error;
  }

  return count;
}

/**
 * Number of complete lines in the log (0 when the file does not exist).
 */
export async function countLines(logPath: string): Promise<number> {
  return scanLines(logPath);
}

/**
 * Classify the lines appended after `watermark`.
 *
 * Lines with 1-based index in `(watermark, lineCount]` are classified. The
 * returned watermark is the current line count, or the unchanged watermark
 * when the log did not grow.
 *
 * @throws if the log exists but cannot be read
 */
export async function extractEvents(
  logPath: string,
  watermark: number,
  templates: readonly LogEventTemplate[] = LOG_EVENT_TEMPLATES
): Promise<ExtractResult> {
  const events: LogEvent[] = [];
  const lineCount = await scanLines(logPath, (line, index) => {
    if (index < watermark) {
      return;
    }
    const event = classifyLine(line, templates);
    if (event) {
      events.push(event);
    }
  });

  if (lineCount <= watermark) {
    return { events: [], watermark };
  }

  return { events, watermark: lineCount };
}
