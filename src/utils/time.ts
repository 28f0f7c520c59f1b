/**
 * Wall-clock helpers
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source used by the sampling loop. Tests substitute a manual clock.
 */
export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time of day as HH:MM:SS
 */
export function formatClockTime(epochMs: number): string {
  const date = new Date(epochMs);
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * Whole seconds since the epoch
 */
export function toEpochSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}
