import type { TimeWindow } from '@whale-signal/feed';

export const DEFAULT_INTERVAL_MINUTES = 48;

/**
 * Resolve the fetch window in unix seconds.
 *
 * Without an explicit start the window ends at the current minute and spans
 * `intervalMinutes`; without an explicit end it spans `intervalMinutes` from start,
 * minus one second because the feed's end bound is inclusive. Consecutive runs on
 * an `intervalMinutes` schedule therefore tile without overlap.
 */
export function computeWindow(
  nowMs: number,
  intervalMinutes: number = DEFAULT_INTERVAL_MINUTES,
  start?: number,
  end?: number
): TimeWindow {
  if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
    throw new RangeError(`Interval must be a positive number of minutes, got ${intervalMinutes}`);
  }

  const span = intervalMinutes * 60;
  const minute = Math.floor(nowMs / 60_000) * 60;
  const resolvedStart = start ?? minute - span;
  const resolvedEnd = end ?? resolvedStart + span - 1;

  if (resolvedEnd < resolvedStart) {
    throw new RangeError(`Window end ${resolvedEnd} is before start ${resolvedStart}`);
  }

  return { start: resolvedStart, end: resolvedEnd };
}
