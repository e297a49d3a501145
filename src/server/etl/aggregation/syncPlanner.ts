/**
 * SyncPlanner
 *
 * Picks the days of a requested window that still need output, so repeated runs
 * over overlapping windows only compute what is missing.
 */

import type { DateWindow } from '../contracts/types.js';
import { addDays, eachDay, toEpochDay, type IsoDate } from '../../utils/dateUtils.js';

export interface SyncPlanInput {
  window: DateWindow;
  alreadyPresent: Iterable<IsoDate>;
  /** Recompute every day of the window regardless of existing output */
  force?: boolean;
}

/**
 * Days to (re)compute, ascending. An empty window (end before start) plans nothing.
 */
export function planSync({ window, alreadyPresent, force = false }: SyncPlanInput): IsoDate[] {
  const requested = eachDay(window.start, window.end);
  if (force) {
    return requested;
  }

  const present = new Set(alreadyPresent);
  return requested.filter((day) => !present.has(day));
}

/**
 * Collapse ascending days into runs of consecutive days
 */
export function toContiguousWindows(days: readonly IsoDate[]): DateWindow[] {
  const windows: DateWindow[] = [];
  let current: DateWindow | undefined;

  for (const day of [...days].sort()) {
    if (current && toEpochDay(day) - toEpochDay(current.end) <= 1) {
      current.end = day;
      continue;
    }
    current = { start: day, end: day };
    windows.push(current);
  }

  return windows;
}

/**
 * Window of `numberOfDays` days starting at `start`
 */
export function windowFrom(start: IsoDate, numberOfDays: number): DateWindow {
  return { start, end: addDays(start, numberOfDays - 1) };
}
