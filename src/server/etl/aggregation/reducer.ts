/**
 * Reducer
 *
 * Turns accumulated buckets into output rows for a window of days. Rows are
 * ordered by day, then category (reporting order), then standard before dirtbike.
 */

import type {
  AgeEntry,
  OccupancySummaryRow,
  SummaryCategory,
  VehicleAgeRow,
} from '../contracts/types.js';
import { TOW_CATEGORY_ORDER } from '../transformers/categoryClassifier.js';
import { eachDay, type IsoDate } from '../../utils/dateUtils.js';
import type { BucketReader } from './StatsAccumulator.js';

const SIZE_CLASS_ORDER: readonly boolean[] = [false, true];

function compareEntries(a: AgeEntry, b: AgeEntry): number {
  if (a.propertyId !== b.propertyId) {
    return a.propertyId < b.propertyId ? -1 : 1;
  }
  return a.age - b.age;
}

/**
 * One row per vehicle per day in `[start, end]`. Empty buckets produce no rows.
 */
export function flattenVehicleAges(buckets: BucketReader, start: IsoDate, end: IsoDate): VehicleAgeRow[] {
  const rows: VehicleAgeRow[] = [];

  for (const date of eachDay(start, end)) {
    for (const category of TOW_CATEGORY_ORDER) {
      for (const dirtbike of SIZE_CLASS_ORDER) {
        const entries = [...buckets.entries(date, category, dirtbike)].sort(compareEntries);
        for (const { age, propertyId } of entries) {
          rows.push({ date, propertyId, vehicleAge: age, category, dirtbike });
        }
      }
    }
  }

  return rows;
}

export interface AgeStats {
  quantity: number;
  averageAge: number;
  medianAge: number;
}

/**
 * Count, mean and median of a list of ages; all zero for an empty list
 */
export function computeAgeStats(ages: readonly number[]): AgeStats {
  if (ages.length === 0) {
    return { quantity: 0, averageAge: 0, medianAge: 0 };
  }

  const sorted = [...ages].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, age) => acc + age, 0);
  const middle = Math.floor(sorted.length / 2);
  const medianAge = sorted.length % 2 === 1
    ? sorted[middle]
    : (sorted[middle - 1] + sorted[middle]) / 2;

  return { quantity: sorted.length, averageAge: sum / sorted.length, medianAge };
}

/**
 * One summary row per day, category and size class in `[start, end]`, plus a
 * `total` row per day and size class over the union of that day's category lists.
 * Categories without vehicles still get a row with zero quantity.
 */
export function summarizeOccupancy(buckets: BucketReader, start: IsoDate, end: IsoDate): OccupancySummaryRow[] {
  const rows: OccupancySummaryRow[] = [];

  for (const date of eachDay(start, end)) {
    const dayRows: OccupancySummaryRow[] = [];

    for (const dirtbike of SIZE_CLASS_ORDER) {
      const allAges: number[] = [];
      for (const category of TOW_CATEGORY_ORDER) {
        const ages = buckets.entries(date, category, dirtbike).map((entry) => entry.age);
        allAges.push(...ages);
        dayRows.push(summaryRow(date, category, dirtbike, computeAgeStats(ages)));
      }
      dayRows.push(summaryRow(date, 'total', dirtbike, computeAgeStats(allAges)));
    }

    rows.push(...dayRows.sort(compareSummaryRows));
  }

  return rows;
}

function summaryRow(date: IsoDate, category: SummaryCategory, dirtbike: boolean, stats: AgeStats): OccupancySummaryRow {
  return { date, category, dirtbike, ...stats };
}

const CATEGORY_RANK = new Map<SummaryCategory, number>(
  ['total' as const, ...TOW_CATEGORY_ORDER].map((category, index): [SummaryCategory, number] => [category, index])
);

function compareSummaryRows(a: OccupancySummaryRow, b: OccupancySummaryRow): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  const rank = (CATEGORY_RANK.get(a.category) ?? 0) - (CATEGORY_RANK.get(b.category) ?? 0);
  if (rank !== 0) {
    return rank;
  }
  return Number(a.dirtbike) - Number(b.dirtbike);
}
