/**
 * Lot reports that read custody records directly rather than daily buckets:
 * the pickup-code census and the list of longest-held vehicles.
 */

import type { CustodyRecord, TowCategory } from '../contracts/types.js';
import { classify, isDirtbike } from '../transformers/categoryClassifier.js';
import { diffDays, isSentinelDate, type IsoDate } from '../../utils/dateUtils.js';

export interface PickupCodeCount {
  /** Raw pickup code as stored (empty string when unset) */
  code: string;
  category: TowCategory;
  quantity: number;
}

export interface CategoryCount {
  category: TowCategory;
  quantity: number;
  /** Distinct raw codes folded into the category, sorted */
  codes: string[];
}

export interface OldestVehicle {
  propertyId: string;
  receiveDate: IsoDate;
  age: number;
  category: TowCategory;
  dirtbike: boolean;
}

/**
 * Count records per current pickup code, most frequent first
 */
export function summarizePickupCodes(records: Iterable<CustodyRecord>): PickupCodeCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const code = record.currentCode;
    counts.set(code, (counts.get(code) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([code, quantity]) => ({ code, category: classify(code), quantity }))
    .sort((a, b) => b.quantity - a.quantity || (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

/**
 * Fold code counts into their categories, most frequent first
 */
export function rollupByCategory(counts: readonly PickupCodeCount[]): CategoryCount[] {
  const byCategory = new Map<TowCategory, CategoryCount>();
  for (const { code, category, quantity } of counts) {
    const entry = byCategory.get(category) ?? { category, quantity: 0, codes: [] };
    entry.quantity += quantity;
    entry.codes.push(code);
    byCategory.set(category, entry);
  }

  return [...byCategory.values()]
    .map((entry) => ({ ...entry, codes: [...entry.codes].sort() }))
    .sort((a, b) => b.quantity - a.quantity || (a.category < b.category ? -1 : 1));
}

/**
 * The `limit` vehicles still on the lot that have been there longest as of `today`
 */
export function findOldestVehicles(records: Iterable<CustodyRecord>, limit: number, today: IsoDate): OldestVehicle[] {
  const onLot: OldestVehicle[] = [];
  for (const record of records) {
    if (isSentinelDate(record.receiveDate) || !isSentinelDate(record.releaseDate) || record.receiveDate > today) {
      continue;
    }
    onLot.push({
      propertyId: record.propertyId,
      receiveDate: record.receiveDate,
      age: diffDays(today, record.receiveDate) + 1,
      category: classify(record.currentCode),
      dirtbike: isDirtbike(record.sizeClass),
    });
  }

  return onLot
    .sort((a, b) => b.age - a.age || (a.propertyId < b.propertyId ? -1 : a.propertyId > b.propertyId ? 1 : 0))
    .slice(0, Math.max(0, limit));
}
