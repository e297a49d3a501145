/**
 * Pickup-code classification
 *
 * Raw pickup codes carry sub-codes as letter suffixes (`111A`, `112D`); those are
 * folded into their numeric base category. A handful of exact codes are police
 * holds and get their own category even though their prefix says otherwise.
 */

import type { TowCategory } from '../contracts/types.js';

/**
 * Exact, case-sensitive pickup codes that mark a police hold
 */
export const POLICE_HOLD_CODES: ReadonlySet<string> = new Set(['111B', '111M', '111N', '111P', '111S', '200P']);

/**
 * Numeric base code to category
 */
export const TOW_CATEGORIES: ReadonlyMap<number, TowCategory> = new Map<number, TowCategory>([
  [111, 'police_action'],
  [112, 'accident'],
  [113, 'abandoned'],
  [125, 'scofflaw'],
  [140, 'impound'],
  [200, 'stolen_recovered'],
  [300, 'commercial_vehicle_restriction'],
  [1000, 'nocode'],
]);

/**
 * Every category in reporting order
 */
export const TOW_CATEGORY_ORDER: readonly TowCategory[] = [
  'police_action',
  'police_hold',
  'accident',
  'abandoned',
  'scofflaw',
  'impound',
  'stolen_recovered',
  'commercial_vehicle_restriction',
  'nocode',
];

/**
 * Vehicle types that are not full size vehicles
 */
export const DIRTBIKE_SIZE_CLASSES: ReadonlySet<string> = new Set(['DB', 'SCOT', 'ATV']);

/**
 * Map a raw pickup code to its category
 */
export function classify(rawCode: string | null | undefined): TowCategory {
  if (!rawCode) {
    return 'nocode';
  }

  if (POLICE_HOLD_CODES.has(rawCode)) {
    return 'police_hold';
  }

  const baseCode = rawCode.replace(/[^0-9]/g, '');
  if (!baseCode) {
    return 'nocode';
  }

  return TOW_CATEGORIES.get(parseInt(baseCode, 10)) ?? 'nocode';
}

export function isDirtbike(sizeClass: string | null | undefined): boolean {
  return sizeClass !== null && sizeClass !== undefined && DIRTBIKE_SIZE_CLASSES.has(sizeClass);
}
