/**
 * Custody interval expansion
 *
 * Turns one stretch of a vehicle's stay into one Contribution per day. A stay
 * whose pickup code changed while on the lot is planned as two segments, and the
 * second segment's ages continue from the first.
 */

import type { Contribution, CustodyRecord, DataQualityIssue, TowCategory } from '../contracts/types.js';
import { ContractViolationError } from '../../types/errors.js';
import { addDays, diffDays, isSentinelDate, type IsoDate } from '../../utils/dateUtils.js';
import { classify, isDirtbike } from './categoryClassifier.js';

export interface IntervalSpec {
  receiveDate: IsoDate;
  /** Last day on the lot under this code; the sentinel means "still on the lot" */
  releaseDate: IsoDate;
  rawCode: string;
  sizeClass: string;
  propertyId: string;
  /** Days already spent on the lot before this interval (default 0) */
  ageOffset?: number;
}

export interface ExpandOptions {
  /** Stands in for a sentinel release date */
  today: IsoDate;
}

/**
 * Lazy, restartable sequence of the daily contributions of one interval.
 * Iterating it twice yields the same contributions.
 */
export class CustodyInterval implements Iterable<Contribution> {
  readonly category: TowCategory;
  readonly dirtbike: boolean;

  constructor(
    readonly propertyId: string,
    readonly firstDay: IsoDate,
    readonly lastDay: IsoDate,
    rawCode: string,
    sizeClass: string,
    readonly ageOffset: number
  ) {
    this.category = classify(rawCode);
    this.dirtbike = isDirtbike(sizeClass);
  }

  /** Number of days covered (0 when the substituted release precedes receipt) */
  get length(): number {
    return Math.max(0, diffDays(this.lastDay, this.firstDay) + 1);
  }

  *[Symbol.iterator](): Iterator<Contribution> {
    const span = this.length;
    for (let i = 0; i < span; i++) {
      yield {
        day: addDays(this.firstDay, i),
        age: i + this.ageOffset + 1,
        category: this.category,
        dirtbike: this.dirtbike,
        propertyId: this.propertyId,
      };
    }
  }
}

/**
 * Expand a custody interval into its daily contributions
 *
 * @throws ContractViolationError for a negative or fractional age offset, a sentinel
 * receive date, or a (non-sentinel) release date before the receive date
 */
export function expandInterval(spec: IntervalSpec, options: ExpandOptions): CustodyInterval {
  const ageOffset = spec.ageOffset ?? 0;
  if (!Number.isInteger(ageOffset) || ageOffset < 0) {
    throw new ContractViolationError('ageOffset must be a non-negative integer', {
      propertyId: spec.propertyId,
      ageOffset,
    });
  }
  if (isSentinelDate(spec.receiveDate)) {
    throw new ContractViolationError('receiveDate must be a real date', {
      propertyId: spec.propertyId,
      receiveDate: spec.receiveDate,
    });
  }

  let releaseDate = spec.releaseDate;
  if (isSentinelDate(releaseDate)) {
    releaseDate = options.today;
  } else if (releaseDate < spec.receiveDate) {
    throw new ContractViolationError('releaseDate precedes receiveDate', {
      propertyId: spec.propertyId,
      receiveDate: spec.receiveDate,
      releaseDate,
    });
  }

  return new CustodyInterval(
    spec.propertyId,
    spec.receiveDate,
    releaseDate,
    spec.rawCode,
    spec.sizeClass,
    ageOffset
  );
}

export type SegmentPlan =
  | { ok: true; segments: IntervalSpec[] }
  | { ok: false; issue: DataQualityIssue };

/**
 * Decide which intervals a custody record expands into, or why it must be skipped.
 *
 * A reclassification dated after the release never took effect on the lot, so the
 * whole stay stays under the original code. One dated on the receive day means the
 * original code never applied.
 */
export function planCustodySegments(record: CustodyRecord, today: IsoDate): SegmentPlan {
  const { propertyId, receiveDate, releaseDate, codeChangeDate, sizeClass } = record;

  if (isSentinelDate(receiveDate)) {
    return { ok: false, issue: { propertyId, reason: 'sentinel_receive_date', detail: receiveDate } };
  }

  const unreleased = isSentinelDate(releaseDate);
  if (!unreleased && releaseDate < receiveDate) {
    return {
      ok: false,
      issue: { propertyId, reason: 'release_before_receive', detail: `${receiveDate} > ${releaseDate}` },
    };
  }
  if (unreleased && today < receiveDate) {
    return {
      ok: false,
      issue: { propertyId, reason: 'receive_after_today', detail: `${receiveDate} > ${today}` },
    };
  }

  const whole = (rawCode: string): SegmentPlan => ({
    ok: true,
    segments: [{ receiveDate, releaseDate, rawCode, sizeClass, propertyId, ageOffset: 0 }],
  });

  if (isSentinelDate(codeChangeDate) || codeChangeDate === receiveDate) {
    return whole(record.currentCode);
  }
  if (codeChangeDate < receiveDate) {
    return {
      ok: false,
      issue: { propertyId, reason: 'code_change_before_receive', detail: `${codeChangeDate} < ${receiveDate}` },
    };
  }

  const lastDay = unreleased ? today : releaseDate;
  if (codeChangeDate > lastDay) {
    return whole(record.originalCode);
  }

  return {
    ok: true,
    segments: [
      {
        receiveDate,
        releaseDate: addDays(codeChangeDate, -1),
        rawCode: record.originalCode,
        sizeClass,
        propertyId,
        ageOffset: 0,
      },
      {
        receiveDate: codeChangeDate,
        releaseDate,
        rawCode: record.currentCode,
        sizeClass,
        propertyId,
        ageOffset: diffDays(codeChangeDate, receiveDate),
      },
    ],
  };
}
