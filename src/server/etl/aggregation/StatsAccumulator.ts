/**
 * StatsAccumulator
 *
 * Per-day buckets of (age, propertyId) keyed by category and dirtbike flag.
 * Buckets are created on first contribution and live for one aggregation run.
 * Entries inside a bucket keep arrival order; the reducer sorts before emitting,
 * so output never depends on the order records were fed in.
 */

import type {
  AgeEntry,
  Contribution,
  CustodyRecord,
  DataQualityIssue,
  TowCategory,
} from '../contracts/types.js';
import { expandInterval, planCustodySegments } from '../transformers/intervalExpander.js';
import type { IsoDate } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';

const log = createChildLogger({ component: 'StatsAccumulator' });

/**
 * All contributions for one (day, category, dirtbike) key
 */
export class DailyBucket {
  private readonly entries: AgeEntry[] = [];

  add(age: number, propertyId: string): void {
    this.entries.push({ age, propertyId });
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly AgeEntry[] {
    return this.entries;
  }
}

interface SizeClassBuckets {
  standard?: DailyBucket;
  dirtbike?: DailyBucket;
}

/**
 * Read side used by the reducer
 */
export interface BucketReader {
  entries(day: IsoDate, category: TowCategory, dirtbike: boolean): readonly AgeEntry[];
}

export interface IngestOptions {
  /** Calendar day that stands in for unset release dates */
  today: IsoDate;
  /** Checked before each record; an aborted signal stops the ingest between records */
  signal?: AbortSignal;
}

export interface IngestReport {
  recordsAccumulated: number;
  contributions: number;
  issues: DataQualityIssue[];
}

const EMPTY: readonly AgeEntry[] = [];

export class StatsAccumulator implements BucketReader {
  private readonly days = new Map<IsoDate, Map<TowCategory, SizeClassBuckets>>();
  private readonly ingestedProperties = new Set<string>();

  /**
   * Add already-expanded contributions
   *
   * @returns number of contributions added
   */
  accumulate(contributions: Iterable<Contribution>): number {
    let added = 0;
    for (const contribution of contributions) {
      this.bucketFor(contribution.day, contribution.category, contribution.dirtbike).add(
        contribution.age,
        contribution.propertyId
      );
      added++;
    }
    return added;
  }

  /**
   * Expand and accumulate every record. Records that cannot be placed on the lot
   * are skipped whole and returned as data-quality issues, and so is any record
   * whose property id was already ingested into this accumulator.
   */
  ingest(records: Iterable<CustodyRecord>, options: IngestOptions): IngestReport {
    const report: IngestReport = { recordsAccumulated: 0, contributions: 0, issues: [] };

    for (const record of records) {
      options.signal?.throwIfAborted();

      if (this.ingestedProperties.has(record.propertyId)) {
        log.warn({ propertyId: record.propertyId }, 'Skipping repeated custody record');
        report.issues.push({
          propertyId: record.propertyId,
          reason: 'duplicate_property_id',
          detail: `received ${record.receiveDate}`,
        });
        continue;
      }

      const plan = planCustodySegments(record, options.today);
      if (!plan.ok) {
        log.warn({ propertyId: plan.issue.propertyId, reason: plan.issue.reason, detail: plan.issue.detail },
          'Skipping custody record with bad dates');
        report.issues.push(plan.issue);
        continue;
      }

      // Expand every segment before touching a bucket so a record lands whole or not at all
      const intervals = plan.segments.map((segment) => expandInterval(segment, { today: options.today }));
      for (const interval of intervals) {
        report.contributions += this.accumulate(interval);
      }
      this.ingestedProperties.add(record.propertyId);
      report.recordsAccumulated++;
    }

    return report;
  }

  entries(day: IsoDate, category: TowCategory, dirtbike: boolean): readonly AgeEntry[] {
    const buckets = this.days.get(day)?.get(category);
    const bucket = dirtbike ? buckets?.dirtbike : buckets?.standard;
    return bucket ? bucket.list() : EMPTY;
  }

  /**
   * Days with at least one contribution, ascending
   */
  coveredDays(): IsoDate[] {
    return [...this.days.keys()].sort();
  }

  private bucketFor(day: IsoDate, category: TowCategory, dirtbike: boolean): DailyBucket {
    let categories = this.days.get(day);
    if (!categories) {
      categories = new Map();
      this.days.set(day, categories);
    }

    let sizeClasses = categories.get(category);
    if (!sizeClasses) {
      sizeClasses = {};
      categories.set(category, sizeClasses);
    }

    if (dirtbike) {
      sizeClasses.dirtbike ??= new DailyBucket();
      return sizeClasses.dirtbike;
    }
    sizeClasses.standard ??= new DailyBucket();
    return sizeClasses.standard;
  }
}
