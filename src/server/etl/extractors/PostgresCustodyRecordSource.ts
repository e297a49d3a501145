/**
 * PostgresCustodyRecordSource
 *
 * Reads vehicle stays from the impound custody database. A stay is selected when
 * it overlaps the requested window; a vehicle that has not been released counts as
 * still on the lot today.
 */

import type { SqlExecutor } from '../../config/postgres.js';
import { RecordSourceError } from '../../types/errors.js';
import { SENTINEL_CUTOFF } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { custodyRowSchema, formatZodIssues } from '../contracts/schemas.js';
import type {
  CustodyRecord,
  CustodyRecordBatch,
  CustodyRecordSource,
  DataQualityIssue,
  RecordQueryWindow,
} from '../contracts/types.js';

const log = createChildLogger({ component: 'PostgresCustodyRecordSource' });

const CUSTODY_SELECT = `
  SELECT
    rel.property_number AS property_id,
    to_char(rcv.receiving_date_time, 'YYYY-MM-DD') AS receive_date,
    to_char(rel.release_date_time, 'YYYY-MM-DD') AS release_date,
    rel.pickup_code AS current_code,
    to_char(rel.pickup_code_change_date, 'YYYY-MM-DD') AS code_change_date,
    rel.original_pickup_code AS original_code,
    ident.property_type AS size_class
  FROM vehicle_release rel
  JOIN vehicle_receiving rcv ON rcv.property_number = rel.property_number
  JOIN vehicle_identification ident ON ident.property_number = rel.property_number`;

export interface CustodyQuery {
  text: string;
  params: string[];
}

/**
 * Build the custody query for a window; either bound may be open
 */
export function buildCustodyQuery(window: RecordQueryWindow): CustodyQuery {
  const conditions: string[] = [];
  const params: string[] = [];

  if (window.end) {
    params.push(window.end);
    conditions.push(`rcv.receiving_date_time::date <= $${params.length}::date`);
  }
  if (window.start) {
    params.push(window.start);
    const startParam = `$${params.length}::date`;
    params.push(SENTINEL_CUTOFF);
    const cutoffParam = `$${params.length}::date`;
    conditions.push(
      `(rel.release_date_time IS NULL OR rel.release_date_time::date < ${cutoffParam} OR rel.release_date_time::date >= ${startParam})`
    );
  }

  const where = conditions.length > 0 ? `\n  WHERE ${conditions.join('\n    AND ')}` : '';
  return { text: `${CUSTODY_SELECT}${where}\n  ORDER BY rel.property_number`, params };
}

export interface PostgresCustodyRecordSourceOptions {
  /** Retries of the query on transient failures (default 3) */
  maxAttempts?: number;
  /** Initial backoff delay in ms (default 1000) */
  initialDelay?: number;
}

export class PostgresCustodyRecordSource implements CustodyRecordSource {
  private readonly maxAttempts: number;
  private readonly initialDelay: number;

  constructor(
    private readonly db: SqlExecutor,
    options: PostgresCustodyRecordSourceOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelay = options.initialDelay ?? 1000;
  }

  async fetchCustodyRecords(window: RecordQueryWindow): Promise<CustodyRecordBatch> {
    const query = buildCustodyQuery(window);

    let rows: Record<string, unknown>[];
    try {
      const result = await retryWithBackoff(
        () => this.db.query(query.text, query.params),
        { maxAttempts: this.maxAttempts, initialDelay: this.initialDelay },
        'custody-records'
      );
      rows = result.rows;
    } catch (error) {
      throw new RecordSourceError('Failed to query custody records', error, { window });
    }

    const records: CustodyRecord[] = [];
    const issues: DataQualityIssue[] = [];
    for (const row of rows) {
      const parsed = custodyRowSchema.safeParse(row);
      if (parsed.success) {
        records.push(parsed.data);
        continue;
      }
      const rawId = row.property_id;
      issues.push({
        propertyId: typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : '',
        reason: 'invalid_source_row',
        detail: formatZodIssues(parsed.error).join('; '),
      });
    }

    log.info({ window, records: records.length, invalid: issues.length }, 'Fetched custody records');
    return { records, issues };
  }
}
