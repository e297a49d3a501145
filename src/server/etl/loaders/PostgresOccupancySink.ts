/**
 * PostgresOccupancySink
 *
 * Writes occupancy rows to the reporting database. Every upsert call runs in one
 * transaction, so a call either lands completely or not at all; repeating a call
 * with the same rows leaves the tables unchanged.
 */

import type { SqlPool } from '../../config/postgres.js';
import { ExistingOutputError, SinkError } from '../../types/errors.js';
import type { IsoDate } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';
import type {
  DateWindow,
  ExistingOutputQuery,
  OccupancyOutput,
  OccupancySink,
  OccupancySummaryRow,
  VehicleAgeRow,
} from '../contracts/types.js';

const log = createChildLogger({ component: 'PostgresOccupancySink' });

export interface OccupancyTables {
  /** Per-day, per-category aggregate table */
  summary: string;
  /** Per-vehicle, per-day table */
  ages: string;
}

export interface PostgresOccupancySinkOptions {
  tables: OccupancyTables;
  /** Rows per INSERT statement (default 500) */
  batchSize?: number;
}

interface UpsertStatement<Row> {
  table: string;
  columns: readonly string[];
  conflictKey: readonly string[];
  updateColumns: readonly string[];
  /** Column casts applied to the placeholders, by column index */
  casts?: Readonly<Record<number, string>>;
  values: (row: Row) => unknown[];
}

/**
 * Multi-row `INSERT … ON CONFLICT DO UPDATE` for one batch of rows
 */
export function buildUpsertSql<Row>(statement: UpsertStatement<Row>, rows: readonly Row[]): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = statement.values(row).map((value, index) => {
      params.push(value);
      const cast = statement.casts?.[index];
      return cast ? `$${params.length}::${cast}` : `$${params.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const updates = statement.updateColumns.map((column) => `${column} = EXCLUDED.${column}`);
  const text = [
    `INSERT INTO ${statement.table} (${statement.columns.join(', ')})`,
    `VALUES ${tuples.join(',\n       ')}`,
    `ON CONFLICT (${statement.conflictKey.join(', ')})`,
    `DO UPDATE SET ${updates.join(', ')}`,
  ].join('\n');

  return { text, params };
}

export class PostgresOccupancySink implements OccupancySink, ExistingOutputQuery {
  private readonly tables: OccupancyTables;
  private readonly batchSize: number;

  constructor(
    private readonly db: SqlPool,
    options: PostgresOccupancySinkOptions
  ) {
    this.tables = options.tables;
    this.batchSize = options.batchSize ?? 500;
  }

  /**
   * Create both output tables if they do not exist yet
   */
  async ensureSchema(): Promise<void> {
    try {
      await this.db.query(`
        CREATE TABLE IF NOT EXISTS ${this.tables.summary} (
          date DATE NOT NULL,
          quantity INTEGER NOT NULL,
          average REAL NOT NULL,
          medianage REAL NOT NULL,
          dirtbike_flag BOOLEAN NOT NULL,
          category VARCHAR(50) NOT NULL,
          PRIMARY KEY (date, category, dirtbike_flag)
        )
      `);
      await this.db.query(`
        CREATE TABLE IF NOT EXISTS ${this.tables.ages} (
          date DATE NOT NULL,
          property_id VARCHAR(50) NOT NULL,
          vehicle_age INTEGER NOT NULL,
          category VARCHAR(50) NOT NULL,
          dirtbike_flag BOOLEAN NOT NULL,
          PRIMARY KEY (date, property_id)
        )
      `);
      log.info({ tables: this.tables }, 'Occupancy tables ensured');
    } catch (error) {
      throw new SinkError('Failed to ensure occupancy tables', error, { tables: this.tables });
    }
  }

  async fetchExistingDays(output: OccupancyOutput, window: DateWindow): Promise<Set<IsoDate>> {
    const table = output === 'ages' ? this.tables.ages : this.tables.summary;
    try {
      const result = await this.db.query(
        `SELECT DISTINCT to_char(date, 'YYYY-MM-DD') AS day
           FROM ${table}
          WHERE date >= $1::date AND date <= $2::date`,
        [window.start, window.end]
      );
      const days = new Set<IsoDate>();
      for (const row of result.rows) {
        if (typeof row.day === 'string') {
          days.add(row.day);
        }
      }
      return days;
    } catch (error) {
      throw new ExistingOutputError('Failed to query existing output days', error, { table, window });
    }
  }

  async upsertVehicleAges(rows: readonly VehicleAgeRow[]): Promise<number> {
    return this.upsert(rows, {
      table: this.tables.ages,
      columns: ['date', 'property_id', 'vehicle_age', 'category', 'dirtbike_flag'],
      conflictKey: ['date', 'property_id'],
      updateColumns: ['vehicle_age', 'category', 'dirtbike_flag'],
      casts: { 0: 'date' },
      values: (row) => [row.date, row.propertyId, row.vehicleAge, row.category, row.dirtbike],
    });
  }

  async upsertSummaries(rows: readonly OccupancySummaryRow[]): Promise<number> {
    return this.upsert(rows, {
      table: this.tables.summary,
      columns: ['date', 'quantity', 'average', 'medianage', 'dirtbike_flag', 'category'],
      conflictKey: ['date', 'category', 'dirtbike_flag'],
      updateColumns: ['quantity', 'average', 'medianage'],
      casts: { 0: 'date' },
      values: (row) => [row.date, row.quantity, row.averageAge, row.medianAge, row.dirtbike, row.category],
    });
  }

  private async upsert<Row>(rows: readonly Row[], statement: UpsertStatement<Row>): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    const session = await this.db.connect().catch((error: unknown) => {
      throw new SinkError('Failed to acquire a reporting connection', error, { table: statement.table });
    });

    try {
      await session.query('BEGIN');
      for (let offset = 0; offset < rows.length; offset += this.batchSize) {
        const batch = rows.slice(offset, offset + this.batchSize);
        const { text, params } = buildUpsertSql(statement, batch);
        await session.query(text, params);
      }
      await session.query('COMMIT');
      session.release();
    } catch (error) {
      try {
        await session.query('ROLLBACK');
      } catch (rollbackError) {
        log.error({ error: rollbackError, table: statement.table }, 'Rollback failed');
      }
      session.release(error instanceof Error ? error : undefined);
      throw new SinkError(`Failed to upsert into ${statement.table}`, error, {
        table: statement.table,
        rows: rows.length,
      });
    }

    log.debug({ table: statement.table, rows: rows.length }, 'Upserted occupancy rows');
    return rows.length;
  }
}
