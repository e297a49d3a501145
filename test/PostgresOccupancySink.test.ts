import { describe, expect, it } from 'vitest';
import type { SqlPool, SqlQueryResult, SqlSession } from '../src/server/config/postgres.js';
import type { OccupancySummaryRow, VehicleAgeRow } from '../src/server/etl/contracts/types.js';
import { buildUpsertSql, PostgresOccupancySink } from '../src/server/etl/loaders/PostgresOccupancySink.js';
import { ExistingOutputError, SinkError } from '../src/server/types/errors.js';

interface RecordedQuery {
  text: string;
  params?: unknown[];
}

/**
 * Records every statement; fails the statement whose text starts with `failOn`
 */
class RecordingPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  readonly released: Array<Error | undefined> = [];
  rows: Record<string, unknown>[] = [];
  failOn?: string;

  async query(text: string, params?: unknown[]): Promise<SqlQueryResult> {
    this.queries.push({ text, params });
    if (this.failOn && text.trimStart().startsWith(this.failOn)) {
      throw new Error(`failed: ${this.failOn}`);
    }
    return { rows: this.rows, rowCount: this.rows.length };
  }

  async connect(): Promise<SqlSession> {
    return {
      query: (text, params) => this.query(text, params),
      release: (error) => {
        this.released.push(error);
      },
    };
  }
}

const TABLES = { summary: 'towstat_bydate', ages: 'towstat_agebydate' };

function ageRow(propertyId: string, vehicleAge: number): VehicleAgeRow {
  return { date: '2020-01-02', propertyId, vehicleAge, category: 'police_action', dirtbike: false };
}

describe('PostgresOccupancySink', () => {
  describe('buildUpsertSql', () => {
    it('numbers placeholders across rows and applies casts', () => {
      const { text, params } = buildUpsertSql(
        {
          table: 'towstat_agebydate',
          columns: ['date', 'property_id'],
          conflictKey: ['date', 'property_id'],
          updateColumns: ['property_id'],
          casts: { 0: 'date' },
          values: (row: { date: string; id: string }) => [row.date, row.id],
        },
        [
          { date: '2020-01-01', id: 'P-1' },
          { date: '2020-01-02', id: 'P-2' },
        ]
      );

      expect(text).toBe(
        [
          'INSERT INTO towstat_agebydate (date, property_id)',
          'VALUES ($1::date, $2),\n       ($3::date, $4)',
          'ON CONFLICT (date, property_id)',
          'DO UPDATE SET property_id = EXCLUDED.property_id',
        ].join('\n')
      );
      expect(params).toEqual(['2020-01-01', 'P-1', '2020-01-02', 'P-2']);
    });
  });

  it('upserts summaries inside one transaction', async () => {
    const pool = new RecordingPool();
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });
    const row: OccupancySummaryRow = {
      date: '2020-01-02',
      quantity: 1,
      averageAge: 2,
      medianAge: 2,
      dirtbike: false,
      category: 'police_action',
    };

    await expect(sink.upsertSummaries([row])).resolves.toBe(1);

    expect(pool.queries.map((q) => q.text.split('\n')[0])).toEqual([
      'BEGIN',
      'INSERT INTO towstat_bydate (date, quantity, average, medianage, dirtbike_flag, category)',
      'COMMIT',
    ]);
    expect(pool.queries[1].params).toEqual(['2020-01-02', 1, 2, 2, false, 'police_action']);
    expect(pool.queries[1].text).toContain('ON CONFLICT (date, category, dirtbike_flag)');
    expect(pool.released).toEqual([undefined]);
  });

  it('splits large inputs into batches', async () => {
    const pool = new RecordingPool();
    const sink = new PostgresOccupancySink(pool, { tables: TABLES, batchSize: 2 });

    await expect(sink.upsertVehicleAges([ageRow('P-1', 1), ageRow('P-2', 2), ageRow('P-3', 3)])).resolves.toBe(3);

    const inserts = pool.queries.filter((q) => q.text.startsWith('INSERT'));
    expect(inserts.map((q) => q.params)).toEqual([
      ['2020-01-02', 'P-1', 1, 'police_action', false, '2020-01-02', 'P-2', 2, 'police_action', false],
      ['2020-01-02', 'P-3', 3, 'police_action', false],
    ]);
  });

  it('does not touch the database for no rows', async () => {
    const pool = new RecordingPool();
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });

    await expect(sink.upsertVehicleAges([])).resolves.toBe(0);
    expect(pool.queries).toEqual([]);
  });

  it('rolls back and raises a SinkError when a batch fails', async () => {
    const pool = new RecordingPool();
    pool.failOn = 'INSERT';
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });

    await expect(sink.upsertVehicleAges([ageRow('P-1', 1)])).rejects.toBeInstanceOf(SinkError);

    expect(pool.queries.map((q) => q.text.split('\n')[0].split(' (')[0])).toEqual([
      'BEGIN',
      'INSERT INTO towstat_agebydate',
      'ROLLBACK',
    ]);
    expect(pool.released).toHaveLength(1);
    expect(pool.released[0]?.message).toBe('failed: INSERT');
  });

  it('reads the days that already have output', async () => {
    const pool = new RecordingPool();
    pool.rows = [{ day: '2020-01-01' }, { day: '2020-01-03' }];
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });

    const days = await sink.fetchExistingDays('ages', { start: '2020-01-01', end: '2020-01-05' });

    expect([...days]).toEqual(['2020-01-01', '2020-01-03']);
    expect(pool.queries[0].text).toContain('FROM towstat_agebydate');
    expect(pool.queries[0].params).toEqual(['2020-01-01', '2020-01-05']);
  });

  it('raises an ExistingOutputError when the lookup fails', async () => {
    const pool = new RecordingPool();
    pool.failOn = 'SELECT';
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });

    await expect(sink.fetchExistingDays('summary', { start: '2020-01-01', end: '2020-01-01' })).rejects.toMatchObject({
      collaborator: 'existing-output',
    });
    await expect(sink.fetchExistingDays('summary', { start: '2020-01-01', end: '2020-01-01' })).rejects.toBeInstanceOf(
      ExistingOutputError
    );
  });

  it('creates both tables', async () => {
    const pool = new RecordingPool();
    const sink = new PostgresOccupancySink(pool, { tables: TABLES });

    await sink.ensureSchema();

    expect(pool.queries).toHaveLength(2);
    expect(pool.queries[0].text).toContain('CREATE TABLE IF NOT EXISTS towstat_bydate');
    expect(pool.queries[1].text).toContain('CREATE TABLE IF NOT EXISTS towstat_agebydate');
  });
});
