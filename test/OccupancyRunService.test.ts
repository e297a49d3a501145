import { beforeEach, describe, expect, it } from 'vitest';
import type {
  CustodyRecord,
  CustodyRecordBatch,
  CustodyRecordSource,
  DataQualityIssue,
  DateWindow,
  ExistingOutputQuery,
  IsoDate,
  OccupancyOutput,
  OccupancySink,
  OccupancySummaryRow,
  RecordQueryWindow,
  VehicleAgeRow,
} from '../src/server/etl/contracts/index.js';
import { OccupancyRunService } from '../src/server/services/occupancy/OccupancyRunService.js';
import { RecordSourceError, SinkError } from '../src/server/types/errors.js';
import { SENTINEL_DATE } from '../src/server/utils/dateUtils.js';
import { custodyRecord } from './helpers/fixtures.js';

class InMemoryCustodySource implements CustodyRecordSource {
  readonly calls: RecordQueryWindow[] = [];
  failWith?: unknown;

  constructor(
    private readonly records: CustodyRecord[],
    private readonly issues: DataQualityIssue[] = []
  ) {}

  async fetchCustodyRecords(window: RecordQueryWindow): Promise<CustodyRecordBatch> {
    this.calls.push(window);
    if (this.failWith !== undefined) {
      throw this.failWith;
    }
    return { records: [...this.records], issues: [...this.issues] };
  }
}

class InMemoryOccupancyStore implements OccupancySink, ExistingOutputQuery {
  readonly ages = new Map<string, VehicleAgeRow>();
  readonly summaries = new Map<string, OccupancySummaryRow>();
  existingQueries = 0;
  summaryCallsBeforeFailure = Infinity;

  async fetchExistingDays(output: OccupancyOutput, window: DateWindow): Promise<Set<IsoDate>> {
    this.existingQueries++;
    const rows = output === 'ages' ? [...this.ages.values()] : [...this.summaries.values()];
    return new Set(rows.map((row) => row.date).filter((date) => date >= window.start && date <= window.end));
  }

  async upsertVehicleAges(rows: readonly VehicleAgeRow[]): Promise<number> {
    for (const row of rows) {
      this.ages.set(`${row.date}|${row.propertyId}`, row);
    }
    return rows.length;
  }

  async upsertSummaries(rows: readonly OccupancySummaryRow[]): Promise<number> {
    if (this.summaryCallsBeforeFailure <= 0) {
      throw new Error('disk full');
    }
    this.summaryCallsBeforeFailure--;
    for (const row of rows) {
      this.summaries.set(`${row.date}|${row.category}|${row.dirtbike}`, row);
    }
    return rows.length;
  }
}

// Local noon on 2020-01-10
const clock = () => new Date(2020, 0, 10, 12);

describe('OccupancyRunService', () => {
  let source: InMemoryCustodySource;
  let store: InMemoryOccupancyStore;
  let service: OccupancyRunService;

  beforeEach(() => {
    source = new InMemoryCustodySource([custodyRecord()]);
    store = new InMemoryOccupancyStore();
    service = new OccupancyRunService({ source, existingOutput: store, sink: store, clock });
  });

  it('computes and writes both outputs', async () => {
    const report = await service.run({ window: { start: '2020-01-01', end: '2020-01-03' }, output: 'both' });

    expect(report.today).toBe('2020-01-10');
    expect(report.outputs.map((o) => [o.output, o.plannedDays.length, o.rowsWritten])).toEqual([
      ['ages', 3, 3],
      ['summary', 3, 60],
    ]);
    expect(store.ages.get('2020-01-02|P-1')).toEqual({
      date: '2020-01-02',
      propertyId: 'P-1',
      vehicleAge: 2,
      category: 'police_action',
      dirtbike: false,
    });
    expect(store.summaries.get('2020-01-02|police_action|false')).toMatchObject({
      quantity: 1,
      averageAge: 2,
      medianAge: 2,
    });
    expect(source.calls).toEqual([
      { start: '2020-01-01', end: '2020-01-03' },
      { start: '2020-01-01', end: '2020-01-03' },
    ]);
  });

  it('writes nothing on a repeated run over the same window', async () => {
    const window = { start: '2020-01-01', end: '2020-01-03' };
    await service.run({ window, output: 'both' });
    const report = await service.run({ window, output: 'both' });

    expect(report.outputs.map((o) => [o.plannedDays.length, o.rowsWritten])).toEqual([
      [0, 0],
      [0, 0],
    ]);
    expect(source.calls).toHaveLength(2);
    expect(store.ages.size).toBe(3);
    expect(store.summaries.size).toBe(60);
  });

  it('only fetches the days that are still missing', async () => {
    await service.run({ window: { start: '2020-01-01', end: '2020-01-02' }, output: 'summary' });
    const report = await service.run({ window: { start: '2020-01-01', end: '2020-01-05' }, output: 'summary' });

    expect(report.outputs[0].plannedDays).toEqual(['2020-01-03', '2020-01-04', '2020-01-05']);
    expect(source.calls[1]).toEqual({ start: '2020-01-03', end: '2020-01-05' });
  });

  it('recomputes existing days when forced', async () => {
    const window = { start: '2020-01-01', end: '2020-01-03' };
    await service.run({ window, output: 'ages' });
    const report = await service.run({ window, output: 'ages', force: true });

    expect(report.outputs[0].plannedDays).toHaveLength(3);
    expect(report.outputs[0].rowsWritten).toBe(3);
    expect(store.existingQueries).toBe(1);
  });

  it('computes rows without writing them on a dry run', async () => {
    const report = await service.run({
      window: { start: '2020-01-01', end: '2020-01-03' },
      output: 'ages',
      dryRun: true,
      collectRows: true,
    });

    expect(report.outputs[0]).toMatchObject({ rowsComputed: 3, rowsWritten: 0 });
    expect(report.vehicleAgeRows.map((r) => r.vehicleAge)).toEqual([1, 2, 3]);
    expect(store.ages.size).toBe(0);
  });

  it('leaves days after today out of the plan', async () => {
    source = new InMemoryCustodySource([custodyRecord({ receiveDate: '2020-01-05', releaseDate: SENTINEL_DATE })]);
    service = new OccupancyRunService({ source, existingOutput: store, sink: store, clock });

    const report = await service.run({ window: { start: '2020-01-08', end: '2020-01-15' }, output: 'ages' });

    expect(report.window).toEqual({ start: '2020-01-08', end: '2020-01-10' });
    expect([...store.ages.values()].map((r) => [r.date, r.vehicleAge])).toEqual([
      ['2020-01-08', 4],
      ['2020-01-09', 5],
      ['2020-01-10', 6],
    ]);
  });

  it('reports each skipped record once across outputs', async () => {
    const invalid: DataQualityIssue = { propertyId: 'P-9', reason: 'invalid_source_row', detail: 'receive_date: bad' };
    source = new InMemoryCustodySource(
      [custodyRecord(), custodyRecord({ propertyId: 'P-2', receiveDate: SENTINEL_DATE })],
      [invalid]
    );
    service = new OccupancyRunService({ source, existingOutput: store, sink: store, clock });

    const report = await service.run({ window: { start: '2020-01-01', end: '2020-01-03' }, output: 'both' });

    expect(report.issues).toEqual([
      invalid,
      { propertyId: 'P-2', reason: 'sentinel_receive_date', detail: '1899-12-31' },
    ]);
    expect(report.outputs[0]).toMatchObject({ recordsRead: 2, recordsAccumulated: 1 });
  });

  it('wraps a sink failure and keeps rows from earlier ranges', async () => {
    await store.upsertSummaries([
      { date: '2020-01-02', category: 'total', dirtbike: false, quantity: 0, averageAge: 0, medianAge: 0 },
    ]);
    store.summaryCallsBeforeFailure = 1;

    const run = service.run({ window: { start: '2020-01-01', end: '2020-01-03' }, output: 'summary' });

    await expect(run).rejects.toBeInstanceOf(SinkError);
    await expect(run).rejects.toMatchObject({ collaborator: 'sink' });
    expect(store.summaries.get('2020-01-01|police_action|false')?.quantity).toBe(1);
    expect(store.summaries.has('2020-01-03|police_action|false')).toBe(false);
  });

  it('passes a collaborator boundary error through unchanged', async () => {
    const failure = new RecordSourceError('connection refused');
    source.failWith = failure;

    await expect(service.run({ window: { start: '2020-01-01', end: '2020-01-01' }, output: 'ages' })).rejects.toBe(
      failure
    );
  });

  it('wraps an unexpected record source failure', async () => {
    source.failWith = new Error('socket closed');

    await expect(
      service.run({ window: { start: '2020-01-01', end: '2020-01-01' }, output: 'ages' })
    ).rejects.toMatchObject({ collaborator: 'record-source' });
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped by operator'));

    await expect(
      service.run({ window: { start: '2020-01-01', end: '2020-01-03' }, output: 'ages', signal: controller.signal })
    ).rejects.toThrow('stopped by operator');
    expect(store.ages.size).toBe(0);
  });
});
