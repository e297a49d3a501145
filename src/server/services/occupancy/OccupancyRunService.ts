/**
 * OccupancyRunService - Orchestrates one occupancy run
 *
 * plan days → fetch custody records → accumulate → reduce → upsert, once per
 * output table and per run of consecutive planned days. The aggregation core is
 * synchronous; all I/O goes through the injected collaborators, and a failure of
 * any of them aborts the run with a BoundaryError naming it. Rows upserted for
 * earlier ranges stay in place.
 */

import { randomBytes } from 'crypto';
import { StatsAccumulator } from '../../etl/aggregation/StatsAccumulator.js';
import { flattenVehicleAges, summarizeOccupancy } from '../../etl/aggregation/reducer.js';
import { planSync, toContiguousWindows } from '../../etl/aggregation/syncPlanner.js';
import type { OutputSelection } from '../../etl/contracts/schemas.js';
import type {
  CustodyRecordBatch,
  CustodyRecordSource,
  DataQualityIssue,
  DateWindow,
  ExistingOutputQuery,
  OccupancyOutput,
  OccupancySink,
  OccupancySummaryRow,
  VehicleAgeRow,
} from '../../etl/contracts/types.js';
import {
  ExistingOutputError,
  isBoundaryError,
  RecordSourceError,
  SinkError,
  type BoundaryError,
} from '../../types/errors.js';
import { localIsoDate, type IsoDate } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';
import { custodyRecordsProcessed, occupancyRowsUpserted, occupancyRunDuration } from '../../utils/metrics.js';

export interface OccupancyRunServiceDeps {
  source: CustodyRecordSource;
  existingOutput: ExistingOutputQuery;
  sink: OccupancySink;
  /** Source of "now"; decides which day stands in for unset release dates */
  clock?: () => Date;
}

export interface OccupancyRunRequest {
  window: DateWindow;
  output: OutputSelection;
  /** Recompute days that already have output */
  force?: boolean;
  /** Compute rows without writing them */
  dryRun?: boolean;
  /** Keep the computed rows on the report (for file export) */
  collectRows?: boolean;
  /** Cancels the run between records */
  signal?: AbortSignal;
}

export interface OutputRunReport {
  output: OccupancyOutput;
  plannedDays: IsoDate[];
  ranges: DateWindow[];
  recordsRead: number;
  recordsAccumulated: number;
  rowsComputed: number;
  rowsWritten: number;
}

export interface OccupancyRunReport {
  runId: string;
  window: DateWindow;
  today: IsoDate;
  dryRun: boolean;
  outputs: OutputRunReport[];
  issues: DataQualityIssue[];
  vehicleAgeRows: VehicleAgeRow[];
  summaryRows: OccupancySummaryRow[];
}

function outputsFor(selection: OutputSelection): OccupancyOutput[] {
  return selection === 'both' ? ['ages', 'summary'] : [selection];
}

/**
 * Keep a collaborator's own BoundaryError, wrap anything else it throws
 */
function asBoundaryError(error: unknown, wrap: (cause: unknown) => BoundaryError): BoundaryError {
  return isBoundaryError(error) ? error : wrap(error);
}

export class OccupancyRunService {
  private readonly source: CustodyRecordSource;
  private readonly existingOutput: ExistingOutputQuery;
  private readonly sink: OccupancySink;
  private readonly clock: () => Date;

  constructor(deps: OccupancyRunServiceDeps) {
    this.source = deps.source;
    this.existingOutput = deps.existingOutput;
    this.sink = deps.sink;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Execute a run over the requested window
   *
   * Days after today have no custody data yet and are left out of the plan.
   */
  async run(request: OccupancyRunRequest): Promise<OccupancyRunReport> {
    const runId = `occupancy-${Date.now()}-${randomBytes(4).toString('hex')}`;
    const log = createChildLogger({ component: 'OccupancyRunService', runId });
    const today = localIsoDate(this.clock());
    const dryRun = request.dryRun ?? false;

    const window: DateWindow = {
      start: request.window.start,
      end: request.window.end > today ? today : request.window.end,
    };
    if (window.end !== request.window.end) {
      log.info({ requestedEnd: request.window.end, today }, 'Clamped run window to today');
    }

    const report: OccupancyRunReport = {
      runId,
      window,
      today,
      dryRun,
      outputs: [],
      issues: [],
      vehicleAgeRows: [],
      summaryRows: [],
    };
    const issueKeys = new Set<string>();

    const endTimer = occupancyRunDuration.startTimer();
    log.info({ window, output: request.output, force: request.force ?? false, dryRun }, 'Occupancy run started');

    try {
      for (const output of outputsFor(request.output)) {
        const outputReport = await this.runOutput(output, window, today, request, report, issueKeys);
        report.outputs.push(outputReport);
        log.info(
          {
            output,
            plannedDays: outputReport.plannedDays.length,
            recordsRead: outputReport.recordsRead,
            rowsWritten: outputReport.rowsWritten,
          },
          'Occupancy output complete'
        );
      }
    } catch (error) {
      endTimer({ status: 'failed' });
      log.error(
        {
          error: error instanceof Error ? error.message : String(error),
          collaborator: isBoundaryError(error) ? error.collaborator : undefined,
        },
        'Occupancy run failed'
      );
      throw error;
    }

    endTimer({ status: 'succeeded' });
    log.info({ issues: report.issues.length }, 'Occupancy run finished');
    return report;
  }

  private async runOutput(
    output: OccupancyOutput,
    window: DateWindow,
    today: IsoDate,
    request: OccupancyRunRequest,
    report: OccupancyRunReport,
    issueKeys: Set<string>
  ): Promise<OutputRunReport> {
    const force = request.force ?? false;
    const outputReport: OutputRunReport = {
      output,
      plannedDays: [],
      ranges: [],
      recordsRead: 0,
      recordsAccumulated: 0,
      rowsComputed: 0,
      rowsWritten: 0,
    };

    if (window.end < window.start) {
      return outputReport;
    }

    let alreadyPresent = new Set<IsoDate>();
    if (!force) {
      try {
        alreadyPresent = await this.existingOutput.fetchExistingDays(output, window);
      } catch (error) {
        throw asBoundaryError(error, (cause) => new ExistingOutputError('Failed to query existing days', cause));
      }
    }

    outputReport.plannedDays = planSync({ window, alreadyPresent, force });
    outputReport.ranges = toContiguousWindows(outputReport.plannedDays);

    const recordIssue = (issue: DataQualityIssue): void => {
      const key = `${issue.propertyId}|${issue.reason}`;
      if (!issueKeys.has(key)) {
        issueKeys.add(key);
        report.issues.push(issue);
      }
    };

    for (const range of outputReport.ranges) {
      request.signal?.throwIfAborted();

      let batch: CustodyRecordBatch;
      try {
        batch = await this.source.fetchCustodyRecords(range);
      } catch (error) {
        throw asBoundaryError(error, (cause) => new RecordSourceError('Failed to fetch custody records', cause));
      }
      batch.issues.forEach(recordIssue);

      const accumulator = new StatsAccumulator();
      const ingest = accumulator.ingest(batch.records, { today, signal: request.signal });
      ingest.issues.forEach(recordIssue);

      outputReport.recordsRead += batch.records.length;
      outputReport.recordsAccumulated += ingest.recordsAccumulated;
      custodyRecordsProcessed.inc({ output, outcome: 'accumulated' }, ingest.recordsAccumulated);
      custodyRecordsProcessed.inc({ output, outcome: 'skipped' }, ingest.issues.length + batch.issues.length);

      const written = output === 'ages'
        ? await this.writeVehicleAges(flattenVehicleAges(accumulator, range.start, range.end), request, report, outputReport)
        : await this.writeSummaries(summarizeOccupancy(accumulator, range.start, range.end), request, report, outputReport);

      outputReport.rowsWritten += written;
      occupancyRowsUpserted.inc({ output }, written);
    }

    return outputReport;
  }

  private async writeVehicleAges(
    rows: VehicleAgeRow[],
    request: OccupancyRunRequest,
    report: OccupancyRunReport,
    outputReport: OutputRunReport
  ): Promise<number> {
    outputReport.rowsComputed += rows.length;
    if (request.collectRows) {
      report.vehicleAgeRows.push(...rows);
    }
    if (request.dryRun) {
      return 0;
    }
    try {
      return await this.sink.upsertVehicleAges(rows);
    } catch (error) {
      throw asBoundaryError(error, (cause) => new SinkError('Failed to upsert vehicle ages', cause));
    }
  }

  private async writeSummaries(
    rows: OccupancySummaryRow[],
    request: OccupancyRunRequest,
    report: OccupancyRunReport,
    outputReport: OutputRunReport
  ): Promise<number> {
    outputReport.rowsComputed += rows.length;
    if (request.collectRows) {
      report.summaryRows.push(...rows);
    }
    if (request.dryRun) {
      return 0;
    }
    try {
      return await this.sink.upsertSummaries(rows);
    } catch (error) {
      throw asBoundaryError(error, (cause) => new SinkError('Failed to upsert occupancy summaries', cause));
    }
  }
}
