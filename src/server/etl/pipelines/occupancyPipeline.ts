#!/usr/bin/env tsx
/**
 * Lot Occupancy Pipeline
 *
 * Reads impound custody records, computes per-day vehicle ages and occupancy
 * summaries, and upserts them into the reporting database. Days that already
 * have output are skipped unless --force is given.
 *
 * Usage:
 *   tsx src/server/etl/pipelines/occupancyPipeline.ts [options]
 *
 * Options:
 *   --start YYYY-MM-DD      First day of the window
 *   --end YYYY-MM-DD        Last day of the window (default: --start)
 *   -y, -m, -d <n>          First day given as year, month and day
 *   -n, --days <n>          Number of days from the first day (default 1)
 *   --output <which>        ages | summary | both (default both)
 *   --force                 Recompute days that already have output
 *   --dry-run               Compute without writing to the database
 *   --csv-dir <dir>         Also write the computed rows as CSV files
 *
 * Without a start day the window is yesterday.
 */

import { fileURLToPath } from 'url';
import { getEnv } from '../../config/env.js';
import { asSqlPool, checkPostgresConnection, closePostgresPools, getPostgresPool } from '../../config/postgres.js';
import { CsvExportService } from '../../services/export/CsvExportService.js';
import { OccupancyRunService } from '../../services/occupancy/OccupancyRunService.js';
import { isBoundaryError, isOperationalError, toAppError, ValidationError } from '../../types/errors.js';
import { addDays, localIsoDate, type IsoDate } from '../../utils/dateUtils.js';
import { logger } from '../../utils/logger.js';
import { writeMetricsTextfile } from '../../utils/metrics.js';
import { formatZodIssues, isoDateSchema, occupancyRunArgsSchema, type OccupancyRunArgs } from '../contracts/schemas.js';
import { windowFrom } from '../aggregation/syncPlanner.js';
import { PostgresCustodyRecordSource } from '../extractors/PostgresCustodyRecordSource.js';
import { PostgresOccupancySink } from '../loaders/PostgresOccupancySink.js';

const VALUE_FLAGS = new Map<string, string>([
  ['--start', 'start'],
  ['--end', 'end'],
  ['-y', 'year'],
  ['--year', 'year'],
  ['-m', 'month'],
  ['--month', 'month'],
  ['-d', 'day'],
  ['--day', 'day'],
  ['-n', 'days'],
  ['--days', 'days'],
  ['--output', 'output'],
  ['--csv-dir', 'csvDir'],
]);

const BOOLEAN_FLAGS = new Map<string, 'force' | 'dryRun'>([
  ['--force', 'force'],
  ['--dry-run', 'dryRun'],
]);

function parseInteger(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${flag} expects a positive whole number, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Turn command line arguments into validated run options
 *
 * @param argv - Arguments after the script name
 * @param today - Local calendar day the defaults are relative to
 * @throws {ValidationError} On unknown flags, missing values or an invalid window
 */
export function parseOccupancyArgs(argv: readonly string[], today: IsoDate): OccupancyRunArgs {
  const values = new Map<string, string>();
  const flags = { force: false, dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq > 0 ? arg.slice(eq + 1) : undefined;

    const booleanKey = BOOLEAN_FLAGS.get(flag);
    if (booleanKey) {
      flags[booleanKey] = true;
      continue;
    }

    const key = VALUE_FLAGS.get(flag);
    if (!key) {
      throw new ValidationError(`Unknown option "${arg}"`);
    }
    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
      throw new ValidationError(`${flag} expects a value`);
    }
    if (inlineValue === undefined) {
      i++;
    }
    values.set(key, value);
  }

  const hasDateParts = values.has('year') || values.has('month') || values.has('day');
  if (hasDateParts && (values.has('start') || values.has('end'))) {
    throw new ValidationError('Give the window either as --start/--end or as -y/-m/-d, not both');
  }
  if (values.has('end') && !values.has('start')) {
    throw new ValidationError('--end requires --start');
  }
  if (values.has('days') && values.has('end')) {
    throw new ValidationError('Give either --end or -n, not both');
  }

  let start: string;
  if (hasDateParts) {
    const year = values.get('year');
    const month = values.get('month');
    const day = values.get('day');
    if (year === undefined || month === undefined || day === undefined) {
      throw new ValidationError('-y, -m and -d must be given together');
    }
    start = [
      String(parseInteger(year, '-y')).padStart(4, '0'),
      String(parseInteger(month, '-m')).padStart(2, '0'),
      String(parseInteger(day, '-d')).padStart(2, '0'),
    ].join('-');
  } else {
    start = values.get('start') ?? addDays(today, -1);
  }

  let end = values.get('end');
  if (end === undefined) {
    const daysValue = values.get('days');
    const numberOfDays = daysValue === undefined ? 1 : parseInteger(daysValue, '-n');
    if (numberOfDays < 1) {
      throw new ValidationError('-n must be at least 1');
    }
    const parsedStart = isoDateSchema.safeParse(start);
    if (!parsedStart.success) {
      throw new ValidationError(`Invalid start day "${start}": ${formatZodIssues(parsedStart.error).join('; ')}`);
    }
    end = windowFrom(parsedStart.data, numberOfDays).end;
  }

  const parsed = occupancyRunArgsSchema.safeParse({
    start,
    end,
    output: values.get('output') ?? 'both',
    force: flags.force,
    dryRun: flags.dryRun,
    csvDir: values.get('csvDir'),
  });
  if (!parsed.success) {
    throw new ValidationError(`Invalid options: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

async function main() {
  let args: OccupancyRunArgs;
  try {
    args = parseOccupancyArgs(process.argv.slice(2), localIsoDate());
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Invalid command line');
    process.exit(2);
  }

  const env = getEnv();
  let exitCode = 0;

  try {
    await checkPostgresConnection('source', env.SOURCE_MAX_ATTEMPTS);
    await checkPostgresConnection('reporting', env.SOURCE_MAX_ATTEMPTS);

    const source = new PostgresCustodyRecordSource(asSqlPool(getPostgresPool('source')), {
      maxAttempts: env.SOURCE_MAX_ATTEMPTS,
    });
    const sink = new PostgresOccupancySink(asSqlPool(getPostgresPool('reporting')), {
      tables: { summary: env.OCCUPANCY_SUMMARY_TABLE, ages: env.OCCUPANCY_AGES_TABLE },
      batchSize: env.UPSERT_BATCH_SIZE,
    });
    if (!args.dryRun) {
      await sink.ensureSchema();
    }

    const controller = new AbortController();
    const onSignal = () => {
      logger.warn('Interrupt received, stopping after the current record');
      controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    const service = new OccupancyRunService({ source, existingOutput: sink, sink });
    const report = await service.run({
      window: { start: args.start, end: args.end },
      output: args.output,
      force: args.force,
      dryRun: args.dryRun,
      collectRows: args.csvDir !== undefined,
      signal: controller.signal,
    });

    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);

    if (args.csvDir) {
      const files = await new CsvExportService().writeOccupancyFiles(
        args.csvDir,
        report.vehicleAgeRows,
        report.summaryRows
      );
      logger.info({ files }, 'Occupancy CSV files written');
    }

    logger.info(
      {
        runId: report.runId,
        window: report.window,
        dryRun: report.dryRun,
        outputs: report.outputs.map((output) => ({
          output: output.output,
          plannedDays: output.plannedDays.length,
          rowsComputed: output.rowsComputed,
          rowsWritten: output.rowsWritten,
        })),
        issues: report.issues.length,
      },
      'Occupancy pipeline finished'
    );
  } catch (error) {
    exitCode = 1;
    const appError = toAppError(error);
    logger.error(
      {
        error: appError.message,
        code: appError.code,
        operational: isOperationalError(error),
        collaborator: isBoundaryError(error) ? error.collaborator : undefined,
      },
      'Occupancy pipeline failed'
    );
  } finally {
    if (env.METRICS_TEXTFILE) {
      await writeMetricsTextfile(env.METRICS_TEXTFILE).catch((error: unknown) => {
        logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Failed to write metrics textfile');
      });
    }
    await closePostgresPools();
  }

  process.exit(exitCode);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Occupancy pipeline crashed');
    process.exit(1);
  });
}
