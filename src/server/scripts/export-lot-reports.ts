#!/usr/bin/env tsx
/**
 * Lot reports export
 *
 * Writes the pickup-code census, its per-category rollup and the list of
 * longest-held vehicles as CSV files.
 *
 * Usage:
 *   tsx src/server/scripts/export-lot-reports.ts [--codes file] [--categories file] [--oldest file]
 *                                                [--limit n] [--start YYYY-MM-DD] [--end YYYY-MM-DD]
 *
 * --start/--end restrict the records to stays overlapping that window.
 */

import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { asSqlPool, checkPostgresConnection, closePostgresPools, getPostgresPool } from '../config/postgres.js';
import { formatZodIssues, lotReportArgsSchema, type LotReportArgs } from '../etl/contracts/schemas.js';
import { PostgresCustodyRecordSource } from '../etl/extractors/PostgresCustodyRecordSource.js';
import { findOldestVehicles, rollupByCategory, summarizePickupCodes } from '../etl/reports/lotReports.js';
import {
  CATEGORY_COUNT_COLUMNS,
  CsvExportService,
  OLDEST_VEHICLE_COLUMNS,
  PICKUP_CODE_COLUMNS,
} from '../services/export/CsvExportService.js';
import { ValidationError } from '../types/errors.js';
import { localIsoDate } from '../utils/dateUtils.js';
import { logger } from '../utils/logger.js';

const OPTIONS = new Map<string, keyof LotReportArgs>([
  ['--codes', 'codesFile'],
  ['--categories', 'categoriesFile'],
  ['--oldest', 'oldestFile'],
  ['--limit', 'limit'],
  ['--start', 'start'],
  ['--end', 'end'],
]);

/**
 * @throws {ValidationError} On unknown flags, missing values or invalid options
 */
export function parseLotReportArgs(argv: readonly string[]): LotReportArgs {
  const raw: Record<string, string | number> = { limit: 20 };

  for (let i = 0; i < argv.length; i++) {
    const key = OPTIONS.get(argv[i]);
    if (!key) {
      throw new ValidationError(`Unknown option "${argv[i]}"`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`${argv[i]} expects a value`);
    }
    raw[key] = key === 'limit' ? Number(value) : value;
    i++;
  }

  const parsed = lotReportArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid options: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

async function main() {
  let args: LotReportArgs;
  try {
    args = parseLotReportArgs(process.argv.slice(2));
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Invalid command line');
    process.exit(2);
  }

  const env = getEnv();
  let exitCode = 0;

  try {
    await checkPostgresConnection('source', env.SOURCE_MAX_ATTEMPTS);
    const source = new PostgresCustodyRecordSource(asSqlPool(getPostgresPool('source')), {
      maxAttempts: env.SOURCE_MAX_ATTEMPTS,
    });
    const { records, issues } = await source.fetchCustodyRecords({ start: args.start, end: args.end });
    if (issues.length > 0) {
      logger.warn({ invalidRows: issues.length }, 'Skipped custody rows that failed validation');
    }

    const exporter = new CsvExportService();
    const codes = summarizePickupCodes(records);
    if (args.codesFile) {
      await exporter.writeCsv(args.codesFile, codes, PICKUP_CODE_COLUMNS);
    }
    if (args.categoriesFile) {
      await exporter.writeCsv(args.categoriesFile, rollupByCategory(codes), CATEGORY_COUNT_COLUMNS);
    }
    if (args.oldestFile) {
      const oldest = findOldestVehicles(records, args.limit, localIsoDate());
      await exporter.writeCsv(args.oldestFile, oldest, OLDEST_VEHICLE_COLUMNS);
    }

    logger.info({ records: records.length, distinctCodes: codes.length }, 'Lot reports exported');
  } catch (error) {
    exitCode = 1;
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Lot reports export failed');
  } finally {
    await closePostgresPools();
  }

  process.exit(exitCode);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Lot reports export crashed');
    process.exit(1);
  });
}
