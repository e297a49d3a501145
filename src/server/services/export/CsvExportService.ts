import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { OccupancySummaryRow, VehicleAgeRow } from '../../etl/contracts/types.js';
import type { CategoryCount, OldestVehicle, PickupCodeCount } from '../../etl/reports/lotReports.js';
import { logger } from '../../utils/logger.js';

type CsvValue = string | number | boolean | null | undefined;

/**
 * Column definition: header text plus the accessor producing the cell
 */
export interface CsvColumn<Row> {
  header: string;
  value: (row: Row) => CsvValue;
}

export const VEHICLE_AGE_COLUMNS: readonly CsvColumn<VehicleAgeRow>[] = [
  { header: 'date', value: (row) => row.date },
  { header: 'property_id', value: (row) => row.propertyId },
  { header: 'vehicle_age', value: (row) => row.vehicleAge },
  { header: 'category', value: (row) => row.category },
  { header: 'dirtbike_flag', value: (row) => row.dirtbike },
];

export const SUMMARY_COLUMNS: readonly CsvColumn<OccupancySummaryRow>[] = [
  { header: 'date', value: (row) => row.date },
  { header: 'quantity', value: (row) => row.quantity },
  { header: 'average', value: (row) => row.averageAge },
  { header: 'medianage', value: (row) => row.medianAge },
  { header: 'dirtbike_flag', value: (row) => row.dirtbike },
  { header: 'category', value: (row) => row.category },
];

export const PICKUP_CODE_COLUMNS: readonly CsvColumn<PickupCodeCount>[] = [
  { header: 'pickup_code', value: (row) => row.code },
  { header: 'category', value: (row) => row.category },
  { header: 'quantity', value: (row) => row.quantity },
];

export const CATEGORY_COUNT_COLUMNS: readonly CsvColumn<CategoryCount>[] = [
  { header: 'category', value: (row) => row.category },
  { header: 'quantity', value: (row) => row.quantity },
  { header: 'pickup_codes', value: (row) => row.codes.join(' ') },
];

export const OLDEST_VEHICLE_COLUMNS: readonly CsvColumn<OldestVehicle>[] = [
  { header: 'property_id', value: (row) => row.propertyId },
  { header: 'receive_date', value: (row) => row.receiveDate },
  { header: 'age', value: (row) => row.age },
  { header: 'category', value: (row) => row.category },
  { header: 'dirtbike_flag', value: (row) => row.dirtbike },
];

/**
 * Renders report rows as CSV and writes them to disk
 */
export class CsvExportService {
  /**
   * Escape a CSV field; quotes the value when it holds a comma, a quote or a line break
   */
  escapeCsvField(value: CsvValue): string {
    if (value === null || value === undefined) return '';
    const str = String(value);
    if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
      return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
  }

  /**
   * Header line plus one line per row, each terminated by `\n`
   */
  toCsv<Row>(rows: readonly Row[], columns: readonly CsvColumn<Row>[]): string {
    const lines = [columns.map((column) => this.escapeCsvField(column.header)).join(',')];
    for (const row of rows) {
      lines.push(columns.map((column) => this.escapeCsvField(column.value(row))).join(','));
    }
    return lines.join('\n') + '\n';
  }

  async writeCsv<Row>(filePath: string, rows: readonly Row[], columns: readonly CsvColumn<Row>[]): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, this.toCsv(rows, columns), 'utf-8');
    logger.info({ filePath, rows: rows.length }, 'CSV export written');
  }

  /**
   * Write `vehicle_ages.csv` and `occupancy_summary.csv` into a directory
   *
   * @returns Paths of the written files
   */
  async writeOccupancyFiles(
    directory: string,
    vehicleAges: readonly VehicleAgeRow[],
    summaries: readonly OccupancySummaryRow[]
  ): Promise<string[]> {
    const agesPath = path.join(directory, 'vehicle_ages.csv');
    const summaryPath = path.join(directory, 'occupancy_summary.csv');
    await this.writeCsv(agesPath, vehicleAges, VEHICLE_AGE_COLUMNS);
    await this.writeCsv(summaryPath, summaries, SUMMARY_COLUMNS);
    return [agesPath, summaryPath];
  }
}
