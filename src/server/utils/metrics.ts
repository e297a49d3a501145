import { writeFile } from 'fs/promises';
import { Registry, Counter, Histogram } from 'prom-client';
import { logger } from './logger.js';

/**
 * Prometheus metrics registry
 */
export const metricsRegistry = new Registry();

/**
 * Custody records seen by the accumulator, by outcome (accumulated | skipped)
 */
export const custodyRecordsProcessed = new Counter({
  name: 'occupancy_custody_records_total',
  help: 'Custody records processed by the occupancy pipeline',
  labelNames: ['output', 'outcome'],
  registers: [metricsRegistry],
});

/**
 * Rows written to the reporting store, by table
 */
export const occupancyRowsUpserted = new Counter({
  name: 'occupancy_rows_upserted_total',
  help: 'Rows upserted into the reporting store',
  labelNames: ['output'],
  registers: [metricsRegistry],
});

export const occupancyRunDuration = new Histogram({
  name: 'occupancy_run_duration_seconds',
  help: 'Duration of occupancy runs in seconds',
  labelNames: ['status'],
  buckets: [1, 5, 15, 60, 300, 900, 3600],
  registers: [metricsRegistry],
});

/**
 * Dump the registry in Prometheus text format for the node-exporter textfile collector
 */
export async function writeMetricsTextfile(path: string): Promise<void> {
  const body = await metricsRegistry.metrics();
  await writeFile(path, body, 'utf-8');
  logger.debug({ path }, 'Metrics textfile written');
}
