/**
 * Occupancy Pipeline Contract Schemas (Zod)
 *
 * Runtime validation of custody rows coming out of the source database and of
 * run options coming from the command line.
 */

import { z } from 'zod';
import { isIsoDateShaped, isSentinelDate, isValidIsoDate, SENTINEL_DATE } from '../../utils/dateUtils.js';
import type { CustodyRecord } from './types.js';

const ISO_DATE_MESSAGE = 'Expected a calendar date in YYYY-MM-DD format';

/**
 * `YYYY-MM-DD` naming a real calendar day
 */
export const isoDateSchema = z
  .string()
  .trim()
  .refine(isValidIsoDate, { message: ISO_DATE_MESSAGE });

/**
 * Stored date; NULL and every placeholder before the cutoff map to the sentinel.
 * Placeholders such as `0000-00-00` are not real days, so only the shape is
 * checked before the mapping.
 */
export const storedDateSchema = z
  .string()
  .trim()
  .refine(isIsoDateShaped, { message: ISO_DATE_MESSAGE })
  .transform((value) => (isSentinelDate(value) ? SENTINEL_DATE : value))
  .pipe(isoDateSchema)
  .nullable()
  .transform((value) => value ?? SENTINEL_DATE);

/**
 * Free-text code column; NULL and padding collapse to a trimmed string
 */
const codeSchema = z
  .string()
  .nullable()
  .transform((value) => (value ?? '').trim());

/**
 * One row of the custody query
 */
export const custodyRowSchema = z
  .object({
    property_id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()).pipe(z.string().min(1)),
    receive_date: storedDateSchema,
    release_date: storedDateSchema,
    current_code: codeSchema,
    code_change_date: storedDateSchema,
    original_code: codeSchema,
    size_class: codeSchema,
  })
  .transform((row): CustodyRecord => ({
    propertyId: row.property_id,
    receiveDate: row.receive_date,
    releaseDate: row.release_date,
    currentCode: row.current_code,
    codeChangeDate: row.code_change_date,
    originalCode: row.original_code,
    sizeClass: row.size_class,
  }));

/**
 * Output tables a run can target
 */
export const outputSelectionSchema = z.enum(['ages', 'summary', 'both']);

export type OutputSelection = z.infer<typeof outputSelectionSchema>;

/**
 * Validated options of one occupancy run
 */
export const occupancyRunArgsSchema = z
  .object({
    start: isoDateSchema,
    end: isoDateSchema,
    output: outputSelectionSchema,
    force: z.boolean(),
    dryRun: z.boolean(),
    csvDir: z.string().min(1).optional(),
  })
  .refine((args) => args.start <= args.end, {
    message: 'start must not be after end',
    path: ['end'],
  });

export type OccupancyRunArgs = z.infer<typeof occupancyRunArgsSchema>;

/**
 * Options of the lot-reports command
 */
export const lotReportArgsSchema = z.object({
  codesFile: z.string().min(1).optional(),
  categoriesFile: z.string().min(1).optional(),
  oldestFile: z.string().min(1).optional(),
  limit: z.number().int().positive(),
  start: isoDateSchema.optional(),
  end: isoDateSchema.optional(),
}).refine(
  (args) => args.codesFile !== undefined || args.categoriesFile !== undefined || args.oldestFile !== undefined,
  { message: 'At least one of --codes, --categories or --oldest must be given' }
).refine((args) => args.start === undefined || args.end === undefined || args.start <= args.end, {
  message: 'start must not be after end',
  path: ['end'],
});

export type LotReportArgs = z.infer<typeof lotReportArgsSchema>;

/**
 * Format zod issues as one readable line each
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
