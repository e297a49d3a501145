/**
 * Occupancy Pipeline Contract Types
 *
 * Entities shared by the aggregation core and the boundary collaborators
 * (record source, existing-output query, upsert sink).
 */

import type { IsoDate } from '../../utils/dateUtils.js';

export type { IsoDate } from '../../utils/dateUtils.js';

/**
 * Normalized pickup-code category
 */
export type TowCategory =
  | 'police_action'
  | 'police_hold'
  | 'accident'
  | 'abandoned'
  | 'scofflaw'
  | 'impound'
  | 'stolen_recovered'
  | 'commercial_vehicle_restriction'
  | 'nocode';

/**
 * Category column of a summary row; `total` folds every category together
 */
export type SummaryCategory = TowCategory | 'total';

/**
 * Inclusive range of calendar days
 */
export interface DateWindow {
  start: IsoDate;
  end: IsoDate;
}

/**
 * Bounds for the record source; either side may be left open
 */
export interface RecordQueryWindow {
  start?: IsoDate;
  end?: IsoDate;
}

/**
 * One vehicle stay as read from the custody store. Unset dates carry the
 * sentinel (see `isSentinelDate`).
 */
export interface CustodyRecord {
  propertyId: string;
  receiveDate: IsoDate;
  releaseDate: IsoDate;
  currentCode: string;
  codeChangeDate: IsoDate;
  originalCode: string;
  /** Vehicle type tag, e.g. `SEDAN`, `ATV`, `DB` */
  sizeClass: string;
}

/**
 * "On `day`, vehicle `propertyId` had been on the lot `age` days under `category`."
 * Age is 1-indexed: the receive day has age 1.
 */
export interface Contribution {
  day: IsoDate;
  age: number;
  category: TowCategory;
  /** True for motorcycles, ATVs and scooters */
  dirtbike: boolean;
  propertyId: string;
}

export interface AgeEntry {
  age: number;
  propertyId: string;
}

/**
 * Flat per-vehicle-per-day output row, keyed by (date, propertyId)
 */
export interface VehicleAgeRow {
  date: IsoDate;
  propertyId: string;
  vehicleAge: number;
  category: TowCategory;
  dirtbike: boolean;
}

/**
 * Per-day aggregate output row, keyed by (date, category, dirtbike)
 */
export interface OccupancySummaryRow {
  date: IsoDate;
  quantity: number;
  averageAge: number;
  medianAge: number;
  dirtbike: boolean;
  category: SummaryCategory;
}

/**
 * Which output table a run targets
 */
export type OccupancyOutput = 'ages' | 'summary';

export type DataQualityReason =
  | 'sentinel_receive_date'
  | 'release_before_receive'
  | 'receive_after_today'
  | 'code_change_before_receive'
  | 'duplicate_property_id'
  | 'invalid_source_row';

/**
 * A record that was skipped because of dirty input data
 */
export interface DataQualityIssue {
  propertyId: string;
  reason: DataQualityReason;
  detail?: string;
}

/**
 * Record source collaborator
 */
export interface CustodyRecordSource {
  fetchCustodyRecords(window: RecordQueryWindow): Promise<CustodyRecordBatch>;
}

/**
 * Records read from the source plus the rows that could not be turned into records
 */
export interface CustodyRecordBatch {
  records: CustodyRecord[];
  issues: DataQualityIssue[];
}

/**
 * Existing-output query collaborator
 */
export interface ExistingOutputQuery {
  fetchExistingDays(output: OccupancyOutput, window: DateWindow): Promise<Set<IsoDate>>;
}

/**
 * Upsert sink collaborator. Each call is all-or-nothing.
 */
export interface OccupancySink {
  upsertVehicleAges(rows: readonly VehicleAgeRow[]): Promise<number>;
  upsertSummaries(rows: readonly OccupancySummaryRow[]): Promise<number>;
}
