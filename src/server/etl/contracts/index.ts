/**
 * Occupancy Pipeline Contracts
 */

// Types
export type {
  AgeEntry,
  Contribution,
  CustodyRecord,
  CustodyRecordBatch,
  CustodyRecordSource,
  DataQualityIssue,
  DataQualityReason,
  DateWindow,
  ExistingOutputQuery,
  IsoDate,
  OccupancyOutput,
  OccupancySink,
  OccupancySummaryRow,
  RecordQueryWindow,
  SummaryCategory,
  TowCategory,
  VehicleAgeRow,
} from './types.js';

// Schemas
export {
  custodyRowSchema,
  formatZodIssues,
  isoDateSchema,
  lotReportArgsSchema,
  occupancyRunArgsSchema,
  outputSelectionSchema,
  type LotReportArgs,
  type OccupancyRunArgs,
  type OutputSelection,
} from './schemas.js';
