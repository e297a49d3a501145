/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults and
 * clear error messages. The result is cached after the first call.
 */

// Load dotenv early to ensure environment variables are available
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((candidate) => candidate === value);
}

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Connection settings for one PostgreSQL database
 */
export interface PostgresTargetConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  poolMax: number;
  ssl: boolean;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Custody records (read side)
  SOURCE_POSTGRES: PostgresTargetConfig;
  SOURCE_MAX_ATTEMPTS: number;

  // Reporting store (write side)
  REPORTING_POSTGRES: PostgresTargetConfig;
  OCCUPANCY_SUMMARY_TABLE: string;
  OCCUPANCY_AGES_TABLE: string;
  UPSERT_BATCH_SIZE: number;

  // Logging & metrics
  LOG_LEVEL?: string;
  METRICS_TEXTFILE?: string;
}

let validatedEnv: Env | null = null;

function readPostgresTarget(prefix: string, defaultDatabase: string, errors: string[]): PostgresTargetConfig {
  const port = parseNumericEnv(process.env[`${prefix}_PORT`], 5432);
  if (port < 1 || port > 65535) {
    errors.push(`${prefix}_PORT: Invalid value "${process.env[`${prefix}_PORT`]}". Must be between 1 and 65535.`);
  }

  const poolMax = parseNumericEnv(process.env[`${prefix}_POOL_MAX`], 5);
  if (poolMax < 1) {
    errors.push(`${prefix}_POOL_MAX: Invalid value "${process.env[`${prefix}_POOL_MAX`]}". Must be at least 1.`);
  }

  return {
    host: process.env[`${prefix}_HOST`] || 'localhost',
    port,
    database: process.env[`${prefix}_DB`] || defaultDatabase,
    user: process.env[`${prefix}_USER`] || 'postgres',
    password: process.env[`${prefix}_PASSWORD`] || '',
    poolMax,
    ssl: parseBooleanEnv(process.env[`${prefix}_SSL`], false),
  };
}

function readTableName(name: string, defaultValue: string, errors: string[]): string {
  const value = process.env[name] || defaultValue;
  if (!SQL_IDENTIFIER.test(value)) {
    errors.push(`${name}: Invalid value "${value}". Must be a plain or schema-qualified SQL identifier.`);
  }
  return value;
}

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const sourcePostgres = readPostgresTarget('SOURCE_POSTGRES', 'ivic', errors);
  const reportingPostgres = readPostgresTarget('REPORTING_POSTGRES', 'reporting', errors);

  const sourceMaxAttempts = parseNumericEnv(process.env.SOURCE_MAX_ATTEMPTS, 3);
  if (sourceMaxAttempts < 0) {
    errors.push(`SOURCE_MAX_ATTEMPTS: Invalid value "${process.env.SOURCE_MAX_ATTEMPTS}". Must be 0 or more.`);
  }

  const upsertBatchSize = parseNumericEnv(process.env.UPSERT_BATCH_SIZE, 500);
  if (upsertBatchSize < 1 || upsertBatchSize > 5000) {
    errors.push(`UPSERT_BATCH_SIZE: Invalid value "${process.env.UPSERT_BATCH_SIZE}". Must be between 1 and 5000.`);
  }

  const summaryTable = readTableName('OCCUPANCY_SUMMARY_TABLE', 'towstat_bydate', errors);
  const agesTable = readTableName('OCCUPANCY_AGES_TABLE', 'towstat_agebydate', errors);

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    SOURCE_POSTGRES: sourcePostgres,
    SOURCE_MAX_ATTEMPTS: sourceMaxAttempts,
    REPORTING_POSTGRES: reportingPostgres,
    OCCUPANCY_SUMMARY_TABLE: summaryTable,
    OCCUPANCY_AGES_TABLE: agesTable,
    UPSERT_BATCH_SIZE: upsertBatchSize,
    LOG_LEVEL: process.env.LOG_LEVEL,
    METRICS_TEXTFILE: process.env.METRICS_TEXTFILE || undefined,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
