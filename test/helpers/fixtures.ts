import type { CustodyRecord } from '../../src/server/etl/contracts/types.js';
import { SENTINEL_DATE } from '../../src/server/utils/dateUtils.js';

/**
 * Released police-action stay on 2020-01-01..2020-01-03 unless overridden
 */
export function custodyRecord(overrides: Partial<CustodyRecord> = {}): CustodyRecord {
  return {
    propertyId: 'P-1',
    receiveDate: '2020-01-01',
    releaseDate: '2020-01-03',
    currentCode: '111',
    codeChangeDate: SENTINEL_DATE,
    originalCode: '',
    sizeClass: 'SEDAN',
    ...overrides,
  };
}
