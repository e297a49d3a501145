import { describe, expect, it } from 'vitest';
import { findOldestVehicles, rollupByCategory, summarizePickupCodes } from '../src/server/etl/reports/lotReports.js';
import { SENTINEL_DATE } from '../src/server/utils/dateUtils.js';
import { custodyRecord } from './helpers/fixtures.js';

describe('lotReports', () => {
  const records = [
    custodyRecord({ propertyId: 'P-1', currentCode: '111' }),
    custodyRecord({ propertyId: 'P-2', currentCode: '111' }),
    custodyRecord({ propertyId: 'P-3', currentCode: '111A' }),
    custodyRecord({ propertyId: 'P-4', currentCode: '200P' }),
    custodyRecord({ propertyId: 'P-5', currentCode: '' }),
    custodyRecord({ propertyId: 'P-6', currentCode: '112' }),
    custodyRecord({ propertyId: 'P-7', currentCode: '112' }),
  ];

  it('counts pickup codes, most frequent first', () => {
    expect(summarizePickupCodes(records)).toEqual([
      { code: '111', category: 'police_action', quantity: 2 },
      { code: '112', category: 'accident', quantity: 2 },
      { code: '', category: 'nocode', quantity: 1 },
      { code: '111A', category: 'police_action', quantity: 1 },
      { code: '200P', category: 'police_hold', quantity: 1 },
    ]);
  });

  it('rolls code counts up into categories', () => {
    expect(rollupByCategory(summarizePickupCodes(records))).toEqual([
      { category: 'police_action', quantity: 3, codes: ['111', '111A'] },
      { category: 'accident', quantity: 2, codes: ['112'] },
      { category: 'nocode', quantity: 1, codes: [''] },
      { category: 'police_hold', quantity: 1, codes: ['200P'] },
    ]);
  });

  describe('findOldestVehicles', () => {
    const lot = [
      custodyRecord({ propertyId: 'A1', receiveDate: '2020-01-01', releaseDate: SENTINEL_DATE }),
      custodyRecord({ propertyId: 'B1', receiveDate: '2020-01-05', releaseDate: SENTINEL_DATE, sizeClass: 'DB' }),
      custodyRecord({ propertyId: 'C1', receiveDate: '2019-12-31', releaseDate: '2020-01-02' }),
      custodyRecord({ propertyId: 'D1', receiveDate: '2020-01-11', releaseDate: SENTINEL_DATE }),
      custodyRecord({ propertyId: 'E1', receiveDate: SENTINEL_DATE, releaseDate: SENTINEL_DATE }),
      custodyRecord({ propertyId: 'A0', receiveDate: '2020-01-01', releaseDate: SENTINEL_DATE, currentCode: '140' }),
    ];

    it('lists vehicles still on the lot, longest held first', () => {
      expect(findOldestVehicles(lot, 10, '2020-01-10')).toEqual([
        { propertyId: 'A0', receiveDate: '2020-01-01', age: 10, category: 'impound', dirtbike: false },
        { propertyId: 'A1', receiveDate: '2020-01-01', age: 10, category: 'police_action', dirtbike: false },
        { propertyId: 'B1', receiveDate: '2020-01-05', age: 6, category: 'police_action', dirtbike: true },
      ]);
    });

    it('honours the limit', () => {
      expect(findOldestVehicles(lot, 1, '2020-01-10').map((v) => v.propertyId)).toEqual(['A0']);
      expect(findOldestVehicles(lot, 0, '2020-01-10')).toEqual([]);
    });
  });
});
