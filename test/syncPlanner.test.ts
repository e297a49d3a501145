import { describe, expect, it } from 'vitest';
import { planSync, toContiguousWindows, windowFrom } from '../src/server/etl/aggregation/syncPlanner.js';

const WINDOW = { start: '2020-01-01', end: '2020-01-05' };

describe('syncPlanner', () => {
  describe('planSync', () => {
    it('skips days that already have output', () => {
      expect(planSync({ window: WINDOW, alreadyPresent: ['2020-01-02', '2020-01-04'] })).toEqual([
        '2020-01-01',
        '2020-01-03',
        '2020-01-05',
      ]);
    });

    it('ignores existing days outside the window', () => {
      expect(planSync({ window: { start: '2020-01-01', end: '2020-01-02' }, alreadyPresent: ['2019-12-31'] })).toEqual([
        '2020-01-01',
        '2020-01-02',
      ]);
    });

    it('plans every day when forced', () => {
      expect(planSync({ window: WINDOW, alreadyPresent: ['2020-01-02'], force: true })).toHaveLength(5);
    });

    it('plans nothing when everything is present', () => {
      const present = new Set(['2020-01-01', '2020-01-02', '2020-01-03', '2020-01-04', '2020-01-05']);
      expect(planSync({ window: WINDOW, alreadyPresent: present })).toEqual([]);
    });

    it('plans nothing for an empty window', () => {
      expect(planSync({ window: { start: '2020-01-05', end: '2020-01-01' }, alreadyPresent: [] })).toEqual([]);
    });
  });

  describe('toContiguousWindows', () => {
    it('groups consecutive days', () => {
      expect(toContiguousWindows(['2020-01-01', '2020-01-03', '2020-01-04', '2020-01-05'])).toEqual([
        { start: '2020-01-01', end: '2020-01-01' },
        { start: '2020-01-03', end: '2020-01-05' },
      ]);
    });

    it('sorts its input and joins across month ends', () => {
      expect(toContiguousWindows(['2020-02-01', '2020-01-31', '2020-01-30'])).toEqual([
        { start: '2020-01-30', end: '2020-02-01' },
      ]);
    });

    it('returns nothing for no days', () => {
      expect(toContiguousWindows([])).toEqual([]);
    });
  });

  it('builds a window from a start day and a day count', () => {
    expect(windowFrom('2020-01-30', 3)).toEqual({ start: '2020-01-30', end: '2020-02-01' });
    expect(windowFrom('2020-01-30', 1)).toEqual({ start: '2020-01-30', end: '2020-01-30' });
  });
});
