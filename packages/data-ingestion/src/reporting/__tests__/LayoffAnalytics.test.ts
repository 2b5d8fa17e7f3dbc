/**
 * Reporting query tests over cleaned records
 */

import { describe, it, expect } from '@jest/globals';
import { LayoffAnalytics } from '../LayoffAnalytics';
import { makeRecord } from '../../__tests__/fixtures';

describe('LayoffAnalytics', () => {
  describe('rollingMonthlyTotals', () => {
    it('should accumulate monthly totals in month order', () => {
      const analytics = new LayoffAnalytics([
        makeRecord({ event_date: '2023-02-10', total_laid_off: 50 }),
        makeRecord({ event_date: '2023-01-05', total_laid_off: 60 }),
        makeRecord({ event_date: '2023-01-20', total_laid_off: 40 })
      ]);

      expect(analytics.rollingMonthlyTotals()).toEqual([
        { month: '2023-01', total_laid_off: 100, rolling_total: 100 },
        { month: '2023-02', total_laid_off: 50, rolling_total: 150 }
      ]);
    });

    it('should skip undated records and count null totals as zero', () => {
      const analytics = new LayoffAnalytics([
        makeRecord({ event_date: null, total_laid_off: 999 }),
        makeRecord({ event_date: '2022-12-01', total_laid_off: null }),
        makeRecord({ event_date: '2022-12-02', total_laid_off: 7 })
      ]);

      expect(analytics.totalsByMonth()).toEqual([{ month: '2022-12', total_laid_off: 7 }]);
    });
  });

  describe('totalsBy', () => {
    it('should order by total descending then key', () => {
      const analytics = new LayoffAnalytics([
        makeRecord({ company: 'Beta', total_laid_off: 10 }),
        makeRecord({ company: 'Alpha', total_laid_off: 10 }),
        makeRecord({ company: 'Gamma', total_laid_off: 30 }),
        makeRecord({ company: 'Beta', total_laid_off: null })
      ]);

      expect(analytics.totalsBy('company')).toEqual([
        { key: 'Gamma', total_laid_off: 30 },
        { key: 'Alpha', total_laid_off: 10 },
        { key: 'Beta', total_laid_off: 10 }
      ]);
    });

    it('should group null keys together and sort them after equal totals', () => {
      const analytics = new LayoffAnalytics([
        makeRecord({ industry: null, total_laid_off: 5 }),
        makeRecord({ industry: 'Retail', total_laid_off: 5 }),
        makeRecord({ industry: null, total_laid_off: 0 })
      ]);

      expect(analytics.totalsBy('industry')).toEqual([
        { key: 'Retail', total_laid_off: 5 },
        { key: null, total_laid_off: 5 }
      ]);
    });

    it('should group by country', () => {
      const analytics = new LayoffAnalytics([
        makeRecord({ country: 'India', total_laid_off: 4 }),
        makeRecord({ country: 'United States', total_laid_off: 6 }),
        makeRecord({ country: 'India', total_laid_off: 3 })
      ]);

      expect(analytics.totalsBy('country')).toEqual([
        { key: 'India', total_laid_off: 7 },
        { key: 'United States', total_laid_off: 6 }
      ]);
    });
  });

  it('should total by year in ascending order', () => {
    const analytics = new LayoffAnalytics([
      makeRecord({ event_date: '2023-01-01', total_laid_off: 5 }),
      makeRecord({ event_date: '2021-06-01', total_laid_off: 2 }),
      makeRecord({ event_date: '2023-09-01', total_laid_off: 1 })
    ]);

    expect(analytics.totalsByYear()).toEqual([
      { year: 2021, total_laid_off: 2 },
      { year: 2023, total_laid_off: 6 }
    ]);
  });

  it('should rank companies per year with dense ranking', () => {
    const analytics = new LayoffAnalytics([
      makeRecord({ company: 'A', event_date: '2022-01-01', total_laid_off: 100 }),
      makeRecord({ company: 'B', event_date: '2022-02-01', total_laid_off: 100 }),
      makeRecord({ company: 'C', event_date: '2022-03-01', total_laid_off: 50 }),
      makeRecord({ company: 'D', event_date: '2022-04-01', total_laid_off: 10 }),
      makeRecord({ company: 'A', event_date: '2023-01-01', total_laid_off: 5 }),
      makeRecord({ company: 'E', event_date: '2023-01-01', total_laid_off: 8 })
    ]);

    expect(analytics.topCompaniesPerYear(2)).toEqual([
      { company: 'A', year: 2022, total_laid_off: 100, rank: 1 },
      { company: 'B', year: 2022, total_laid_off: 100, rank: 1 },
      { company: 'C', year: 2022, total_laid_off: 50, rank: 2 },
      { company: 'E', year: 2023, total_laid_off: 8, rank: 1 },
      { company: 'A', year: 2023, total_laid_off: 5, rank: 2 }
    ]);
  });

  it('should find the largest layoff and percentage', () => {
    const analytics = new LayoffAnalytics([
      makeRecord({ total_laid_off: 12000, percentage_laid_off: '0.06' }),
      makeRecord({ total_laid_off: null, percentage_laid_off: '1' }),
      makeRecord({ total_laid_off: 3, percentage_laid_off: null })
    ]);

    expect(analytics.maxLaidOff()).toEqual({ max_total_laid_off: 12000, max_percentage_laid_off: 1 });
  });

  it('should list full closures by funds raised', () => {
    const analytics = new LayoffAnalytics([
      makeRecord({ company: 'Small', percentage_laid_off: '1', funds_raised_millions: 10 }),
      makeRecord({ company: 'Partial', percentage_laid_off: '0.5', funds_raised_millions: 900 }),
      makeRecord({ company: 'Big', percentage_laid_off: '1', funds_raised_millions: 2400 }),
      makeRecord({ company: 'Unknown', percentage_laid_off: '1', funds_raised_millions: null })
    ]);

    expect(analytics.fullClosures().map((record) => record.company)).toEqual(['Big', 'Small', 'Unknown']);
  });

  it('should report the date range', () => {
    const analytics = new LayoffAnalytics([
      makeRecord({ event_date: '2021-03-11' }),
      makeRecord({ event_date: null }),
      makeRecord({ event_date: '2020-03-11' }),
      makeRecord({ event_date: '2023-03-06' })
    ]);

    expect(analytics.dateRange()).toEqual({ earliest: '2020-03-11', latest: '2023-03-06' });
  });

  it('should handle an empty table', () => {
    const analytics = new LayoffAnalytics([]);

    expect(analytics.rollingMonthlyTotals()).toEqual([]);
    expect(analytics.dateRange()).toEqual({ earliest: null, latest: null });
    expect(analytics.maxLaidOff()).toEqual({ max_total_laid_off: null, max_percentage_laid_off: null });
  });
});
