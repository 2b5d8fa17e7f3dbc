import type {
  CompanyYearRank,
  DateRange,
  DimensionTotal,
  LayoffExtremes,
  LayoffRecord,
  MonthTotal,
  RollingMonthTotal,
  TotalsDimension,
  YearTotal
} from '@layoffs/types';
import { compareNullableStrings, percentageToNumber } from '@layoffs/shared';

/**
 * Read-only aggregations over the cleaned table.
 * A null total_laid_off counts as 0; undated records are left out of time buckets.
 */
export class LayoffAnalytics {
  private readonly records: ReadonlyArray<LayoffRecord>;

  constructor(records: ReadonlyArray<LayoffRecord>) {
    this.records = records;
  }

  maxLaidOff(): LayoffExtremes {
    let maxTotal: number | null = null;
    let maxPercentage: number | null = null;

    for (const record of this.records) {
      if (record.total_laid_off !== null && (maxTotal === null || record.total_laid_off > maxTotal)) {
        maxTotal = record.total_laid_off;
      }
      const percentage = percentageToNumber(record.percentage_laid_off);
      if (percentage !== null && (maxPercentage === null || percentage > maxPercentage)) {
        maxPercentage = percentage;
      }
    }

    return { max_total_laid_off: maxTotal, max_percentage_laid_off: maxPercentage };
  }

  /**
   * Companies that laid off their whole workforce, biggest funding first
   */
  fullClosures(): LayoffRecord[] {
    return this.records
      .filter((record) => percentageToNumber(record.percentage_laid_off) === 1)
      .sort((a, b) => (b.funds_raised_millions ?? -1) - (a.funds_raised_millions ?? -1));
  }

  totalsBy(dimension: TotalsDimension): DimensionTotal[] {
    const totals = new Map<string | null, number>();
    for (const record of this.records) {
      const key = record[dimension];
      totals.set(key, (totals.get(key) ?? 0) + (record.total_laid_off ?? 0));
    }

    return Array.from(totals, ([key, total]) => ({ key, total_laid_off: total }))
      .sort((a, b) => b.total_laid_off - a.total_laid_off || compareNullableStrings(a.key, b.key));
  }

  totalsByYear(): YearTotal[] {
    const totals = this.sumBy((date) => date.slice(0, 4));
    return Array.from(totals, ([year, total]) => ({ year: Number(year), total_laid_off: total }))
      .sort((a, b) => a.year - b.year);
  }

  totalsByMonth(): MonthTotal[] {
    const totals = this.sumBy((date) => date.slice(0, 7));
    return Array.from(totals, ([month, total]) => ({ month, total_laid_off: total }))
      .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));
  }

  /**
   * Monthly totals with a running sum, oldest month first
   */
  rollingMonthlyTotals(): RollingMonthTotal[] {
    let running = 0;
    return this.totalsByMonth().map((row) => {
      running += row.total_laid_off;
      return { ...row, rolling_total: running };
    });
  }

  /**
   * Top companies per year by total laid off, using dense ranking
   */
  topCompaniesPerYear(limit = 5): CompanyYearRank[] {
    const byYear = new Map<number, Map<string, number>>();

    for (const record of this.records) {
      if (record.event_date === null) continue;
      const year = Number(record.event_date.slice(0, 4));
      const companies = byYear.get(year) ?? new Map<string, number>();
      companies.set(record.company, (companies.get(record.company) ?? 0) + (record.total_laid_off ?? 0));
      byYear.set(year, companies);
    }

    const ranked: CompanyYearRank[] = [];
    const years = Array.from(byYear.keys()).sort((a, b) => a - b);

    for (const year of years) {
      const companies = Array.from(byYear.get(year) ?? [], ([company, total]) => ({ company, total }))
        .sort((a, b) => b.total - a.total || (a.company < b.company ? -1 : a.company > b.company ? 1 : 0));

      let rank = 0;
      let previous: number | undefined;
      for (const { company, total } of companies) {
        if (total !== previous) {
          rank++;
          previous = total;
        }
        if (rank > limit) break;
        ranked.push({ company, year, total_laid_off: total, rank });
      }
    }

    return ranked;
  }

  dateRange(): DateRange {
    let earliest: string | null = null;
    let latest: string | null = null;

    for (const { event_date: date } of this.records) {
      if (date === null) continue;
      if (earliest === null || date < earliest) earliest = date;
      if (latest === null || date > latest) latest = date;
    }

    return { earliest, latest };
  }

  private sumBy(bucket: (date: string) => string): Map<string, number> {
    const totals = new Map<string, number>();
    for (const record of this.records) {
      if (record.event_date === null) continue;
      const key = bucket(record.event_date);
      totals.set(key, (totals.get(key) ?? 0) + (record.total_laid_off ?? 0));
    }
    return totals;
  }
}

export default LayoffAnalytics;
