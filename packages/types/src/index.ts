// Core record types for the layoffs dataset

/**
 * One layoff event after cleaning. `event_date` is an ISO calendar date (yyyy-MM-dd).
 */
export interface LayoffRecord {
  company: string;
  location: string;
  industry: string | null;
  total_laid_off: number | null;
  percentage_laid_off: string | null;
  event_date: string | null;
  stage: string | null;
  country: string;
  funds_raised_millions: number | null;
}

/**
 * A row as it arrives from the source table or CSV. Same columns as a cleaned
 * record, but `event_date` holds the source text (e.g. "3/5/2023").
 */
export type RawLayoffRow = LayoffRecord;

/** Staging row carrying the duplicate rank assigned during deduplication */
export interface RankedLayoffRow extends RawLayoffRow {
  row_num: number;
}

export type LayoffField = keyof LayoffRecord;

// Descriptive fields that may be filled from sibling rows of the same company
export type GapFillField = 'industry' | 'stage';

// Reporting shapes
export type TotalsDimension = 'company' | 'industry' | 'country' | 'stage' | 'location';

export interface DimensionTotal {
  key: string | null;
  total_laid_off: number;
}

export interface YearTotal {
  year: number;
  total_laid_off: number;
}

export interface MonthTotal {
  month: string; // yyyy-MM
  total_laid_off: number;
}

export interface RollingMonthTotal extends MonthTotal {
  rolling_total: number;
}

export interface CompanyYearRank {
  company: string;
  year: number;
  total_laid_off: number;
  rank: number;
}

export interface LayoffExtremes {
  max_total_laid_off: number | null;
  max_percentage_laid_off: number | null;
}

export interface DateRange {
  earliest: string | null;
  latest: string | null;
}
