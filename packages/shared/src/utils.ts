import type { LayoffRecord, RawLayoffRow } from '@layoffs/types';
import { BUSINESS_KEY_FIELDS } from './constants';

// Blank means SQL NULL or the empty string; whitespace-only is a real value
export const isBlank = (value: unknown): value is null | undefined | '' => {
  return value === null || value === undefined || value === '';
};

/**
 * Ordered tuple of business-key values. `undefined` is folded into null so a
 * missing column groups with an explicit null.
 */
export const businessKeyOf = (row: RawLayoffRow): Array<string | number | null> => {
  return BUSINESS_KEY_FIELDS.map((field) => row[field] ?? null);
};

// Copy only the record columns, dropping anything extra a row may carry
export const pickRecord = (row: RawLayoffRow): LayoffRecord => ({
  company: row.company,
  location: row.location,
  industry: row.industry,
  total_laid_off: row.total_laid_off,
  percentage_laid_off: row.percentage_laid_off,
  event_date: row.event_date,
  stage: row.stage,
  country: row.country,
  funds_raised_millions: row.funds_raised_millions,
});

export const percentageToNumber = (value: string | null): number | null => {
  if (isBlank(value)) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const compareNullableStrings = (a: string | null, b: string | null): number => {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
};
