import type { LayoffRecord, RankedLayoffRow, RawLayoffRow } from '@layoffs/types';

export const makeRow = (overrides: Partial<RawLayoffRow> = {}): RawLayoffRow => ({
  company: 'Acme',
  location: 'Austin',
  industry: 'Retail',
  total_laid_off: 10,
  percentage_laid_off: '0.1',
  event_date: '3/5/2023',
  stage: 'Series B',
  country: 'United States',
  funds_raised_millions: 50,
  ...overrides
});

export const makeRanked = (overrides: Partial<RawLayoffRow> = {}): RankedLayoffRow => ({
  ...makeRow(overrides),
  row_num: 1
});

export const makeRecord = (overrides: Partial<LayoffRecord> = {}): LayoffRecord => ({
  ...makeRow({ event_date: '2023-03-05' }),
  ...overrides
});
