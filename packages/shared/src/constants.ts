import type { LayoffField } from '@layoffs/types';

export const APP_NAME = 'layoffs-cleaning';
export const APP_VERSION = '1.0.0';

// Database Constants
export const TABLES = {
  SOURCE: 'layoffs',
  STAGING: 'layoffs_staging',
} as const;

// Staging names the replace function accepts
export const STAGING_TABLE_PATTERN = /^[a-z0-9_]+_staging$/;

export const RPC = {
  REPLACE_STAGING: 'replace_layoffs_staging',
} as const;

// Columns whose combined equality defines a duplicate
export const BUSINESS_KEY_FIELDS: readonly LayoffField[] = [
  'company',
  'location',
  'industry',
  'total_laid_off',
  'percentage_laid_off',
  'event_date',
  'stage',
  'country',
  'funds_raised_millions',
] as const;

// Industry labels that collapse onto one canonical value (prefix match)
export const INDUSTRY_CANONICAL_PREFIXES: ReadonlyArray<{ prefix: string; label: string }> = [
  { prefix: 'Crypto', label: 'Crypto' },
];

// date-fns patterns, tried in order
export const DATE_INPUT_FORMATS = ['M/d/yyyy', 'yyyy-MM-dd'] as const;
export const DATE_OUTPUT_FORMAT = 'yyyy-MM-dd';

export const DEFAULT_NULL_TOKEN = 'NULL';
