// Shared constants and value helpers

export * from './utils';
export {
  APP_NAME,
  APP_VERSION,
  TABLES,
  RPC,
  STAGING_TABLE_PATTERN,
  BUSINESS_KEY_FIELDS,
  INDUSTRY_CANONICAL_PREFIXES,
  DATE_INPUT_FORMATS,
  DATE_OUTPUT_FORMAT,
  DEFAULT_NULL_TOKEN,
} from './constants';
