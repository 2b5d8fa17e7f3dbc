import { format, isValid, parse } from 'date-fns';
import type { RankedLayoffRow } from '@layoffs/types';
import { DATE_INPUT_FORMATS, DATE_OUTPUT_FORMAT, INDUSTRY_CANONICAL_PREFIXES } from '@layoffs/shared';
import type { NormalizationMetrics, StageResult } from '../types';
import { MalformedDateError, type DateFailure } from '../utils/errorUtils';

// date-fns needs a reference date for fields the pattern leaves out
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Data normalization system for the ETL pipeline
 * Handles company names, industry labels, countries and event dates
 */
export class DataNormalizer {
  private readonly industryPrefixes: ReadonlyArray<{ prefix: string; label: string }>;
  private readonly dateFormats: readonly string[];

  constructor(
    industryPrefixes: ReadonlyArray<{ prefix: string; label: string }> = INDUSTRY_CANONICAL_PREFIXES,
    dateFormats: readonly string[] = DATE_INPUT_FORMATS
  ) {
    this.industryPrefixes = industryPrefixes;
    this.dateFormats = dateFormats;
  }

  normalizeCompany(company: string): string {
    return company.trim();
  }

  /**
   * Trimmed; empty becomes null and prefixed variants collapse onto their label
   */
  normalizeIndustry(industry: string | null): string | null {
    if (industry === null) return null;

    const trimmed = industry.trim();
    if (trimmed === '') return null;

    const match = this.industryPrefixes.find(({ prefix }) => trimmed.startsWith(prefix));
    return match ? match.label : trimmed;
  }

  normalizeCountry(country: string): string {
    return country.replace(/\.+$/, '');
  }

  /**
   * Parse date text with each accepted format in turn.
   * Returns null for empty input and undefined when nothing matches.
   */
  normalizeDate(value: string | null): string | null | undefined {
    if (value === null) return null;

    const trimmed = value.trim();
    if (trimmed === '') return null;

    for (const pattern of this.dateFormats) {
      const parsed = parse(trimmed, pattern, REFERENCE_DATE);
      // Two-digit years parse as the first century; reject them
      if (isValid(parsed) && parsed.getFullYear() >= 1000) {
        return format(parsed, DATE_OUTPUT_FORMAT);
      }
    }

    return undefined;
  }

  /**
   * Normalize every row. Dates are validated for the whole batch before any
   * result is produced; one bad value fails the stage with all failures listed.
   */
  normalizeRecords(rows: RankedLayoffRow[]): StageResult<RankedLayoffRow, NormalizationMetrics> {
    const parsedDates: Array<string | null> = [];
    const failures: DateFailure[] = [];

    rows.forEach((row, index) => {
      const parsed = this.normalizeDate(row.event_date);
      if (parsed === undefined) {
        failures.push({ index, value: row.event_date ?? '' });
        parsedDates.push(null);
      } else {
        parsedDates.push(parsed);
      }
    });

    if (failures.length > 0) {
      throw new MalformedDateError(failures);
    }

    const metrics: NormalizationMetrics = {
      companiesTrimmed: 0,
      industriesCanonicalized: 0,
      blankIndustriesNulled: 0,
      countriesCleaned: 0,
      datesParsed: 0,
      datesNull: 0
    };

    const records = rows.map((row, index) => {
      const company = this.normalizeCompany(row.company);
      const industry = this.normalizeIndustry(row.industry);
      const country = this.normalizeCountry(row.country);
      const eventDate = parsedDates[index];

      if (company !== row.company) metrics.companiesTrimmed++;
      if (row.industry !== null && industry === null) {
        metrics.blankIndustriesNulled++;
      } else if (industry !== row.industry) {
        metrics.industriesCanonicalized++;
      }
      if (country !== row.country) metrics.countriesCleaned++;
      if (eventDate === null) {
        metrics.datesNull++;
      } else {
        metrics.datesParsed++;
      }

      return { ...row, company, industry, country, event_date: eventDate };
    });

    return { records, metrics };
  }
}

export default DataNormalizer;
