import { z } from 'zod';
import type { LayoffRecord, RawLayoffRow } from '@layoffs/types';
import { DEFAULT_NULL_TOKEN } from '@layoffs/shared';
import type { SchemaIssue } from '../utils/errorUtils';

export type CsvRow = Record<string, string>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Build the zod schema for one CSV row. Missing cells and the null token become
 * null in nullable columns; an empty cell stays '' so the normalizer can see it.
 */
export function buildCsvRowSchema(nullToken: string = DEFAULT_NULL_TOKEN): z.ZodType<RawLayoffRow, z.ZodTypeDef, unknown> {
  const requiredText = z
    .string({ required_error: 'Required' })
    .refine((value) => value.trim() !== '' && value !== nullToken, { message: 'Required' });

  const nullableText = z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === nullToken ? null : value));

  const nullableInteger = z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '' || value === nullToken) {
        return null;
      }
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${value}"` });
        return z.NEVER;
      }
      // Integer columns round like a database INT import
      return Math.round(parsed);
    });

  return z.object({
    company: requiredText,
    location: requiredText,
    industry: nullableText,
    total_laid_off: nullableInteger,
    percentage_laid_off: nullableText,
    event_date: nullableText,
    stage: nullableText,
    country: requiredText,
    funds_raised_millions: nullableInteger
  });
}

// Shape every record must have once the pipeline has run
export const CleanedRecordSchema: z.ZodType<LayoffRecord> = z.object({
  company: z.string(),
  location: z.string(),
  industry: z.string().min(1, 'industry must be null, not empty').nullable(),
  total_laid_off: z.number().int().nullable(),
  percentage_laid_off: z.string().nullable(),
  event_date: z.string().regex(ISO_DATE, 'event_date must be yyyy-MM-dd').nullable(),
  stage: z.string().nullable(),
  country: z.string(),
  funds_raised_millions: z.number().int().nullable()
}).strict();

/**
 * Schema validation for rows entering and leaving the pipeline
 */
export class SchemaValidator {
  private readonly csvRowSchema: z.ZodType<RawLayoffRow, z.ZodTypeDef, unknown>;

  constructor(nullToken: string = DEFAULT_NULL_TOKEN) {
    this.csvRowSchema = buildCsvRowSchema(nullToken);
  }

  /**
   * Validate a batch of CSV rows. Row numbers are 1-based data rows.
   */
  validateCsvRows(rows: CsvRow[]): { validRows: RawLayoffRow[]; issues: SchemaIssue[]; invalidRows: number } {
    const validRows: RawLayoffRow[] = [];
    const issues: SchemaIssue[] = [];
    let invalidRows = 0;

    rows.forEach((row, index) => {
      const result = this.csvRowSchema.safeParse(row);
      if (result.success) {
        validRows.push(result.data);
        return;
      }

      invalidRows++;
      for (const issue of result.error.issues) {
        issues.push({ row: index + 1, field: issue.path.join('.'), message: issue.message });
      }
    });

    return { validRows, issues, invalidRows };
  }

  /**
   * Check cleaned records against the output invariants
   */
  validateCleaned(records: LayoffRecord[]): SchemaIssue[] {
    const issues: SchemaIssue[] = [];

    records.forEach((record, index) => {
      const result = CleanedRecordSchema.safeParse(record);
      if (!result.success) {
        for (const issue of result.error.issues) {
          issues.push({ row: index + 1, field: issue.path.join('.'), message: issue.message });
        }
      }
    });

    return issues;
  }
}

export default SchemaValidator;
