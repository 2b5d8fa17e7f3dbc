import csv from 'csv-parser';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_NULL_TOKEN } from '@layoffs/shared';
import { CsvParseResult, IngestionError } from '../types';
import SchemaValidator, { type CsvRow } from '../validation/SchemaValidator';
import { PipelineError, getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

// Source header -> record column
const HEADER_ALIASES: Record<string, string> = {
  date: 'event_date'
};

export class CsvParser {
  private readonly validator: SchemaValidator;

  constructor(
    private readonly jobId: string,
    nullToken: string = DEFAULT_NULL_TOKEN
  ) {
    this.validator = new SchemaValidator(nullToken);
  }

  /**
   * Parse a layoffs CSV export into raw rows. Rows failing the schema are
   * reported and left out.
   */
  async parseFile(buffer: Buffer): Promise<CsvParseResult> {
    try {
      const text = buffer.toString('utf8').replace(/^\uFEFF/, '');
      const delimiter = this.detectDelimiter(text.slice(0, 1024));
      const { rows, headers } = await this.parseCsvData(text, delimiter);

      const { validRows, issues, invalidRows } = this.validator.validateCsvRows(rows);

      const errors: IngestionError[] = issues.map((issue): IngestionError => ({
        id: uuidv4(),
        job_id: this.jobId,
        row_number: issue.row,
        error_type: 'validation_error',
        error_message: `${issue.field}: ${issue.message}`,
        raw_data: rows[issue.row - 1],
        severity: 'error',
        created_at: new Date().toISOString()
      }));

      const warnings: string[] = [];
      if (!headers.includes('event_date')) {
        warnings.push('No date column found; every event_date will be null');
      }
      if (rows.length === 0) {
        warnings.push('EmptyInputWarning: CSV contained no data rows');
      }

      logger.info('CSV parsed', {
        job_id: this.jobId,
        total_rows: rows.length,
        invalid_rows: invalidRows,
        delimiter
      });

      return {
        rows: validRows,
        errors,
        warnings,
        metadata: {
          total_rows: rows.length,
          parsed_rows: validRows.length,
          error_rows: invalidRows,
          headers
        }
      };
    } catch (error) {
      throw new PipelineError('CSV_PARSE_FAILED', `CSV parsing failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Detect CSV delimiter
   */
  private detectDelimiter(sample: string): string {
    const firstLine = sample.split('\n')[0] ?? '';
    const delimiters = [',', ';', '\t', '|'];
    const counts = delimiters.map((delimiter) => ({
      delimiter,
      count: firstLine.split(delimiter).length - 1
    }));

    // Return the delimiter with the highest count
    const best = counts.reduce((max, current) =>
      current.count > max.count ? current : max
    );

    return best.count > 0 ? best.delimiter : ',';
  }

  private normalizeHeader(header: string): string {
    const key = header.trim().toLowerCase();
    return HEADER_ALIASES[key] ?? key;
  }

  /**
   * Parse CSV data into raw rows
   */
  private parseCsvData(text: string, delimiter: string): Promise<{ rows: CsvRow[]; headers: string[] }> {
    return new Promise((resolve, reject) => {
      const rows: CsvRow[] = [];
      let headers: string[] = [];

      Readable.from([text])
        .pipe(csv({
          separator: delimiter,
          strict: false,
          mapHeaders: ({ header }) => this.normalizeHeader(header)
        }))
        .on('headers', (parsedHeaders: string[]) => {
          headers = parsedHeaders;
        })
        .on('data', (row: CsvRow) => {
          rows.push(row);
        })
        .on('end', () => resolve({ rows, headers }))
        .on('error', reject);
    });
  }
}

export default CsvParser;
