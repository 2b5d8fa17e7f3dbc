import crypto from 'crypto';
import type { RankedLayoffRow, RawLayoffRow } from '@layoffs/types';
import { businessKeyOf } from '@layoffs/shared';
import type { DeduplicationMetrics, DuplicateGroup, StageResult } from '../types';

/**
 * Exact-match deduplication over the full business key.
 * Rows are partitioned by key and numbered in input order; only the first of
 * each partition survives.
 */
export class DeduplicationEngine {
  /**
   * Generate a stable key for a row. JSON keeps null, '' and numbers distinct,
   * and two nulls in the same position compare equal.
   */
  generateBusinessKey(row: RawLayoffRow): string {
    return this.hashComponents(businessKeyOf(row));
  }

  /**
   * Assign row_num 1..n within each business-key partition
   */
  rankRows(rows: RawLayoffRow[]): RankedLayoffRow[] {
    const seen = new Map<string, number>();

    return rows.map((row) => {
      const key = this.generateBusinessKey(row);
      const rowNum = (seen.get(key) ?? 0) + 1;
      seen.set(key, rowNum);
      return { ...row, row_num: rowNum };
    });
  }

  /**
   * Keep the first row of every partition, in input order
   */
  deduplicate(rows: RawLayoffRow[]): StageResult<RankedLayoffRow, DeduplicationMetrics> & {
    duplicateGroups: DuplicateGroup[];
  } {
    const ranked = this.rankRows(rows);
    const uniqueRecords = ranked.filter((row) => row.row_num === 1);

    const copies = new Map<string, number>();
    for (const row of ranked) {
      if (row.row_num > 1) {
        const key = this.generateBusinessKey(row);
        copies.set(key, Math.max(copies.get(key) ?? 0, row.row_num));
      }
    }

    const duplicateGroups = Array.from(copies, ([key, count]) => ({ key, copies: count }));
    const totalRecords = rows.length;
    const duplicatesRemoved = totalRecords - uniqueRecords.length;

    return {
      records: uniqueRecords,
      duplicateGroups,
      metrics: {
        totalRecords,
        uniqueRecords: uniqueRecords.length,
        duplicatesRemoved,
        duplicateRate: totalRecords > 0 ? (duplicatesRemoved / totalRecords) * 100 : 0
      }
    };
  }

  private hashComponents(components: Array<string | number | null>): string {
    const joined = JSON.stringify(components);
    return crypto.createHash('sha256').update(joined).digest('hex').slice(0, 16);
  }
}

export default DeduplicationEngine;
