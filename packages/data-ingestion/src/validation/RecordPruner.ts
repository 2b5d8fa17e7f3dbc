import type { RankedLayoffRow } from '@layoffs/types';

/**
 * Removes rows with neither a layoff count nor a percentage. Such rows carry
 * nothing the reporting queries can aggregate.
 */
export class RecordPruner {
  prune(rows: RankedLayoffRow[]): { records: RankedLayoffRow[]; pruned: number } {
    const records = rows.filter(
      (row) => row.total_laid_off !== null || row.percentage_laid_off !== null
    );
    return { records, pruned: rows.length - records.length };
  }
}

export default RecordPruner;
