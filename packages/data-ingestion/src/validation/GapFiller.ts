import type { GapFillField, RankedLayoffRow } from '@layoffs/types';
import { isBlank } from '@layoffs/shared';
import type { AmbiguousGapFill, GapFillMetrics, GapFillStrategy, StageResult } from '../types';

/**
 * Fills blank descriptive fields from other rows of the same company.
 *
 * One pass only: donors come from the snapshot taken before filling, so a value
 * written here never feeds another row. With `last_match` the last donor in
 * working-copy order wins; with `most_frequent` the most common donor value
 * wins and ties fall back to the last one seen.
 */
export class GapFiller {
  constructor(
    private readonly fields: GapFillField[] = ['industry'],
    private readonly strategy: GapFillStrategy = 'last_match'
  ) {}

  fill(rows: RankedLayoffRow[]): StageResult<RankedLayoffRow, GapFillMetrics> {
    const metrics: GapFillMetrics = { filled: 0, unresolved: 0, ambiguous: [] };
    const records = rows.map((row) => ({ ...row }));

    for (const field of this.fields) {
      const donors = this.collectDonors(rows, field);
      const resolved = new Map<string, string>();

      for (const [company, values] of donors) {
        const chosen = this.choose(values);
        resolved.set(company, chosen);

        const candidates = Array.from(new Set(values));
        if (candidates.length > 1) {
          metrics.ambiguous.push({ company, field, candidates, chosen });
        }
      }

      for (const record of records) {
        if (!isBlank(record[field])) continue;

        const value = resolved.get(record.company);
        if (value === undefined) {
          record[field] = null;
          metrics.unresolved++;
        } else {
          record[field] = value;
          metrics.filled++;
        }
      }
    }

    return { records, metrics };
  }

  /**
   * Non-blank values per company, in row order
   */
  private collectDonors(rows: RankedLayoffRow[], field: GapFillField): Map<string, string[]> {
    const donors = new Map<string, string[]>();

    for (const row of rows) {
      const value = row[field];
      if (isBlank(value)) continue;

      const values = donors.get(row.company) ?? [];
      values.push(value);
      donors.set(row.company, values);
    }

    return donors;
  }

  private choose(values: string[]): string {
    const last = values[values.length - 1];
    if (this.strategy === 'last_match') {
      return last;
    }

    const counts = new Map<string, number>();
    for (const value of values) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    let best = last;
    let bestCount = counts.get(last) ?? 0;
    // Walk backwards so an equal count keeps the later value
    for (let i = values.length - 1; i >= 0; i--) {
      const count = counts.get(values[i]) ?? 0;
      if (count > bestCount) {
        best = values[i];
        bestCount = count;
      }
    }

    return best;
  }
}

export function describeAmbiguity(entry: AmbiguousGapFill): string {
  return `AmbiguousGapFill: ${entry.company} has conflicting ${entry.field} values ` +
    `[${entry.candidates.join(', ')}]; using "${entry.chosen}"`;
}

export default GapFiller;
