import type { RawLayoffRow } from '@layoffs/types';
import { pickRecord } from '@layoffs/shared';

/**
 * Copies source rows into an owned working copy so later stages never touch
 * the caller's data
 */
export class StagingLoader {
  load(source: ReadonlyArray<RawLayoffRow>): { records: RawLayoffRow[]; warnings: string[] } {
    const warnings: string[] = [];

    if (source.length === 0) {
      warnings.push('EmptyInputWarning: source contained no rows');
    }

    return {
      records: source.map(pickRecord),
      warnings
    };
  }
}

export default StagingLoader;
