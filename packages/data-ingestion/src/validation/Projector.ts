import type { LayoffRecord, RankedLayoffRow } from '@layoffs/types';
import { pickRecord } from '@layoffs/shared';

// Drops the bookkeeping columns, leaving the published record shape
export class Projector {
  project(rows: RankedLayoffRow[]): LayoffRecord[] {
    return rows.map(pickRecord);
  }
}

export default Projector;
