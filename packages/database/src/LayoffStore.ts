import type { LayoffRecord, RawLayoffRow } from '@layoffs/types'
import { pickRecord } from '@layoffs/shared'

/**
 * Storage seam for the cleaning job. The source table is read-only; the
 * staging table is replaced wholesale in one atomic write.
 */
export interface LayoffStore {
  loadSource(): Promise<RawLayoffRow[]>
  replaceStaging(records: LayoffRecord[]): Promise<void>
  loadStaging(): Promise<LayoffRecord[]>
}

/**
 * In-process store used for CSV runs and tests
 */
export class InMemoryLayoffStore implements LayoffStore {
  private readonly source: ReadonlyArray<Readonly<RawLayoffRow>>
  private staging: LayoffRecord[] = []
  private commits = 0

  constructor(sourceRows: RawLayoffRow[] = []) {
    this.source = Object.freeze(sourceRows.map((row) => Object.freeze(pickRecord(row))))
  }

  async loadSource(): Promise<RawLayoffRow[]> {
    return this.source.map((row) => ({ ...row }))
  }

  async replaceStaging(records: LayoffRecord[]): Promise<void> {
    this.staging = records.map(pickRecord)
    this.commits++
  }

  async loadStaging(): Promise<LayoffRecord[]> {
    return this.staging.map((row) => ({ ...row }))
  }

  get commitCount(): number {
    return this.commits
  }
}
