import type { SupabaseClient } from '@supabase/supabase-js'
import type { LayoffRecord, RawLayoffRow } from '@layoffs/types'
import { BUSINESS_KEY_FIELDS, RPC, STAGING_TABLE_PATTERN, TABLES, pickRecord } from '@layoffs/shared'
import type { LayoffStore } from './LayoffStore'
import { LayoffRowsSchema } from './schema'
import { StorageError } from './errors'

export interface SupabaseLayoffStoreOptions {
  sourceTable?: string
  stagingTable?: string
  pageSize?: number
}

const RECORD_COLUMNS = BUSINESS_KEY_FIELDS.join(',')
const ROW_ORDER_COLUMN = 'row_id'

// PostgREST caps each response (Supabase default max_rows is 1000)
const DEFAULT_PAGE_SIZE = 1000

/**
 * Supabase-backed store. Staging is replaced through a Postgres function so the
 * truncate and insert share one transaction.
 */
export class SupabaseLayoffStore implements LayoffStore {
  private readonly sourceTable: string
  private readonly stagingTable: string
  private readonly pageSize: number

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseLayoffStoreOptions = {}
  ) {
    this.sourceTable = options.sourceTable ?? TABLES.SOURCE
    this.stagingTable = options.stagingTable ?? TABLES.STAGING
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE

    if (!STAGING_TABLE_PATTERN.test(this.stagingTable)) {
      throw new StorageError(`Staging table name must end in _staging, got ${this.stagingTable}`)
    }

    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new StorageError(`Page size must be a positive integer, got ${this.pageSize}`)
    }
  }

  async loadSource(): Promise<RawLayoffRow[]> {
    return this.selectAll(this.sourceTable)
  }

  async loadStaging(): Promise<LayoffRecord[]> {
    return this.selectAll(this.stagingTable)
  }

  async replaceStaging(records: LayoffRecord[]): Promise<void> {
    const { error } = await this.client.rpc(RPC.REPLACE_STAGING, {
      target_table: this.stagingTable,
      rows: records.map(pickRecord)
    })

    if (error) {
      throw new StorageError(`Failed to replace ${this.stagingTable}: ${error.message}`, { cause: error })
    }
  }

  /**
   * Read the whole table page by page in insertion order, until a short page
   */
  private async selectAll(table: string): Promise<LayoffRecord[]> {
    const rows: unknown[] = []
    let offset = 0

    while (true) {
      const { data, error } = await this.client
        .from(table)
        .select(RECORD_COLUMNS)
        .order(ROW_ORDER_COLUMN, { ascending: true })
        .range(offset, offset + this.pageSize - 1)

      if (error) {
        throw new StorageError(`Failed to read ${table}: ${error.message}`, { cause: error })
      }

      const page: unknown[] = data ?? []
      rows.push(...page)

      if (page.length < this.pageSize) {
        break
      }
      offset += this.pageSize
    }

    const parsed = LayoffRowsSchema.safeParse(rows)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new StorageError(
        `Unexpected row shape in ${table} at ${issue?.path.join('.') ?? 'root'}: ${issue?.message ?? 'invalid'}`
      )
    }

    return parsed.data
  }
}
