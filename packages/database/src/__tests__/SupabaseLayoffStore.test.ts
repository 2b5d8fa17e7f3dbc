/**
 * Supabase store tests against an in-process fake client
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { LayoffRecord } from '@layoffs/types';
import { SupabaseLayoffStore } from '../SupabaseLayoffStore';
import { StorageError } from '../errors';

interface FakeTable {
  data: unknown[];
  error?: { message: string };
}

interface RpcCall {
  fn: string;
  args: Record<string, unknown>;
}

interface RangeCall {
  table: string;
  columns: string;
  order: string;
  from: number;
  to: number;
}

const record: LayoffRecord = {
  company: 'Acme',
  location: 'Austin',
  industry: 'Retail',
  total_laid_off: 10,
  percentage_laid_off: '0.1',
  event_date: '2023-03-05',
  stage: 'Series B',
  country: 'United States',
  funds_raised_millions: 50
};

// Serves select().order().range() like PostgREST, one slice per call
const createFakeClient = (tables: Record<string, FakeTable>, rpcError: { message: string } | null = null) => {
  const rpcCalls: RpcCall[] = [];
  const rangeCalls: RangeCall[] = [];

  const fake = {
    from: (table: string) => {
      let columns = '';
      let order = '';
      const builder = {
        select: (selected: string) => {
          columns = selected;
          return builder;
        },
        order: (column: string) => {
          order = column;
          return builder;
        },
        range: async (from: number, to: number) => {
          rangeCalls.push({ table, columns, order, from, to });
          const source = tables[table] ?? { data: [] };
          if (source.error) {
            return { data: null, error: source.error };
          }
          return { data: source.data.slice(from, to + 1), error: null };
        }
      };
      return builder;
    },
    rpc: async (fn: string, args: Record<string, unknown>) => {
      rpcCalls.push({ fn, args });
      return { data: null, error: rpcError };
    }
  };

  return { client: fake as unknown as SupabaseClient, rpcCalls, rangeCalls };
};

describe('SupabaseLayoffStore', () => {
  let tables: Record<string, FakeTable>;

  beforeEach(() => {
    tables = {
      layoffs: { data: [{ ...record, event_date: '3/5/2023' }] },
      layoffs_staging: { data: [record] }
    };
  });

  it('should read the source and staging tables', async () => {
    const { client } = createFakeClient(tables);
    const store = new SupabaseLayoffStore(client);

    expect(await store.loadSource()).toEqual([{ ...record, event_date: '3/5/2023' }]);
    expect(await store.loadStaging()).toEqual([record]);
  });

  it('should honour custom table names', async () => {
    const { client } = createFakeClient({ raw: { data: [record] } });
    const store = new SupabaseLayoffStore(client, { sourceTable: 'raw' });

    expect(await store.loadSource()).toEqual([record]);
  });

  it('should replace staging through one rpc call without helper columns', async () => {
    const { client, rpcCalls } = createFakeClient(tables);
    const store = new SupabaseLayoffStore(client, { stagingTable: 'layoffs_clean_staging' });

    const ranked = { ...record, row_num: 1 };
    await store.replaceStaging([ranked]);

    expect(rpcCalls).toEqual([
      { fn: 'replace_layoffs_staging', args: { target_table: 'layoffs_clean_staging', rows: [record] } }
    ]);
  });

  it('should page through tables larger than one response', async () => {
    const rows = Array.from({ length: 5 }, (_, i) => ({ ...record, total_laid_off: i }));
    tables.layoffs = { data: rows };
    const { client, rangeCalls } = createFakeClient(tables);
    const store = new SupabaseLayoffStore(client, { pageSize: 2 });

    expect(await store.loadSource()).toEqual(rows);
    expect(rangeCalls.map((call) => [call.from, call.to])).toEqual([[0, 1], [2, 3], [4, 5]]);
    expect(rangeCalls[0]).toEqual({
      table: 'layoffs',
      columns: 'company,location,industry,total_laid_off,percentage_laid_off,event_date,stage,country,funds_raised_millions',
      order: 'row_id',
      from: 0,
      to: 1
    });
  });

  it('should ask for one more page when the last one is exactly full', async () => {
    tables.layoffs = { data: [record, record] };
    const { client, rangeCalls } = createFakeClient(tables);

    expect(await new SupabaseLayoffStore(client, { pageSize: 2 }).loadSource()).toHaveLength(2);
    expect(rangeCalls).toHaveLength(2);
  });

  it('should refuse a staging table outside the *_staging names', () => {
    const { client } = createFakeClient(tables);

    expect(() => new SupabaseLayoffStore(client, { stagingTable: 'layoffs' })).toThrow(
      'Staging table name must end in _staging, got layoffs'
    );
    expect(() => new SupabaseLayoffStore(client, { pageSize: 0 })).toThrow(StorageError);
  });

  it('should wrap read failures in a StorageError', async () => {
    tables.layoffs = { data: [], error: { message: 'permission denied' } };
    const store = new SupabaseLayoffStore(createFakeClient(tables).client);

    await expect(store.loadSource()).rejects.toThrow(new StorageError('Failed to read layoffs: permission denied'));
  });

  it('should wrap write failures in a StorageError', async () => {
    const { client } = createFakeClient(tables, { message: 'deadlock detected' });
    const store = new SupabaseLayoffStore(client);

    await expect(store.replaceStaging([record])).rejects.toThrow(
      'Failed to replace layoffs_staging: deadlock detected'
    );
  });

  it('should reject rows that do not match the record shape', async () => {
    tables.layoffs = { data: [{ ...record, total_laid_off: 'many' }] };
    const store = new SupabaseLayoffStore(createFakeClient(tables).client);

    await expect(store.loadSource()).rejects.toBeInstanceOf(StorageError);
  });
});
