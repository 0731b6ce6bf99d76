/**
 * Drama Collector — Record Store
 *
 * Canonical records are upserted by dedup key. The supabase driver writes to
 * a Postgres table (see sql/001_drama_records.sql); the memory driver backs
 * dry runs and tests.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { CanonicalRecord } from '../types';
import { RecordFieldsSchema } from '../types/record';
import type { StoreConfig } from '../config/schema';
import { StoreUnavailableError, errorMessage } from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';
import {
  checkDatabaseHealth,
  createAdminClient,
  handleSupabaseError,
  type StoreHealth,
  type SupabaseSettings,
} from './client';

export type { StoreHealth } from './client';

export interface StoredRecord extends CanonicalRecord {
  updatedAt: string;
}

export interface RecordStore {
  readonly driver: StoreConfig['driver'];
  /** Returns the number of records written */
  upsert(records: readonly CanonicalRecord[]): Promise<number>;
  /** Most recently updated first */
  list(limit?: number): Promise<StoredRecord[]>;
  get(key: string): Promise<StoredRecord | null>;
  count(): Promise<number>;
  ping(): Promise<StoreHealth>;
}

const DEFAULT_LIST_LIMIT = 50;

// ============================================================
// MEMORY
// ============================================================

export class MemoryRecordStore implements RecordStore {
  readonly driver = 'memory' as const;
  private readonly records = new Map<string, StoredRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async upsert(records: readonly CanonicalRecord[]): Promise<number> {
    const updatedAt = new Date(this.clock.now()).toISOString();
    for (const record of records) {
      this.records.delete(record.key);
      this.records.set(record.key, { ...structuredClone(record), updatedAt });
    }
    return records.length;
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<StoredRecord[]> {
    return Array.from(this.records.values())
      .reverse()
      .slice(0, Math.max(0, limit))
      .map(record => structuredClone(record));
  }

  async get(key: string): Promise<StoredRecord | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async ping(): Promise<StoreHealth> {
    return { healthy: true, latencyMs: 0 };
  }
}

// ============================================================
// SUPABASE
// ============================================================

const RecordRowSchema = z.object({
  dedup_key: z.string(),
  title: z.string().nullable(),
  year: z.number().int().nullable(),
  sources: z.array(z.string()),
  source_ids: z.record(z.string()),
  fields: RecordFieldsSchema,
  completeness_score: z.number(),
  quality_score: z.number().nullable(),
  updated_at: z.string(),
});
export type RecordRow = z.infer<typeof RecordRowSchema>;

export function toRow(record: CanonicalRecord, updatedAt: string): RecordRow {
  return {
    dedup_key: record.key,
    title: record.fields.title ?? null,
    year: record.fields.year ?? null,
    sources: record.sources,
    source_ids: record.sourceIds,
    fields: record.fields,
    completeness_score: record.completenessScore,
    quality_score: record.qualityScore ?? null,
    updated_at: updatedAt,
  };
}

export function fromRow(row: RecordRow): StoredRecord {
  return {
    key: row.dedup_key,
    sources: row.sources,
    sourceIds: row.source_ids,
    fields: row.fields,
    completenessScore: row.completeness_score,
    qualityScore: row.quality_score ?? undefined,
    updatedAt: row.updated_at,
  };
}

function parseRows(data: unknown): StoredRecord[] {
  const parsed = z.array(RecordRowSchema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new StoreUnavailableError(`Unexpected row shape: ${parsed.error.message}`);
  }
  return parsed.data.map(fromRow);
}

export interface SupabaseRecordStoreOptions extends SupabaseSettings {
  table: string;
  clock?: Clock;
}

export class SupabaseRecordStore implements RecordStore {
  readonly driver = 'supabase' as const;
  private client?: SupabaseClient;
  private readonly clock: Clock;
  private readonly log = logger.child({ component: 'store', driver: 'supabase' });

  constructor(private readonly options: SupabaseRecordStoreOptions) {
    this.clock = options.clock ?? systemClock;
  }

  private getClient(): SupabaseClient {
    if (!this.client) {
      this.client = createAdminClient(this.options);
    }
    return this.client;
  }

  /**
   * Run a query, turning thrown errors into StoreUnavailableError.
   */
  private async run<T>(operation: string, query: (client: SupabaseClient) => Promise<T>): Promise<T> {
    try {
      return await query(this.getClient());
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      throw new StoreUnavailableError(`Supabase ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async upsert(records: readonly CanonicalRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const updatedAt = new Date(this.clock.now()).toISOString();
    const rows = records.map(record => toRow(record, updatedAt));

    return this.run('upsert', async client => {
      const { data, error } = await client
        .from(this.options.table)
        .upsert(rows, { onConflict: 'dedup_key' })
        .select('dedup_key');

      if (error) throw handleSupabaseError(error, 'upsert');

      const written = Array.isArray(data) ? data.length : rows.length;
      this.log.info('Records upserted', { table: this.options.table, written });
      return written;
    });
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<StoredRecord[]> {
    return this.run('list', async client => {
      const { data, error } = await client
        .from(this.options.table)
        .select('*')
        .order('updated_at', { ascending: false })
        .limit(limit);

      if (error) throw handleSupabaseError(error, 'list');
      return parseRows(data);
    });
  }

  async get(key: string): Promise<StoredRecord | null> {
    return this.run('get', async client => {
      const { data, error } = await client
        .from(this.options.table)
        .select('*')
        .eq('dedup_key', key)
        .maybeSingle();

      if (error) throw handleSupabaseError(error, 'get');
      if (data === null || data === undefined) return null;
      return parseRows([data])[0] ?? null;
    });
  }

  async count(): Promise<number> {
    return this.run('count', async client => {
      const { count, error } = await client
        .from(this.options.table)
        .select('*', { count: 'exact', head: true });

      if (error) throw handleSupabaseError(error, 'count');
      return count ?? 0;
    });
  }

  async ping(): Promise<StoreHealth> {
    let client: SupabaseClient;
    try {
      client = this.getClient();
    } catch (error) {
      return { healthy: false, latencyMs: 0, error: errorMessage(error) };
    }
    return checkDatabaseHealth(client, this.options.table);
  }
}

// ============================================================
// FACTORY
// ============================================================

export function createRecordStore(config: StoreConfig, clock: Clock = systemClock): RecordStore {
  if (config.driver === 'supabase') {
    return new SupabaseRecordStore({
      table: config.table,
      url: config.supabaseUrl,
      serviceRoleKey: config.supabaseServiceRoleKey,
      clock,
    });
  }
  return new MemoryRecordStore(clock);
}
