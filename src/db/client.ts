/**
 * Drama Collector — Supabase Client
 *
 * Service-role client for the record store. Created lazily so that the
 * memory driver and the tests never need Supabase credentials.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StoreUnavailableError } from '../lib/errors';

export interface SupabaseSettings {
  url?: string;
  serviceRoleKey?: string;
}

/**
 * Create the admin client or throw if not configured.
 * Bypasses Row Level Security; only the collector writes the records table.
 */
export function createAdminClient(settings: SupabaseSettings): SupabaseClient {
  if (!settings.url) {
    throw new StoreUnavailableError('SUPABASE_URL is required for the supabase store');
  }
  if (!settings.serviceRoleKey) {
    throw new StoreUnavailableError('SUPABASE_SERVICE_ROLE_KEY is required for the supabase store');
  }

  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

export interface StoreHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Check if the records table is reachable
 */
export async function checkDatabaseHealth(client: SupabaseClient, table: string): Promise<StoreHealth> {
  const start = Date.now();
  try {
    const { error } = await client.from(table).select('dedup_key').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - start;
    return {
      healthy: false,
      latencyMs,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

function hasMessage(error: unknown): error is { message: string; code?: unknown } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown, operation: string): StoreUnavailableError {
  if (hasMessage(error)) {
    const code = typeof error.code === 'string' && error.code ? ` (code: ${error.code})` : '';
    return new StoreUnavailableError(`Supabase ${operation} failed: ${error.message}${code}`, { cause: error });
  }
  return new StoreUnavailableError(`Supabase ${operation} failed: unknown error`, { cause: error });
}
