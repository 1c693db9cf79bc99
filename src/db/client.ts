/**
 * FeedRelay — Supabase Client
 *
 * The pipeline runs as a background service and talks to the database
 * with the service role key (bypasses RLS).
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '../lib/errors';

// ============================================================
// CLIENT INSTANCES
// ============================================================

export interface StorageCredentials {
  url?: string;
  serviceRoleKey?: string;
}

export function createStorageClient(credentials: StorageCredentials): SupabaseClient {
  if (!credentials.url) {
    throw new StorageError('connect', 'Missing SUPABASE_URL environment variable');
  }
  if (!credentials.serviceRoleKey) {
    throw new StorageError('connect', 'SUPABASE_SERVICE_ROLE_KEY is required for the pipeline');
  }

  return createClient(credentials.url, credentials.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(operation: string, error: { message: string; code?: string }): StorageError {
  return new StorageError(
    operation,
    `${error.message}${error.code ? ` (code: ${error.code})` : ''}`,
    error.code
  );
}

/** Postgres unique_violation */
export const UNIQUE_VIOLATION = '23505';
