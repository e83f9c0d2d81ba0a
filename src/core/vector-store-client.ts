/**
 * Vector Store - Client & Connection Management
 *
 * Supabase client construction. The client is built once from the resolved
 * configuration and handed to the store adapter; nothing is cached here.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import { ConfigError } from './errors.js';

export interface SupabaseConnection {
  url: string;
  key: string;
  /** Replaces the global fetch for every REST call the client makes. */
  fetch?: typeof fetch;
}

export function createSupabaseClient(connection: SupabaseConnection): SupabaseClient {
  if (!connection.url) {
    throw new ConfigError('SUPABASE_URL is required.');
  }
  if (!connection.key) {
    throw new ConfigError('SUPABASE_SERVICE_KEY (or SUPABASE_ANON_KEY) is required.');
  }

  return createClient(connection.url, connection.key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    ...(connection.fetch ? { global: { fetch: connection.fetch } } : {}),
  });
}
