import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { Config } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Create the Supabase client for a run. Entry points call this once and
 * hand the client to the store; nothing else holds a connection.
 */
export function createSupabaseClient(config: Config): SupabaseClient {
  logger.info('Initializing Supabase client', { url: config.supabase.url });

  return createClient(config.supabase.url, config.supabase.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
