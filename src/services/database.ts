/**
 * Supabase Database Client - stored Teamcenter BOM exports
 * Credentials are read from the environment on first use, not at import.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { readSupabaseCredentials } from '../config';

export const BOM_LINES_TABLE = 'bom_lines';

let supabaseClient: SupabaseClient | null = null;
let clientUrl: string | null = null;

export function isDatabaseConfigured(): boolean {
  return readSupabaseCredentials() !== null;
}

/**
 * Shared client; rebuilt when SUPABASE_URL changes between calls
 */
export function getSupabaseClient(): SupabaseClient {
  const credentials = readSupabaseCredentials();
  if (!credentials) {
    throw new Error('Missing Supabase credentials in environment variables');
  }

  if (!supabaseClient || clientUrl !== credentials.url) {
    supabaseClient = createClient(credentials.url, credentials.anonKey, {
      auth: { persistSession: false }
    });
    clientUrl = credentials.url;
  }
  return supabaseClient;
}

/**
 * One-row select against bom_lines
 */
export async function testConnection(): Promise<boolean> {
  if (!isDatabaseConfigured()) return false;
  try {
    const { error } = await getSupabaseClient().from(BOM_LINES_TABLE).select('bom_id').limit(1);
    if (error) {
      console.error('❌ bom_lines not reachable:', error.message);
      return false;
    }
    return true;
  } catch (err) {
    console.error('❌ Database connection error:', err);
    return false;
  }
}
