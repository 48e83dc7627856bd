import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getSupabasePublishableKey, getSupabaseUrl } from '../../utils/getEnv';
import type { KeyValueStorage } from '../storage/keyValueStorage';
import { SupabaseAuthStorage } from './supabaseAuthStorage';

let _client: SupabaseClient | null = null;
let _authStorage: SupabaseAuthStorage | null = null;

export function getSupabaseClient(storage: KeyValueStorage): SupabaseClient {
  if (_client) return _client;

  const url = getSupabaseUrl();
  const key = getSupabasePublishableKey();

  if (!url) {
    throw new Error('Missing Supabase URL (set SUPABASE_URL)');
  }
  if (!key) {
    throw new Error('Missing Supabase publishable key (set SUPABASE_PUBLISHABLE_KEY)');
  }

  if (!_authStorage) {
    _authStorage = new SupabaseAuthStorage(storage);
  }

  _client = createClient(url, key, {
    auth: {
      storage: _authStorage,
      persistSession: true,
      autoRefreshToken: true,
      detectSessionInUrl: false,
      flowType: 'pkce',
    },
  });

  return _client;
}

export async function resetSupabaseAuthStorage(): Promise<void> {
  await _authStorage?.reset();
}
