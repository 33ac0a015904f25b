import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { requireEnv, type EnvSource } from '@zone-alerts/shared-utils';

export type SupabaseConfig = {
  url: string;
  key: string;
};

export function readSupabaseConfig(source: EnvSource = process.env): SupabaseConfig {
  return {
    url: requireEnv('SUPABASE_URL', source),
    key: requireEnv('SUPABASE_KEY', source),
  };
}

/**
 * 프로세스 시작 시 한 번 만들고 필요한 곳에 주입한다.
 */
export function createSupabase(config: SupabaseConfig): SupabaseClient {
  return createClient(config.url, config.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
