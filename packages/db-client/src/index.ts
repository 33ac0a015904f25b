export * from './client.js';
export * from './errors.js';
export * from './types.js';

// Liquidation zone alerts
export * from './alert-cooldowns.js';
export * from './alert-history.js';
export type { SupabaseClient } from '@supabase/supabase-js';
