import '@zone-alerts/shared-utils/env-loader';
import { readSupabaseConfig, type SupabaseConfig } from '@zone-alerts/db-client';
import { parseAlertConfig, type AlertConfig } from './alertConfig.js';

export function loadAlertConfig(): AlertConfig {
  return parseAlertConfig(process.env);
}

export function loadSupabaseConfig(): SupabaseConfig {
  return readSupabaseConfig(process.env);
}
