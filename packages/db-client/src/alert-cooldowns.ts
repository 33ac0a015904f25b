import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { toStoreError } from './errors.js';
import type {
  AlertCooldownRow,
  DailyAlertCounterRow,
  RecordAlertCooldownParams,
} from './types.js';

const DAILY_COUNTER_ID = 1;

const AlertCooldownRowSchema = z.object({
  zone_key: z.string(),
  last_alert_time: z.string(),
  alert_count_today: z.coerce.number().int(),
  last_reset_date: z.string(),
});

const DailyAlertCounterRowSchema = z.object({
  count: z.coerce.number().int(),
  reset_date: z.string().nullable(),
});

/**
 * Get the cooldown row for a zone bucket, or null when the zone never alerted.
 */
export async function fetchAlertCooldown(
  supabase: SupabaseClient,
  zoneKey: string,
): Promise<AlertCooldownRow | null> {
  const { data, error } = await supabase
    .from('alert_cooldowns')
    .select('zone_key, last_alert_time, alert_count_today, last_reset_date')
    .eq('zone_key', zoneKey)
    .maybeSingle();

  if (error) {
    throw toStoreError('Failed to fetch alert cooldown', error);
  }

  if (!data) return null;
  return AlertCooldownRowSchema.parse(data);
}

/**
 * Get the singleton daily counter row.
 */
export async function fetchDailyAlertCounter(
  supabase: SupabaseClient,
): Promise<DailyAlertCounterRow | null> {
  const { data, error } = await supabase
    .from('alert_daily_counter')
    .select('count, reset_date')
    .eq('id', DAILY_COUNTER_ID)
    .maybeSingle();

  if (error) {
    throw toStoreError('Failed to fetch daily alert counter', error);
  }

  if (!data) return null;
  return DailyAlertCounterRowSchema.parse(data);
}

/**
 * Zero the daily counter if it still belongs to an earlier UTC day.
 * The date guard keeps concurrent resets idempotent.
 */
export async function resetDailyAlertCounter(
  supabase: SupabaseClient,
  resetDate: string,
): Promise<void> {
  const { error } = await supabase
    .from('alert_daily_counter')
    .update({ count: 0, reset_date: resetDate })
    .eq('id', DAILY_COUNTER_ID)
    .or(`reset_date.is.null,reset_date.lt.${resetDate}`);

  if (error) {
    throw toStoreError('Failed to reset daily alert counter', error);
  }
}

/**
 * Upsert the zone cooldown and increment the daily counter in one transaction
 * (see record_alert_cooldown in supabase/migrations).
 */
export async function recordAlertCooldown(
  supabase: SupabaseClient,
  params: RecordAlertCooldownParams,
): Promise<void> {
  const { error } = await supabase.rpc('record_alert_cooldown', {
    p_zone_key: params.zoneKey,
    p_alert_time: params.alertTime,
    p_today: params.today,
  });

  if (error) {
    throw toStoreError('Failed to record alert cooldown', error);
  }
}
