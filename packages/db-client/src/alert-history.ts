import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { toStoreError } from './errors.js';
import type { InsertLiquidationAlertParams, LiquidationAlertRow } from './types.js';

const TABLE = 'liquidation_alerts';

const numericColumn = z.union([z.string(), z.number()]).transform((value) => String(value));

const LiquidationAlertRowSchema = z.object({
  id: z.coerce.number().int(),
  timestamp: z.string(),
  symbol: z.string(),
  current_price: numericColumn,
  zone_price: numericColumn,
  zone_density: numericColumn,
  zone_side: z.enum(['long', 'short']),
  distance_pct: numericColumn,
  severity: z.enum(['critical', 'warning', 'info']),
  message: z.string().nullable(),
  channels_sent: z
    .array(z.string())
    .nullable()
    .transform((value) => value ?? []),
  delivery_status: z.enum(['pending', 'success', 'partial', 'failed']),
  error_message: z.string().nullable(),
});

const InsertedIdSchema = z.object({ id: z.coerce.number().int() });

/**
 * Append one alert to the history log and return its id.
 */
export async function insertLiquidationAlert(
  supabase: SupabaseClient,
  params: InsertLiquidationAlertParams,
): Promise<number> {
  const { data, error } = await supabase.from(TABLE).insert(params).select('id').single();

  if (error) {
    throw toStoreError('Failed to insert liquidation alert', error);
  }

  return InsertedIdSchema.parse(data).id;
}

/**
 * Most recent alerts first.
 */
export async function fetchRecentLiquidationAlerts(
  supabase: SupabaseClient,
  limit = 100,
): Promise<LiquidationAlertRow[]> {
  const { data, error } = await supabase
    .from(TABLE)
    .select('*')
    .order('timestamp', { ascending: false })
    .limit(limit);

  if (error) {
    throw toStoreError('Failed to fetch liquidation alerts', error);
  }

  return z.array(LiquidationAlertRowSchema).parse(data ?? []);
}

export async function deleteLiquidationAlertsBefore(
  supabase: SupabaseClient,
  cutoffIso: string,
): Promise<number> {
  const { count, error } = await supabase
    .from(TABLE)
    .delete({ count: 'exact' })
    .lt('timestamp', cutoffIso);

  if (error) {
    throw toStoreError('Failed to delete old liquidation alerts', error);
  }

  return count ?? 0;
}

export async function countLiquidationAlerts(
  supabase: SupabaseClient,
  sinceIso?: string,
): Promise<number> {
  let query = supabase.from(TABLE).select('*', { count: 'exact', head: true });

  if (sinceIso) {
    query = query.gte('timestamp', sinceIso);
  }

  const { count, error } = await query;

  if (error) {
    throw toStoreError('Failed to count liquidation alerts', error);
  }

  return count ?? 0;
}

export function parseLiquidationAlertRow(raw: unknown): LiquidationAlertRow {
  return LiquidationAlertRowSchema.parse(raw);
}
