export type AlertSeverityValue = 'critical' | 'warning' | 'info';
export type DeliveryStatusValue = 'pending' | 'success' | 'partial' | 'failed';
export type ZoneSideValue = 'long' | 'short';

// =============================================================================
// Alert Cooldowns
// =============================================================================
export interface AlertCooldownRow {
  zone_key: string;
  last_alert_time: string;
  alert_count_today: number;
  last_reset_date: string;
}

export interface DailyAlertCounterRow {
  count: number;
  reset_date: string | null;
}

export interface RecordAlertCooldownParams {
  zoneKey: string;
  /** ISO timestamp (UTC) */
  alertTime: string;
  /** UTC date, yyyy-MM-dd */
  today: string;
}

// =============================================================================
// Liquidation Alert History
// =============================================================================
export interface LiquidationAlertRow {
  id: number;
  timestamp: string;
  symbol: string;
  current_price: string;
  zone_price: string;
  zone_density: string;
  zone_side: ZoneSideValue;
  distance_pct: string;
  severity: AlertSeverityValue;
  message: string | null;
  channels_sent: string[];
  delivery_status: DeliveryStatusValue;
  error_message: string | null;
}

export type InsertLiquidationAlertParams = Omit<LiquidationAlertRow, 'id'>;
