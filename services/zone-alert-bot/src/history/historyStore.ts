import Big from 'big.js';
import { DateTime } from 'luxon';
import {
  countLiquidationAlerts,
  deleteLiquidationAlertsBefore,
  fetchRecentLiquidationAlerts,
  insertLiquidationAlert,
  type InsertLiquidationAlertParams,
  type LiquidationAlertRow,
  type SupabaseClient,
} from '@zone-alerts/db-client';
import { createLogger, toIsoString, type Logger } from '@zone-alerts/shared-utils';
import type { Alert } from '../types/alert.js';

/**
 * 발송된 알림의 append-only 로그
 */
export interface AlertHistoryStore {
  saveAlert(alert: Alert): Promise<number>;
  /** 최신순 */
  getRecentAlerts(limit?: number): Promise<Alert[]>;
  /** 보존 기간(UTC 자정 기준)보다 오래된 행 삭제, 삭제 건수 반환 */
  cleanupOldAlerts(): Promise<number>;
  getAlertCount(since?: DateTime): Promise<number>;
}

export function toLiquidationAlertRow(alert: Alert): InsertLiquidationAlertParams {
  return {
    timestamp: alert.timestamp,
    symbol: alert.symbol,
    current_price: alert.currentPrice.toString(),
    zone_price: alert.zonePrice.toString(),
    zone_density: alert.zoneDensity.toString(),
    zone_side: alert.zoneSide,
    distance_pct: alert.distancePct.toString(),
    severity: alert.severity,
    message: alert.message,
    channels_sent: [...alert.channelsSent],
    delivery_status: alert.deliveryStatus,
    error_message: alert.errorMessage,
  };
}

export function fromLiquidationAlertRow(row: LiquidationAlertRow): Alert {
  return {
    id: row.id,
    timestamp: row.timestamp,
    symbol: row.symbol,
    currentPrice: new Big(row.current_price),
    zonePrice: new Big(row.zone_price),
    zoneDensity: new Big(row.zone_density),
    zoneSide: row.zone_side,
    distancePct: new Big(row.distance_pct),
    severity: row.severity,
    message: row.message,
    channelsSent: row.channels_sent,
    deliveryStatus: row.delivery_status,
    errorMessage: row.error_message,
  };
}

/**
 * 보존 기간 컷오프: 오늘 UTC 자정에서 retentionDays 만큼 이전
 */
export function retentionCutoff(retentionDays: number, now: DateTime = DateTime.utc()): DateTime {
  return now.toUTC().startOf('day').minus({ days: retentionDays });
}

export class SupabaseAlertHistoryStore implements AlertHistoryStore {
  private readonly logger: Logger;
  private readonly now: () => DateTime;

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly retentionDays: number,
    opts?: { logger?: Logger; now?: () => DateTime },
  ) {
    this.logger = opts?.logger ?? createLogger('alert-history');
    this.now = opts?.now ?? (() => DateTime.utc());
  }

  async saveAlert(alert: Alert): Promise<number> {
    const id = await insertLiquidationAlert(this.supabase, toLiquidationAlertRow(alert));
    this.logger.info('알림 히스토리 저장', { id, severity: alert.severity, status: alert.deliveryStatus });
    return id;
  }

  async getRecentAlerts(limit = 100): Promise<Alert[]> {
    const rows = await fetchRecentLiquidationAlerts(this.supabase, limit);
    return rows.map(fromLiquidationAlertRow);
  }

  async cleanupOldAlerts(): Promise<number> {
    const cutoff = toIsoString(retentionCutoff(this.retentionDays, this.now()));
    const deleted = await deleteLiquidationAlertsBefore(this.supabase, cutoff);
    if (deleted > 0) {
      this.logger.info('오래된 알림 히스토리 정리', { deleted, cutoff });
    }
    return deleted;
  }

  async getAlertCount(since?: DateTime): Promise<number> {
    return countLiquidationAlerts(this.supabase, since ? toIsoString(since) : undefined);
  }
}
