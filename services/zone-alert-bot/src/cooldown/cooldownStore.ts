import {
  fetchAlertCooldown,
  fetchDailyAlertCounter,
  recordAlertCooldown,
  resetDailyAlertCounter,
  type SupabaseClient,
} from '@zone-alerts/db-client';

export type AlertCooldown = {
  zoneKey: string;
  lastAlertTime: string;
  alertCountToday: number;
  /** yyyy-MM-dd (UTC) */
  lastResetDate: string;
};

export type DailyCounter = {
  count: number;
  /** yyyy-MM-dd (UTC), 한 번도 기록되지 않았으면 null */
  resetDate: string | null;
};

/**
 * 쿨다운/일일 카운터 영속 저장소.
 * 동시 쓰기 충돌은 StoreBusyError로 던져야 CooldownManager가 재시도한다.
 */
export interface CooldownStore {
  getCooldown(zoneKey: string): Promise<AlertCooldown | null>;
  getDailyCounter(): Promise<DailyCounter>;
  /** resetDate보다 이전 날짜의 카운터만 0으로 */
  resetDailyCounter(resetDate: string): Promise<void>;
  /** 존 쿨다운 upsert + 일일 카운터 증가를 한 번에 */
  recordAlert(params: { zoneKey: string; alertTime: string; today: string }): Promise<void>;
}

export class SupabaseCooldownStore implements CooldownStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getCooldown(zoneKey: string): Promise<AlertCooldown | null> {
    const row = await fetchAlertCooldown(this.supabase, zoneKey);
    if (!row) return null;

    return {
      zoneKey: row.zone_key,
      lastAlertTime: row.last_alert_time,
      alertCountToday: row.alert_count_today,
      lastResetDate: row.last_reset_date,
    };
  }

  async getDailyCounter(): Promise<DailyCounter> {
    const row = await fetchDailyAlertCounter(this.supabase);
    if (!row) return { count: 0, resetDate: null };
    return { count: row.count, resetDate: row.reset_date };
  }

  async resetDailyCounter(resetDate: string): Promise<void> {
    await resetDailyAlertCounter(this.supabase, resetDate);
  }

  async recordAlert(params: { zoneKey: string; alertTime: string; today: string }): Promise<void> {
    await recordAlertCooldown(this.supabase, params);
  }
}
