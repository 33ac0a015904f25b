import { DateTime } from 'luxon';
import { isStoreBusyError } from '@zone-alerts/db-client';
import {
  createLogger,
  formatUnknownError,
  parseUtc,
  sleep as defaultSleep,
  toIsoString,
  utcDateString,
  type Logger,
} from '@zone-alerts/shared-utils';
import { CooldownStorageError } from '../errors.js';
import type { AlertCooldown, CooldownStore } from './cooldownStore.js';

export type CooldownManagerOptions = {
  store: CooldownStore;
  cooldownMinutes: number;
  maxDailyAlerts: number;
  maxRetries?: number;
  retryDelayMs?: number;
  now?: () => DateTime;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

/**
 * 존별 쿨다운 + 전역 일일 상한.
 *
 * 존 상태는 AVAILABLE ⇄ COOLING 두 가지다. recordAlert가 성공하는 순간 COOLING,
 * now - lastAlertTime >= cooldownMinutes가 되면 다시 AVAILABLE.
 * 저장소 호출은 전부 같은 재시도 경로(StoreBusyError → 고정 지연 후 재시도)를 탄다.
 */
export class CooldownManager {
  private readonly store: CooldownStore;
  private readonly cooldownMinutes: number;
  private readonly maxDailyAlerts: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly now: () => DateTime;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(opts: CooldownManagerOptions) {
    this.store = opts.store;
    this.cooldownMinutes = opts.cooldownMinutes;
    this.maxDailyAlerts = opts.maxDailyAlerts;
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
    this.retryDelayMs = Math.max(0, opts.retryDelayMs ?? 100);
    this.now = opts.now ?? (() => DateTime.utc());
    this.sleep = opts.sleep ?? defaultSleep;
    this.logger = opts.logger ?? createLogger('cooldown');
  }

  async isOnCooldown(zoneKey: string): Promise<boolean> {
    const cooldown = await this.withRetry('getCooldown', () => this.store.getCooldown(zoneKey));
    if (!cooldown) return false;

    const elapsedMinutes = this.now().diff(parseUtc(cooldown.lastAlertTime), 'minutes').minutes;
    return elapsedMinutes < this.cooldownMinutes;
  }

  async canSendAlert(): Promise<boolean> {
    const count = await this.getDailyCount();
    return count < this.maxDailyAlerts;
  }

  /**
   * 오늘(UTC) 발송 건수. 날짜가 바뀌었으면 먼저 0으로 되돌린다.
   */
  async getDailyCount(): Promise<number> {
    const today = utcDateString(this.now());
    const counter = await this.withRetry('getDailyCounter', () => this.store.getDailyCounter());

    if (counter.resetDate === null || counter.resetDate < today) {
      await this.withRetry('resetDailyCounter', () => this.store.resetDailyCounter(today));
      this.logger.info('일일 알림 카운터 리셋', { previousDate: counter.resetDate, today });
      return 0;
    }

    return counter.count;
  }

  async recordAlert(zoneKey: string): Promise<void> {
    const now = this.now();
    const params = {
      zoneKey,
      alertTime: toIsoString(now),
      today: utcDateString(now),
    };

    await this.withRetry('recordAlert', () => this.store.recordAlert(params));
    this.logger.info('존 쿨다운 기록', { zoneKey, at: params.alertTime });
  }

  async getCooldown(zoneKey: string): Promise<AlertCooldown | null> {
    return this.withRetry('getCooldown', () => this.store.getCooldown(zoneKey));
  }

  private async withRetry<T>(action: string, run: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await run();
      } catch (error: unknown) {
        if (!isStoreBusyError(error)) throw error;

        lastError = error;
        this.logger.warn('쿨다운 저장소 잠김, 재시도', {
          action,
          attempt,
          maxRetries: this.maxRetries,
          error: formatUnknownError(error),
        });

        if (attempt < this.maxRetries) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    throw new CooldownStorageError(action, this.maxRetries, { cause: lastError });
  }
}
