import { DateTime } from 'luxon';
import {
  createLogger,
  formatUnknownError,
  utcDateString,
  type Logger,
} from '@zone-alerts/shared-utils';
import { formatPct, formatUsd } from '../alert/formatMessage.js';
import type { CooldownManager } from '../cooldown/cooldownManager.js';
import { applyDispatchResult, type AlertDispatcher } from '../dispatch/dispatcher.js';
import { buildAlert, type AlertEvaluationEngine } from '../engine/evaluationEngine.js';
import type { AlertHistoryStore } from '../history/historyStore.js';
import type { Alert, TriggeredZone } from '../types/alert.js';

export type AlertMonitorOptions = {
  engine: AlertEvaluationEngine;
  cooldown: CooldownManager;
  dispatcher: AlertDispatcher;
  /** HISTORY_ENABLED=false면 null */
  history: AlertHistoryStore | null;
  logger?: Logger;
  now?: () => DateTime;
};

export type CycleSummary =
  | { status: 'skipped'; reason: 'cycle_in_progress' }
  | {
      status: 'completed';
      triggered: number;
      /** 한 채널 이상 전송 성공 */
      sent: number;
      /** 모든 대상 채널 실패, 또는 심각도 필터로 대상 채널 없음 */
      undelivered: number;
      cooldownSkipped: number;
      dailyCapSkipped: number;
      alerts: Alert[];
    };

export function describeZone(triggered: TriggeredZone): string {
  const { proximity } = triggered;
  return `Liquidation zone at ${formatUsd(proximity.zone.price)} is ${formatPct(proximity.distancePct)} ${proximity.direction} current price`;
}

/**
 * 한 사이클: 평가 → 쿨다운/일일 상한 필터 → 전송 → 기록.
 *
 * 같은 프로세스 안에서 사이클은 직렬화된다. 이전 사이클이 끝나기 전에 호출되면
 * 아무것도 하지 않고 skipped를 돌려준다(쿨다운 확인과 기록 사이의 중복 발송 방지).
 */
export class AlertMonitor {
  private readonly engine: AlertEvaluationEngine;
  private readonly cooldown: CooldownManager;
  private readonly dispatcher: AlertDispatcher;
  private readonly history: AlertHistoryStore | null;
  private readonly logger: Logger;
  private readonly now: () => DateTime;

  private running = false;
  private lastCleanupDate: string | null = null;

  constructor(opts: AlertMonitorOptions) {
    this.engine = opts.engine;
    this.cooldown = opts.cooldown;
    this.dispatcher = opts.dispatcher;
    this.history = opts.history;
    this.logger = opts.logger ?? createLogger('alert-monitor');
    this.now = opts.now ?? (() => DateTime.utc());
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runCycle(): Promise<CycleSummary> {
    if (this.running) {
      this.logger.warn('이전 사이클 진행 중, 건너뜀');
      return { status: 'skipped', reason: 'cycle_in_progress' };
    }

    this.running = true;
    try {
      return await this.evaluateAndDispatch();
    } finally {
      this.running = false;
    }
  }

  /**
   * UTC 날짜당 한 번만 히스토리를 정리한다. 실행했으면 삭제 건수, 아니면 null.
   */
  async cleanupHistoryIfDue(): Promise<number | null> {
    if (!this.history) return null;

    const today = utcDateString(this.now());
    if (this.lastCleanupDate === today) return null;

    const deleted = await this.history.cleanupOldAlerts();
    this.lastCleanupDate = today;
    this.logger.info('히스토리 정리 완료', { deleted, date: today });
    return deleted;
  }

  private async evaluateAndDispatch(): Promise<CycleSummary> {
    this.logger.info('알림 사이클 시작', { symbol: this.engine.symbol });

    const triggered = await this.engine.evaluate();
    const alerts: Alert[] = [];
    let sent = 0;
    let undelivered = 0;
    let cooldownSkipped = 0;
    let dailyCapSkipped = 0;

    for (let i = 0; i < triggered.length; i++) {
      const zone = triggered[i];
      const zoneKey = zone.proximity.zoneKey;

      if (await this.cooldown.isOnCooldown(zoneKey)) {
        cooldownSkipped += 1;
        this.logger.debug('쿨다운 중인 존, 건너뜀', { zoneKey, severity: zone.severity });
        continue;
      }

      if (!(await this.cooldown.canSendAlert())) {
        dailyCapSkipped = triggered.length - i;
        this.logger.warn('일일 알림 상한 도달, 남은 존 건너뜀', { remaining: dailyCapSkipped });
        break;
      }

      const alert: Alert = {
        ...buildAlert(zone, this.engine.symbol, this.now()),
        message: describeZone(zone),
      };
      const result = await this.dispatcher.dispatch(alert);
      const delivered = applyDispatchResult(alert, result);

      if (result.channelsSent.length === 0) {
        undelivered += 1;
        alerts.push(delivered);
        continue;
      }

      // 쿨다운 기록이 실패해 사이클이 중단돼도 전송된 알림은 히스토리에 남는다
      const saved = await this.saveHistory(delivered);
      try {
        await this.cooldown.recordAlert(zoneKey);
      } catch (error: unknown) {
        this.logger.error('전송 후 쿨다운 기록 실패', {
          zoneKey,
          alertId: saved.id,
          channelsSent: saved.channelsSent,
          error: formatUnknownError(error),
        });
        throw error;
      }
      sent += 1;
      alerts.push(saved);
    }

    const summary: CycleSummary = {
      status: 'completed',
      triggered: triggered.length,
      sent,
      undelivered,
      cooldownSkipped,
      dailyCapSkipped,
      alerts,
    };

    this.logger.info('알림 사이클 종료', {
      triggered: summary.triggered,
      sent,
      undelivered,
      cooldownSkipped,
      dailyCapSkipped,
    });

    return summary;
  }

  private async saveHistory(alert: Alert): Promise<Alert> {
    if (!this.history) return alert;

    try {
      const id = await this.history.saveAlert(alert);
      return { ...alert, id };
    } catch (error: unknown) {
      // 전송은 이미 끝났으므로 사이클은 계속 진행
      this.logger.error('알림 히스토리 저장 실패', { error: formatUnknownError(error) });
      return alert;
    }
  }
}
