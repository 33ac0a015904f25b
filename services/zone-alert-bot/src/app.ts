import type { SupabaseClient } from '@zone-alerts/db-client';
import { createLogger } from '@zone-alerts/shared-utils';
import { buildChannels } from './channels/buildChannels.js';
import type { NotificationChannel } from './channels/types.js';
import type { AlertConfig } from './config/alertConfig.js';
import { CooldownManager } from './cooldown/cooldownManager.js';
import { SupabaseCooldownStore } from './cooldown/cooldownStore.js';
import { AlertDispatcher } from './dispatch/dispatcher.js';
import { AlertEvaluationEngine } from './engine/evaluationEngine.js';
import { SupabaseAlertHistoryStore, type AlertHistoryStore } from './history/historyStore.js';
import { AlertMonitor } from './monitor/alertMonitor.js';
import { HttpPriceSource } from './sources/priceSource.js';
import { HttpZoneSource } from './sources/zoneSource.js';

export type AlertService = {
  monitor: AlertMonitor;
  channels: NotificationChannel[];
  history: AlertHistoryStore | null;
};

/**
 * 프로세스 시작 시 한 번 호출. 모든 인스턴스를 여기서 만들고 참조로 넘긴다.
 */
export function createAlertService(config: AlertConfig, supabase: SupabaseClient): AlertService {
  const { channels, severityFilters } = buildChannels(config, createLogger('channels'));

  const engine = new AlertEvaluationEngine({
    priceSource: new HttpPriceSource(config.sources.priceEndpoint, config.sources.priceTimeoutMs),
    zoneSource: new HttpZoneSource(config.sources.heatmapEndpoint, config.sources.zoneTimeoutMs),
    thresholds: config.thresholds,
    symbol: config.symbol,
  });

  const cooldown = new CooldownManager({
    store: new SupabaseCooldownStore(supabase),
    cooldownMinutes: config.cooldown.perZoneMinutes,
    maxDailyAlerts: config.cooldown.maxDailyAlerts,
    maxRetries: config.cooldown.maxRetries,
    retryDelayMs: config.cooldown.retryDelayMs,
  });

  const dispatcher = new AlertDispatcher({
    channels,
    timeoutMs: config.dispatch.timeoutMs,
    severityFilters,
  });

  const history = config.history.enabled
    ? new SupabaseAlertHistoryStore(supabase, config.history.retentionDays)
    : null;

  const monitor = new AlertMonitor({ engine, cooldown, dispatcher, history });

  return { monitor, channels, history };
}
