import { createSupabase } from '@zone-alerts/db-client';
import { createLogger, formatUnknownError, sleep } from '@zone-alerts/shared-utils';
import { formatPct, formatUsd } from './alert/formatMessage.js';
import { createAlertService, type AlertService } from './app.js';
import { loadAlertConfig, loadSupabaseConfig } from './config/env.js';
import { runLoop } from './monitor/runLoop.js';

const logger = createLogger('zone-alert-bot');

function parseRecentLimit(args: string[]): number {
  const idx = args.indexOf('--recent');
  const raw = args[idx + 1];
  const n = raw === undefined ? NaN : Number(raw);
  return Number.isInteger(n) && n > 0 ? n : 10;
}

async function testChannels(service: AlertService): Promise<boolean> {
  let allOk = true;
  for (const channel of service.channels) {
    const result = await channel.testConnection();
    if (result.success) {
      console.log(`[ALERT] ${channel.name}: OK`);
    } else {
      allOk = false;
      console.log(`[ALERT] ${channel.name}: FAILED (${result.errorMessage})`);
    }
  }
  return allOk;
}

async function printRecent(service: AlertService, limit: number) {
  if (!service.history) {
    console.log('[ALERT] HISTORY_ENABLED=false → 히스토리 없음');
    return;
  }

  const alerts = await service.history.getRecentAlerts(limit);
  if (alerts.length === 0) {
    console.log('[ALERT] 저장된 알림 없음');
    return;
  }

  for (const a of alerts) {
    console.log(
      [
        a.timestamp,
        a.severity.toUpperCase(),
        a.symbol,
        `zone=${formatUsd(a.zonePrice)}`,
        `dist=${formatPct(a.distancePct)}`,
        `status=${a.deliveryStatus}`,
        `channels=${a.channelsSent.join(',') || '-'}`,
      ].join(' '),
    );
  }
}

async function main() {
  const args = process.argv.slice(2);
  const config = loadAlertConfig();

  if (!config.enabled) {
    logger.info('ALERTS_ENABLED=false → 종료');
    return;
  }

  const supabase = createSupabase(loadSupabaseConfig());
  const service = createAlertService(config, supabase);

  if (args.includes('--test-channels')) {
    const ok = await testChannels(service);
    process.exitCode = ok ? 0 : 1;
    return;
  }

  if (args.includes('--cleanup-history')) {
    const deleted = service.history ? await service.history.cleanupOldAlerts() : 0;
    console.log(`[ALERT] 히스토리 정리: ${deleted}건 삭제`);
    return;
  }

  if (args.includes('--recent')) {
    await printRecent(service, parseRecentLimit(args));
    return;
  }

  if (args.includes('--once') || !config.loop.enabled) {
    const summary = await service.monitor.runCycle();
    logger.info('단일 사이클 완료', { status: summary.status });
    return;
  }

  const stop = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('종료 신호 수신, 현재 사이클 후 종료', { signal });
    stop.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  logger.info('알림 루프 시작', { symbol: config.symbol, intervalSec: config.loop.intervalSec });
  await runLoop({
    monitor: service.monitor,
    intervalMs: config.loop.intervalSec * 1000,
    shouldStop: () => stop.signal.aborted,
    sleep: (ms) => sleep(ms, stop.signal),
    logger,
  });
}

main().catch((error: unknown) => {
  logger.error(`치명적 오류: ${formatUnknownError(error)}`);
  process.exitCode = 1;
});
