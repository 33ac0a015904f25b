import {
  createBackoff,
  createLogger,
  formatUnknownError,
  sleep as defaultSleep,
  type Backoff,
  type Logger,
} from '@zone-alerts/shared-utils';
import type { AlertMonitor, CycleSummary } from './alertMonitor.js';

export type RunLoopOptions = {
  monitor: Pick<AlertMonitor, 'runCycle' | 'cleanupHistoryIfDue'>;
  intervalMs: number;
  shouldStop: () => boolean;
  backoff?: Backoff;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

/**
 * shouldStop()이 true가 될 때까지 사이클을 반복한다.
 * 사이클이 실패하면 백오프 지연 후 다시 시도하고, 성공하면 백오프를 초기화한다.
 * 반환값은 실행한 사이클 수.
 */
export async function runLoop(opts: RunLoopOptions): Promise<number> {
  const backoff = opts.backoff ?? createBackoff({ baseMs: 5_000, maxMs: 300_000 });
  const sleep = opts.sleep ?? defaultSleep;
  const logger = opts.logger ?? createLogger('alert-loop');
  let cycles = 0;

  while (!opts.shouldStop()) {
    let delayMs = opts.intervalMs;

    try {
      const summary: CycleSummary = await opts.monitor.runCycle();
      cycles += 1;
      backoff.reset();

      if (summary.status === 'completed') {
        await opts.monitor.cleanupHistoryIfDue();
      }
    } catch (error: unknown) {
      cycles += 1;
      delayMs = Math.max(opts.intervalMs, backoff.nextDelayMs());
      logger.error('알림 사이클 실패', { error: formatUnknownError(error), retryInMs: delayMs });
    }

    if (opts.shouldStop()) break;
    await sleep(delayMs);
  }

  logger.info('알림 루프 종료', { cycles });
  return cycles;
}
