import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import type { NotificationChannel } from '../channels/types.js';
import type {
  Alert,
  AlertSeverity,
  ChannelResult,
  DispatchResult,
  DispatchStatus,
} from '../types/alert.js';

export type AlertDispatcherOptions = {
  channels: NotificationChannel[];
  /** 채널별 전송 제한 시간 */
  timeoutMs: number;
  /** 항목이 없는 채널은 모든 심각도를 받는다 */
  severityFilters?: Record<string, AlertSeverity[]>;
  logger?: Logger;
};

function describeFailures(results: ChannelResult[]): string {
  return results
    .map((r) => (r.success ? r.channelName : `${r.channelName} (${r.errorMessage})`))
    .join(', ');
}

/**
 * ChannelResult 집합 → DispatchResult. 채널 순서와 무관하다.
 */
export function aggregateResults(results: ChannelResult[]): DispatchResult {
  const sent = results.filter((r) => r.success);
  const failed = results.filter((r) => !r.success);

  let deliveryStatus: DispatchStatus;
  let errorMessage: string | null = null;

  if (failed.length === 0) {
    deliveryStatus = 'success';
  } else if (sent.length === 0) {
    deliveryStatus = 'failed';
    errorMessage = `All channels failed: ${describeFailures(failed)}`;
  } else {
    deliveryStatus = 'partial';
    errorMessage = `Failed channels: ${describeFailures(failed)}`;
  }

  return {
    deliveryStatus,
    channelsSent: sent.map((r) => r.channelName),
    channelsFailed: failed.map((r) => r.channelName),
    errorMessage,
    results,
  };
}

export function applyDispatchResult(alert: Alert, result: DispatchResult): Alert {
  return {
    ...alert,
    channelsSent: [...result.channelsSent],
    deliveryStatus: result.deliveryStatus,
    errorMessage: result.errorMessage,
  };
}

export class AlertDispatcher {
  private readonly channels: NotificationChannel[];
  private readonly timeoutMs: number;
  private readonly severityFilters: Record<string, AlertSeverity[]>;
  private readonly logger: Logger;

  constructor(opts: AlertDispatcherOptions) {
    this.channels = opts.channels;
    this.timeoutMs = opts.timeoutMs;
    this.severityFilters = opts.severityFilters ?? {};
    this.logger = opts.logger ?? createLogger('alert-dispatcher');
  }

  channelsFor(severity: AlertSeverity): NotificationChannel[] {
    return this.channels.filter((channel) => {
      const allowed = this.severityFilters[channel.name];
      return allowed === undefined || allowed.includes(severity);
    });
  }

  /**
   * 대상 채널에 동시에 전송. 채널 하나의 실패/타임아웃/예외는 다른 채널에 영향을 주지 않으며
   * 이 메서드는 throw하지 않는다.
   */
  async dispatch(alert: Alert): Promise<DispatchResult> {
    const targets = this.channelsFor(alert.severity);

    if (targets.length === 0) {
      this.logger.debug('심각도 필터로 대상 채널 없음', { severity: alert.severity });
      return aggregateResults([]);
    }

    const results = await Promise.all(targets.map((channel) => this.sendWithTimeout(channel, alert)));
    const result = aggregateResults(results);

    const data = {
      severity: alert.severity,
      status: result.deliveryStatus,
      sent: result.channelsSent,
      failed: result.channelsFailed,
    };
    if (result.deliveryStatus === 'success') {
      this.logger.info('알림 전송 완료', data);
    } else {
      this.logger.warn('알림 전송 일부/전체 실패', { ...data, error: result.errorMessage });
    }

    return result;
  }

  private async sendWithTimeout(channel: NotificationChannel, alert: Alert): Promise<ChannelResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ChannelResult>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn('채널 전송 타임아웃', { channel: channel.name, timeoutMs: this.timeoutMs });
        resolve({
          success: false,
          channelName: channel.name,
          errorMessage: `Timeout after ${this.timeoutMs}ms`,
        });
        controller.abort(new Error(`dispatch timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    const send = (async (): Promise<ChannelResult> => {
      try {
        return await channel.send(alert, controller.signal);
      } catch (error: unknown) {
        this.logger.error('채널 전송 중 예외', { channel: channel.name, error: formatUnknownError(error) });
        return {
          success: false,
          channelName: channel.name,
          errorMessage: `Unexpected error: ${formatUnknownError(error)}`,
        };
      }
    })();

    try {
      return await Promise.race([send, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
