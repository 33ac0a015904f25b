import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import { formatDiscordEmbed } from '../alert/formatMessage.js';
import type { Alert, ChannelResult } from '../types/alert.js';
import { requestJson } from './http.js';
import { channelFailure, channelSuccess, type NotificationChannel } from './types.js';

export type DiscordChannelOptions = {
  webhookUrl: string;
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * Discord 웹훅. 2xx면 성공.
 */
export class DiscordChannel implements NotificationChannel {
  readonly name = 'discord';
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: DiscordChannelOptions) {
    this.webhookUrl = opts.webhookUrl;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.logger = opts.logger ?? createLogger('channel-discord');
  }

  async send(alert: Alert, signal?: AbortSignal): Promise<ChannelResult> {
    try {
      const res = await requestJson(this.webhookUrl, {
        method: 'POST',
        body: { embeds: [formatDiscordEmbed(alert)] },
        timeoutMs: this.timeoutMs,
        signal,
      });

      if (!res.ok) {
        const message = `Discord HTTP error: ${res.status} ${res.text}`.trim();
        this.logger.error(message);
        return channelFailure(this.name, message, { status: res.status });
      }

      this.logger.info('디스코드 알림 전송 완료', { severity: alert.severity });
      return channelSuccess(this.name, { status: res.status });
    } catch (error: unknown) {
      const message = `Discord error: ${formatUnknownError(error)}`;
      this.logger.error(message);
      return channelFailure(this.name, message);
    }
  }

  async testConnection(): Promise<ChannelResult> {
    try {
      // 웹훅 URL에 GET하면 웹훅 정보가 돌아온다
      const res = await requestJson(this.webhookUrl, { method: 'GET', timeoutMs: this.timeoutMs });
      if (res.status === 200) return channelSuccess(this.name);
      return channelFailure(this.name, `Discord webhook returned HTTP ${res.status}`);
    } catch (error: unknown) {
      this.logger.warn('디스코드 연결 테스트 실패', { error: formatUnknownError(error) });
      return channelFailure(this.name, formatUnknownError(error));
    }
  }
}
