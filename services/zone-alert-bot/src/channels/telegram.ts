import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import { formatTelegramMessage } from '../alert/formatMessage.js';
import type { Alert, ChannelResult } from '../types/alert.js';
import { isRecord, requestJson } from './http.js';
import { channelFailure, channelSuccess, type NotificationChannel } from './types.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

export type TelegramChannelOptions = {
  botToken: string;
  chatId: string;
  timeoutMs?: number;
  apiBase?: string;
  logger?: Logger;
};

function describeTelegramError(body: unknown): string {
  if (isRecord(body) && typeof body.description === 'string') return body.description;
  return 'unknown Telegram error';
}

/**
 * Telegram Bot API sendMessage. 응답 body의 ok가 true여야 성공.
 */
export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly timeoutMs: number;
  private readonly apiBase: string;
  private readonly logger: Logger;

  constructor(opts: TelegramChannelOptions) {
    this.botToken = opts.botToken;
    this.chatId = opts.chatId;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.apiBase = opts.apiBase ?? TELEGRAM_API_BASE;
    this.logger = opts.logger ?? createLogger('channel-telegram');
  }

  private methodUrl(method: string): string {
    return `${this.apiBase}/bot${this.botToken}/${method}`;
  }

  async send(alert: Alert, signal?: AbortSignal): Promise<ChannelResult> {
    try {
      const res = await requestJson(this.methodUrl('sendMessage'), {
        method: 'POST',
        body: {
          chat_id: this.chatId,
          text: formatTelegramMessage(alert),
          parse_mode: 'Markdown',
        },
        timeoutMs: this.timeoutMs,
        signal,
      });

      if (!isRecord(res.body) || res.body.ok !== true) {
        const description = describeTelegramError(res.body);
        const message = res.ok
          ? `Telegram API error: ${description}`
          : `Telegram HTTP error: ${res.status} ${description}`;
        this.logger.error(message);
        return channelFailure(this.name, message, { status: res.status });
      }

      this.logger.info('텔레그램 알림 전송 완료', { severity: alert.severity });
      return channelSuccess(this.name, { status: res.status });
    } catch (error: unknown) {
      const message = `Telegram error: ${formatUnknownError(error)}`;
      this.logger.error(message);
      return channelFailure(this.name, message);
    }
  }

  async testConnection(): Promise<ChannelResult> {
    try {
      const res = await requestJson(this.methodUrl('getMe'), {
        method: 'GET',
        timeoutMs: this.timeoutMs,
      });

      if (isRecord(res.body) && res.body.ok === true) return channelSuccess(this.name);
      return channelFailure(this.name, describeTelegramError(res.body));
    } catch (error: unknown) {
      this.logger.warn('텔레그램 연결 테스트 실패', { error: formatUnknownError(error) });
      return channelFailure(this.name, formatUnknownError(error));
    }
  }
}
