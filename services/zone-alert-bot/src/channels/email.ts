import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import { formatEmailHtml } from '../alert/formatMessage.js';
import type { Alert, ChannelResult } from '../types/alert.js';
import { channelFailure, channelSuccess, type NotificationChannel } from './types.js';

export type MailTransport = Pick<Transporter, 'sendMail' | 'verify'>;

export type EmailChannelOptions = {
  smtpHost: string;
  smtpPort: number;
  recipients: string[];
  sender?: string;
  username?: string;
  password?: string;
  useTls?: boolean;
  timeoutMs?: number;
  logger?: Logger;
  /** 테스트에서 주입 */
  transporter?: MailTransport;
};

/**
 * SMTP 메일. nodemailer가 소켓 I/O를 비동기로 처리하므로 이벤트 루프를 막지 않는다.
 */
export class EmailChannel implements NotificationChannel {
  readonly name = 'email';
  private readonly recipients: string[];
  private readonly sender: string;
  private readonly transporter: MailTransport;
  private readonly logger: Logger;

  constructor(opts: EmailChannelOptions) {
    this.recipients = opts.recipients;
    this.sender = opts.sender ?? opts.recipients[0] ?? 'alerts@example.com';
    this.logger = opts.logger ?? createLogger('channel-email');

    const timeoutMs = opts.timeoutMs ?? 10_000;
    const useTls = opts.useTls ?? true;
    this.transporter =
      opts.transporter ??
      nodemailer.createTransport({
        host: opts.smtpHost,
        port: opts.smtpPort,
        secure: false,
        requireTLS: useTls,
        ignoreTLS: !useTls,
        auth: opts.username && opts.password ? { user: opts.username, pass: opts.password } : undefined,
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs,
      });
  }

  async send(alert: Alert, signal?: AbortSignal): Promise<ChannelResult> {
    if (signal?.aborted) {
      return channelFailure(this.name, 'Email error: send aborted before start');
    }

    try {
      const { subject, html, text } = formatEmailHtml(alert);
      const info = await this.transporter.sendMail({
        from: this.sender,
        to: this.recipients.join(', '),
        subject,
        text,
        html,
      });

      this.logger.info('메일 알림 전송 완료', { recipients: this.recipients.length });
      return channelSuccess(this.name, { messageId: info.messageId });
    } catch (error: unknown) {
      const message = `SMTP error: ${formatUnknownError(error)}`;
      this.logger.error(message);
      return channelFailure(this.name, message);
    }
  }

  async testConnection(): Promise<ChannelResult> {
    try {
      await this.transporter.verify();
      return channelSuccess(this.name);
    } catch (error: unknown) {
      this.logger.warn('메일 연결 테스트 실패', { error: formatUnknownError(error) });
      return channelFailure(this.name, formatUnknownError(error));
    }
  }
}
