import type { Logger } from '@zone-alerts/shared-utils';
import type { AlertConfig } from '../config/alertConfig.js';
import type { AlertSeverity } from '../types/alert.js';
import { DiscordChannel } from './discord.js';
import { EmailChannel } from './email.js';
import { TelegramChannel } from './telegram.js';
import type { NotificationChannel } from './types.js';

export type BuiltChannels = {
  channels: NotificationChannel[];
  severityFilters: Record<string, AlertSeverity[]>;
};

/**
 * 설정에서 활성 채널만 생성. 필터는 채널 이름 기준.
 */
export function buildChannels(config: AlertConfig, logger?: Logger): BuiltChannels {
  const channels: NotificationChannel[] = [];
  const severityFilters: Record<string, AlertSeverity[]> = {};
  const timeoutMs = config.dispatch.channelTimeoutMs;
  const { discord, telegram, email } = config.channels;

  if (discord) {
    const channel = new DiscordChannel({ webhookUrl: discord.webhookUrl, timeoutMs, logger });
    channels.push(channel);
    severityFilters[channel.name] = discord.severityFilter;
  }

  if (telegram) {
    const channel = new TelegramChannel({
      botToken: telegram.botToken,
      chatId: telegram.chatId,
      timeoutMs,
      logger,
    });
    channels.push(channel);
    severityFilters[channel.name] = telegram.severityFilter;
  }

  if (email) {
    const channel = new EmailChannel({
      smtpHost: email.smtpHost,
      smtpPort: email.smtpPort,
      recipients: email.recipients,
      sender: email.sender,
      username: email.username,
      password: email.password,
      useTls: email.useTls,
      timeoutMs,
      logger,
    });
    channels.push(channel);
    severityFilters[channel.name] = email.severityFilter;
  }

  return { channels, severityFilters };
}
