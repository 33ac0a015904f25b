import Big from 'big.js';
import { z } from 'zod';
import { env, type EnvSource } from '@zone-alerts/shared-utils';
import { AlertConfigError } from '../errors.js';
import { ALERT_SEVERITIES, type AlertSeverity, type ThresholdSet } from '../types/alert.js';

export const DEFAULT_PRICE_ENDPOINT = 'https://api.binance.com/api/v3/ticker/price';
export const DEFAULT_HEATMAP_ENDPOINT = 'http://localhost:8000/liquidations/heatmap-timeseries';

export type DiscordChannelConfig = {
  webhookUrl: string;
  severityFilter: AlertSeverity[];
};

export type TelegramChannelConfig = {
  botToken: string;
  chatId: string;
  severityFilter: AlertSeverity[];
};

export type EmailChannelConfig = {
  smtpHost: string;
  smtpPort: number;
  username: string | undefined;
  password: string | undefined;
  useTls: boolean;
  sender: string;
  recipients: string[];
  severityFilter: AlertSeverity[];
};

export type AlertConfig = {
  enabled: boolean;
  symbol: string;
  sources: {
    priceEndpoint: string;
    heatmapEndpoint: string;
    priceTimeoutMs: number;
    zoneTimeoutMs: number;
  };
  thresholds: ThresholdSet;
  cooldown: {
    perZoneMinutes: number;
    maxDailyAlerts: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  dispatch: {
    timeoutMs: number;
    channelTimeoutMs: number;
  };
  /** 비활성 채널은 null */
  channels: {
    discord: DiscordChannelConfig | null;
    telegram: TelegramChannelConfig | null;
    email: EmailChannelConfig | null;
  };
  history: {
    enabled: boolean;
    retentionDays: number;
  };
  loop: {
    enabled: boolean;
    intervalSec: number;
  };
};

const ENV_KEYS = [
  'ALERTS_ENABLED',
  'ALERT_SYMBOL',
  'PRICE_ENDPOINT',
  'HEATMAP_ENDPOINT',
  'PRICE_FETCH_TIMEOUT_MS',
  'ZONE_FETCH_TIMEOUT_MS',
  'ALERT_CRITICAL_DISTANCE_PCT',
  'ALERT_CRITICAL_MIN_DENSITY',
  'ALERT_WARNING_DISTANCE_PCT',
  'ALERT_WARNING_MIN_DENSITY',
  'ALERT_INFO_DISTANCE_PCT',
  'ALERT_INFO_MIN_DENSITY',
  'ALERT_COOLDOWN_MIN',
  'ALERT_MAX_DAILY',
  'COOLDOWN_MAX_RETRIES',
  'COOLDOWN_RETRY_DELAY_MS',
  'DISPATCH_TIMEOUT_MS',
  'CHANNEL_TIMEOUT_MS',
  'DISCORD_ENABLED',
  'DISCORD_WEBHOOK_URL',
  'DISCORD_SEVERITY_FILTER',
  'TELEGRAM_ENABLED',
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
  'TELEGRAM_SEVERITY_FILTER',
  'EMAIL_ENABLED',
  'SMTP_HOST',
  'SMTP_PORT',
  'SMTP_USER',
  'SMTP_PASSWORD',
  'SMTP_USE_TLS',
  'EMAIL_FROM',
  'EMAIL_RECIPIENTS',
  'EMAIL_SEVERITY_FILTER',
  'HISTORY_ENABLED',
  'HISTORY_RETENTION_DAYS',
  'LOOP_MODE',
  'LOOP_INTERVAL_SEC',
] as const;

const bool = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? defaultValue : v.toLowerCase() === 'true' || v === '1'));

const num = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? defaultValue : Number(v)));

const positiveInt = (defaultValue: number, min = 1) => num(defaultValue).pipe(z.number().int().min(min));

const decimal = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      try {
        return new Big(v ?? defaultValue);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: ${v}` });
        return z.NEVER;
      }
    });

const list = () =>
  z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0),
    );

const severityFilter = () =>
  z
    .string()
    .optional()
    .transform((v) =>
      (v ?? 'critical')
        .split(',')
        .map((token) => token.trim().toLowerCase())
        .filter((token) => token.length > 0),
    )
    .pipe(z.array(z.enum(ALERT_SEVERITIES)).min(1));

const rawSchema = z
  .object({
    ALERTS_ENABLED: bool(true),
    ALERT_SYMBOL: z
      .string()
      .default('BTCUSDT')
      .pipe(z.string().regex(/^[A-Z0-9]{6,12}$/, 'symbol must be 6-12 uppercase characters')),
    PRICE_ENDPOINT: z.string().default(DEFAULT_PRICE_ENDPOINT).pipe(z.string().url()),
    HEATMAP_ENDPOINT: z.string().default(DEFAULT_HEATMAP_ENDPOINT).pipe(z.string().url()),
    PRICE_FETCH_TIMEOUT_MS: positiveInt(10_000),
    ZONE_FETCH_TIMEOUT_MS: positiveInt(30_000),

    ALERT_CRITICAL_DISTANCE_PCT: decimal('1'),
    ALERT_CRITICAL_MIN_DENSITY: decimal('10000000'),
    ALERT_WARNING_DISTANCE_PCT: decimal('3'),
    ALERT_WARNING_MIN_DENSITY: decimal('5000000'),
    ALERT_INFO_DISTANCE_PCT: decimal('5'),
    ALERT_INFO_MIN_DENSITY: decimal('1000000'),

    ALERT_COOLDOWN_MIN: positiveInt(60),
    ALERT_MAX_DAILY: positiveInt(10),
    COOLDOWN_MAX_RETRIES: positiveInt(3),
    COOLDOWN_RETRY_DELAY_MS: positiveInt(100, 0),
    DISPATCH_TIMEOUT_MS: positiveInt(30_000),
    CHANNEL_TIMEOUT_MS: positiveInt(10_000),

    DISCORD_ENABLED: bool(false),
    DISCORD_WEBHOOK_URL: z.string().url().optional(),
    DISCORD_SEVERITY_FILTER: severityFilter(),

    TELEGRAM_ENABLED: bool(false),
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    TELEGRAM_CHAT_ID: z.string().optional(),
    TELEGRAM_SEVERITY_FILTER: severityFilter(),

    EMAIL_ENABLED: bool(false),
    SMTP_HOST: z.string().optional(),
    SMTP_PORT: positiveInt(587).pipe(z.number().max(65_535)),
    SMTP_USER: z.string().optional(),
    SMTP_PASSWORD: z.string().optional(),
    SMTP_USE_TLS: bool(true),
    EMAIL_FROM: z.string().email().optional(),
    EMAIL_RECIPIENTS: list().pipe(z.array(z.string().email())),
    EMAIL_SEVERITY_FILTER: severityFilter(),

    HISTORY_ENABLED: bool(true),
    HISTORY_RETENTION_DAYS: positiveInt(90),
    LOOP_MODE: bool(true),
    LOOP_INTERVAL_SEC: positiveInt(60),
  })
  .superRefine((raw, ctx) => {
    const tiers = [
      ['ALERT_CRITICAL_DISTANCE_PCT', raw.ALERT_CRITICAL_DISTANCE_PCT],
      ['ALERT_WARNING_DISTANCE_PCT', raw.ALERT_WARNING_DISTANCE_PCT],
      ['ALERT_INFO_DISTANCE_PCT', raw.ALERT_INFO_DISTANCE_PCT],
    ] as const;

    for (const [key, value] of tiers) {
      if (value.lte(0) || value.gt(100)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'must be in (0, 100]' });
      }
    }
    for (let i = 1; i < tiers.length; i++) {
      const [prevKey, prev] = tiers[i - 1];
      const [key, value] = tiers[i];
      if (!value.gt(prev)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `must be greater than ${prevKey} (${prev.toString()})`,
        });
      }
    }

    const densities = [
      ['ALERT_CRITICAL_MIN_DENSITY', raw.ALERT_CRITICAL_MIN_DENSITY],
      ['ALERT_WARNING_MIN_DENSITY', raw.ALERT_WARNING_MIN_DENSITY],
      ['ALERT_INFO_MIN_DENSITY', raw.ALERT_INFO_MIN_DENSITY],
    ] as const;
    for (const [key, value] of densities) {
      if (value.lt(0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'must be >= 0' });
      }
    }

    if (!raw.ALERTS_ENABLED) return;

    if (!raw.DISCORD_ENABLED && !raw.TELEGRAM_ENABLED && !raw.EMAIL_ENABLED) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['channels'],
        message: 'at least one channel must be enabled',
      });
    }

    const required = (enabled: boolean, key: string, value: string | undefined) => {
      if (enabled && !value) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'required when channel is enabled' });
      }
    };

    required(raw.DISCORD_ENABLED, 'DISCORD_WEBHOOK_URL', raw.DISCORD_WEBHOOK_URL);
    required(raw.TELEGRAM_ENABLED, 'TELEGRAM_BOT_TOKEN', raw.TELEGRAM_BOT_TOKEN);
    required(raw.TELEGRAM_ENABLED, 'TELEGRAM_CHAT_ID', raw.TELEGRAM_CHAT_ID);
    required(raw.EMAIL_ENABLED, 'SMTP_HOST', raw.SMTP_HOST);
    if (raw.EMAIL_ENABLED && raw.EMAIL_RECIPIENTS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMAIL_RECIPIENTS'],
        message: 'at least one recipient is required when channel is enabled',
      });
    }
  });

type RawAlertConfig = z.output<typeof rawSchema>;

function toAlertConfig(raw: RawAlertConfig): AlertConfig {
  const {
    DISCORD_WEBHOOK_URL: webhookUrl,
    TELEGRAM_BOT_TOKEN: botToken,
    TELEGRAM_CHAT_ID: chatId,
    SMTP_HOST: smtpHost,
  } = raw;

  return {
    enabled: raw.ALERTS_ENABLED,
    symbol: raw.ALERT_SYMBOL,
    sources: {
      priceEndpoint: raw.PRICE_ENDPOINT,
      heatmapEndpoint: raw.HEATMAP_ENDPOINT,
      priceTimeoutMs: raw.PRICE_FETCH_TIMEOUT_MS,
      zoneTimeoutMs: raw.ZONE_FETCH_TIMEOUT_MS,
    },
    thresholds: {
      critical: { distancePct: raw.ALERT_CRITICAL_DISTANCE_PCT, minDensity: raw.ALERT_CRITICAL_MIN_DENSITY },
      warning: { distancePct: raw.ALERT_WARNING_DISTANCE_PCT, minDensity: raw.ALERT_WARNING_MIN_DENSITY },
      info: { distancePct: raw.ALERT_INFO_DISTANCE_PCT, minDensity: raw.ALERT_INFO_MIN_DENSITY },
    },
    cooldown: {
      perZoneMinutes: raw.ALERT_COOLDOWN_MIN,
      maxDailyAlerts: raw.ALERT_MAX_DAILY,
      maxRetries: raw.COOLDOWN_MAX_RETRIES,
      retryDelayMs: raw.COOLDOWN_RETRY_DELAY_MS,
    },
    dispatch: {
      timeoutMs: raw.DISPATCH_TIMEOUT_MS,
      channelTimeoutMs: raw.CHANNEL_TIMEOUT_MS,
    },
    channels: {
      discord:
        raw.DISCORD_ENABLED && webhookUrl
          ? { webhookUrl, severityFilter: raw.DISCORD_SEVERITY_FILTER }
          : null,
      telegram:
        raw.TELEGRAM_ENABLED && botToken && chatId
          ? { botToken, chatId, severityFilter: raw.TELEGRAM_SEVERITY_FILTER }
          : null,
      email:
        raw.EMAIL_ENABLED && smtpHost && raw.EMAIL_RECIPIENTS.length > 0
          ? {
              smtpHost,
              smtpPort: raw.SMTP_PORT,
              username: raw.SMTP_USER,
              password: raw.SMTP_PASSWORD,
              useTls: raw.SMTP_USE_TLS,
              sender: raw.EMAIL_FROM ?? raw.EMAIL_RECIPIENTS[0],
              recipients: raw.EMAIL_RECIPIENTS,
              severityFilter: raw.EMAIL_SEVERITY_FILTER,
            }
          : null,
    },
    history: {
      enabled: raw.HISTORY_ENABLED,
      retentionDays: raw.HISTORY_RETENTION_DAYS,
    },
    loop: {
      enabled: raw.LOOP_MODE,
      intervalSec: raw.LOOP_INTERVAL_SEC,
    },
  };
}

/**
 * 환경 변수 → AlertConfig. 위반 사항을 모두 모아 AlertConfigError 하나로 던진다.
 * ALERTS_ENABLED=false면 채널 관련 검증은 건너뛴다.
 */
export function parseAlertConfig(source: EnvSource = process.env): AlertConfig {
  const input: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};
  for (const key of ENV_KEYS) {
    const value = env(key, source);
    if (value !== undefined) input[key] = value;
  }

  const parsed = rawSchema.safeParse(input);
  if (!parsed.success) {
    throw new AlertConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  return toAlertConfig(parsed.data);
}
