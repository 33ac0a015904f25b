import type Big from 'big.js';
import { SEVERITY_EMOJI, type Alert, type AlertSeverity } from '../types/alert.js';

const SEVERITY_COLORS: Record<AlertSeverity, number> = {
  critical: 0xff0000,
  warning: 0xffa500,
  info: 0x00bfff,
};

const SEVERITY_HTML_COLORS: Record<AlertSeverity, string> = {
  critical: '#FF0000',
  warning: '#FFA500',
  info: '#00BFFF',
};

export type DiscordEmbedField = {
  name: string;
  value: string;
  inline: boolean;
};

export type DiscordEmbed = {
  title: string;
  color: number;
  fields: DiscordEmbedField[];
  description?: string;
};

function withThousands(fixed: string): string {
  const [intPart = '0', fracPart] = fixed.split('.');
  const sign = intPart.startsWith('-') ? '-' : '';
  const digits = sign ? intPart.slice(1) : intPart;
  const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fracPart === undefined ? `${sign}${grouped}` : `${sign}${grouped}.${fracPart}`;
}

export function formatUsd(value: Big): string {
  return `$${withThousands(value.toFixed(2))}`;
}

export function formatDensityMillions(value: Big): string {
  return `$${value.div(1_000_000).toFixed(1)}M`;
}

export function formatPct(value: Big): string {
  return `${value.toFixed(2)}%`;
}

function sideEmoji(side: Alert['zoneSide']): string {
  return side === 'long' ? '📈' : '📉';
}

function symbolOf(alert: Alert): string {
  return alert.symbol || 'BTC';
}

/**
 * 값이 0인 항목은 출력하지 않는다.
 */
function describeAlert(alert: Alert): Array<{ label: string; value: string; plain: string }> {
  const rows: Array<{ label: string; value: string; plain: string }> = [];

  if (!alert.currentPrice.eq(0)) {
    const value = formatUsd(alert.currentPrice);
    rows.push({ label: 'Current Price', value, plain: value });
  }
  if (!alert.zonePrice.eq(0)) {
    const value = formatUsd(alert.zonePrice);
    rows.push({ label: 'Zone Price', value, plain: value });
  }

  const distance = formatPct(alert.distancePct);
  rows.push({ label: 'Distance', value: distance, plain: distance });

  if (!alert.zoneDensity.eq(0)) {
    const value = formatDensityMillions(alert.zoneDensity);
    rows.push({ label: 'Zone Density', value, plain: value });
  }

  rows.push({
    label: 'Zone Side',
    value: `${sideEmoji(alert.zoneSide)} ${alert.zoneSide.toUpperCase()}`,
    plain: alert.zoneSide.toUpperCase(),
  });

  return rows;
}

export function formatDiscordEmbed(alert: Alert): DiscordEmbed {
  const embed: DiscordEmbed = {
    title: `${SEVERITY_EMOJI[alert.severity]} ${alert.severity.toUpperCase()} Alert: ${symbolOf(alert)}`,
    color: SEVERITY_COLORS[alert.severity],
    fields: describeAlert(alert).map((row) => ({ name: row.label, value: row.value, inline: true })),
  };

  if (alert.message) {
    embed.description = alert.message;
  }

  return embed;
}

export function formatTelegramMessage(alert: Alert): string {
  const lines = [
    `${SEVERITY_EMOJI[alert.severity]} *${alert.severity.toUpperCase()} Alert*`,
    `*Symbol:* ${symbolOf(alert)}`,
    ...describeAlert(alert).map((row) => `*${row.label}:* ${row.value}`),
  ];

  if (alert.message) {
    lines.push(`\n${alert.message}`);
  }

  return lines.join('\n');
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * multipart/alternative 메일 본문. text는 HTML을 못 읽는 클라이언트용.
 */
export function formatEmailHtml(alert: Alert): { subject: string; html: string; text: string } {
  const severity = alert.severity.toUpperCase();
  const subject = `[${severity}] Liquidation Alert: ${symbolOf(alert)}`;

  const described = describeAlert(alert);
  const rows = described
    .map((row) => `<tr><td><strong>${row.label}</strong></td><td>${escapeHtml(row.plain)}</td></tr>`)
    .join('\n');

  const message = alert.message ? `<p>${escapeHtml(alert.message)}</p>\n` : '';

  const html = `<html>
<body>
<h2 style="color: ${SEVERITY_HTML_COLORS[alert.severity]};">${severity} Liquidation Alert</h2>
<table border="1" cellpadding="8" cellspacing="0">
${rows}
</table>
${message}</body>
</html>`;

  const text = [
    `${severity} Liquidation Alert`,
    `Symbol: ${symbolOf(alert)}`,
    ...described.map((row) => `${row.label}: ${row.plain}`),
    ...(alert.message ? ['', alert.message] : []),
  ].join('\n');

  return { subject, html, text };
}
