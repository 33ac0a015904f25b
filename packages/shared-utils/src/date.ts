import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('failed to format current time as ISO');
  return iso;
}

export function normalizeUtcIso(utcLike: string): string {
  if (utcLike.endsWith('Z')) return utcLike;
  if (/[+-]\d{2}:\d{2}$/.test(utcLike)) return utcLike;
  return `${utcLike}Z`;
}

export function toIsoString(value: string | DateTime): string {
  const dt = typeof value === 'string' ? DateTime.fromISO(value, { setZone: true }) : value;

  if (!dt.isValid) throw new Error(`invalid ISO timestamp: ${String(value)}`);

  const iso = dt.toUTC().toISO();
  if (!iso) throw new Error(`invalid ISO timestamp: ${String(value)}`);
  return iso;
}

/**
 * ISO 문자열을 UTC DateTime으로 파싱한다. 오프셋이 없으면 UTC로 간주.
 */
export function parseUtc(value: string): DateTime {
  const dt = DateTime.fromISO(normalizeUtcIso(value), { setZone: true }).toUTC();
  if (!dt.isValid) throw new Error(`invalid ISO timestamp: ${value}`);
  return dt;
}

/**
 * UTC 달력 날짜 (yyyy-MM-dd)
 */
export function utcDateString(value: DateTime = DateTime.utc()): string {
  return value.toUTC().toFormat('yyyy-MM-dd');
}
