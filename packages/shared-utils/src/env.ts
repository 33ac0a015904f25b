export type EnvSource = Record<string, string | undefined>;

export function env(key: string, source: EnvSource = process.env): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function requireEnv(key: string, source: EnvSource = process.env): string {
  const value = env(key, source);
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export function envNumber(
  key: string,
  defaultValue?: number,
  source: EnvSource = process.env,
): number | undefined {
  const value = env(key, source);
  if (!value) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

export function envBoolean(key: string, defaultValue = false, source: EnvSource = process.env): boolean {
  const value = env(key, source);
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function envList(key: string, source: EnvSource = process.env): string[] | undefined {
  const value = env(key, source);
  if (!value) return undefined;
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}
