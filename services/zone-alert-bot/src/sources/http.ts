/**
 * 쿼리에 symbol이 없으면 붙인다.
 */
export function withSymbol(endpoint: string, symbol: string): string {
  if (endpoint.includes('symbol=')) return endpoint;
  const separator = endpoint.includes('?') ? '&' : '?';
  return `${endpoint}${separator}symbol=${encodeURIComponent(symbol)}`;
}

export async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const res = await fetch(url, {
    headers: { accept: 'application/json' },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new Error(`HTTP ${res.status} ${res.statusText} ${text}`.trim());
  }

  return res.json();
}
