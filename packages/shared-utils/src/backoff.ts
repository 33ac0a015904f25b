/**
 * signal이 abort되면 타이머를 취소하고 즉시 resolve.
 * 정상 만료 시에는 abort 리스너를 떼어낸다.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 지수 백오프 + jitter
 */
export function createBackoff(opts?: { baseMs?: number; maxMs?: number; random?: () => number }) {
  const baseMs = opts?.baseMs ?? 1000;
  const maxMs = opts?.maxMs ?? 30000;
  const random = opts?.random ?? Math.random;

  let attempt = 0;

  function reset() {
    attempt = 0;
  }

  function nextDelayMs(): number {
    // base * 2^attempt (최대 maxMs)
    const exp = Math.min(maxMs, baseMs * Math.pow(2, attempt));
    attempt = Math.min(attempt + 1, 20);

    // jitter: 70%~130%
    const jitter = exp * (0.7 + random() * 0.6);
    return Math.floor(jitter);
  }

  return { reset, nextDelayMs };
}

export type Backoff = ReturnType<typeof createBackoff>;
