import { DateTime } from 'luxon';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CooldownManager } from '../../cooldown/cooldownManager.js';
import { CooldownStorageError } from '../../errors.js';
import { silentLogger } from '../helpers/fixtures.js';
import { InMemoryCooldownStore } from '../helpers/inMemoryCooldownStore.js';

const START = DateTime.fromISO('2025-01-15T12:00:00Z', { zone: 'utc' });

describe('CooldownManager', () => {
  let store: InMemoryCooldownStore;
  let current: DateTime;
  let sleep: ReturnType<typeof vi.fn>;

  function makeManager(overrides?: { maxDailyAlerts?: number; maxRetries?: number }) {
    return new CooldownManager({
      store,
      cooldownMinutes: 60,
      maxDailyAlerts: overrides?.maxDailyAlerts ?? 10,
      maxRetries: overrides?.maxRetries ?? 3,
      retryDelayMs: 100,
      now: () => current,
      sleep: (ms: number) => sleep(ms),
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    store = new InMemoryCooldownStore();
    current = START;
    sleep = vi.fn().mockResolvedValue(undefined);
  });

  // ─── 존 쿨다운 ────────────────────────────────────────────────────────────

  it('기록이 없는 존은 쿨다운이 아니다', async () => {
    expect(await makeManager().isOnCooldown('94500_short')).toBe(false);
  });

  it('recordAlert 직후에는 쿨다운, cooldownMinutes가 지나면 해제된다', async () => {
    const manager = makeManager();
    await manager.recordAlert('94500_short');

    expect(await manager.isOnCooldown('94500_short')).toBe(true);

    current = START.plus({ minutes: 59 });
    expect(await manager.isOnCooldown('94500_short')).toBe(true);

    current = START.plus({ minutes: 60 });
    expect(await manager.isOnCooldown('94500_short')).toBe(false);
  });

  it('쿨다운은 존 키별로 독립적이다', async () => {
    const manager = makeManager();
    await manager.recordAlert('94500_short');

    expect(await manager.isOnCooldown('94000_long')).toBe(false);
  });

  it('recordAlert는 UTC 시각과 날짜를 저장한다', async () => {
    const manager = makeManager();
    await manager.recordAlert('94500_short');
    await manager.recordAlert('94500_short');

    expect(await manager.getCooldown('94500_short')).toEqual({
      zoneKey: '94500_short',
      lastAlertTime: '2025-01-15T12:00:00.000Z',
      alertCountToday: 2,
      lastResetDate: '2025-01-15',
    });
  });

  // ─── 일일 상한 ────────────────────────────────────────────────────────────

  it('max건 기록 후 canSendAlert는 false, UTC 날짜가 바뀌면 0으로 리셋된다', async () => {
    const manager = makeManager({ maxDailyAlerts: 3 });

    await manager.recordAlert('a');
    await manager.recordAlert('b');
    expect(await manager.canSendAlert()).toBe(true);

    await manager.recordAlert('c');
    expect(await manager.canSendAlert()).toBe(false);
    expect(await manager.getDailyCount()).toBe(3);

    current = DateTime.fromISO('2025-01-16T00:00:01Z', { zone: 'utc' });
    expect(await manager.canSendAlert()).toBe(true);
    expect(store.counter).toEqual({ count: 0, resetDate: '2025-01-16' });
  });

  it('카운터가 한 번도 기록되지 않았으면 오늘 날짜로 초기화한다', async () => {
    const manager = makeManager();

    expect(await manager.getDailyCount()).toBe(0);
    expect(store.counter).toEqual({ count: 0, resetDate: '2025-01-15' });
  });

  // ─── 재시도 ───────────────────────────────────────────────────────────────

  it('잠금 충돌은 고정 지연 후 재시도해서 성공한다', async () => {
    const manager = makeManager();
    store.failWithBusy('recordAlert', 2);

    await manager.recordAlert('94500_short');

    expect(store.calls.filter((c) => c === 'recordAlert')).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(100);
    expect(store.counter.count).toBe(1);
  });

  it('재시도를 모두 소진하면 CooldownStorageError', async () => {
    const manager = makeManager({ maxRetries: 3 });
    store.failWithBusy('recordAlert', 5);

    const promise = manager.recordAlert('94500_short');
    await expect(promise).rejects.toBeInstanceOf(CooldownStorageError);
    await expect(promise).rejects.toThrow('cooldown store recordAlert failed after 3 attempts');
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('잠금 충돌이 아닌 오류는 재시도하지 않는다', async () => {
    const manager = makeManager();
    vi.spyOn(store, 'getCooldown').mockRejectedValueOnce(new Error('connection refused'));

    await expect(manager.isOnCooldown('x')).rejects.toThrow('connection refused');
    expect(sleep).not.toHaveBeenCalled();
  });
});
