import { describe, it, expect } from 'vitest';
import { AlertDispatcher, aggregateResults, applyDispatchResult } from '../../dispatch/dispatcher.js';
import type { NotificationChannel } from '../../channels/types.js';
import type { AlertSeverity, ChannelResult } from '../../types/alert.js';
import { FakeChannel } from '../helpers/fakeChannel.js';
import { makeAlert, silentLogger } from '../helpers/fixtures.js';

function makeDispatcher(
  channels: FakeChannel[],
  opts?: { timeoutMs?: number; filters?: Record<string, AlertSeverity[]> },
) {
  return new AlertDispatcher({
    channels,
    timeoutMs: opts?.timeoutMs ?? 1_000,
    severityFilters: opts?.filters,
    logger: silentLogger,
  });
}

describe('AlertDispatcher.dispatch', () => {
  it('모든 채널 성공 → success', async () => {
    const a = new FakeChannel('discord');
    const b = new FakeChannel('telegram');

    const result = await makeDispatcher([a, b]).dispatch(makeAlert());

    expect(result.deliveryStatus).toBe('success');
    expect(result.channelsSent).toEqual(['discord', 'telegram']);
    expect(result.channelsFailed).toEqual([]);
    expect(result.errorMessage).toBeNull();
  });

  it('한 채널이 throw해도 dispatch는 throw하지 않고 partial', async () => {
    const failing = new FakeChannel('failing', 'throw');
    const other = new FakeChannel('other');

    const result = await makeDispatcher([failing, other]).dispatch(makeAlert());

    expect(result.deliveryStatus).toBe('partial');
    expect(result.channelsSent).toEqual(['other']);
    expect(result.channelsFailed).toEqual(['failing']);
    expect(result.errorMessage).toBe('Failed channels: failing (Unexpected error: failing exploded)');
    expect(other.sent).toHaveLength(1);
  });

  it('모든 채널 실패 → failed, 실패 채널을 모두 나열한다', async () => {
    const result = await makeDispatcher([
      new FakeChannel('discord', 'fail'),
      new FakeChannel('email', 'fail'),
    ]).dispatch(makeAlert());

    expect(result.deliveryStatus).toBe('failed');
    expect(result.channelsSent).toEqual([]);
    expect(result.errorMessage).toBe(
      'All channels failed: discord (discord rejected), email (email rejected)',
    );
  });

  it('타임아웃된 채널만 실패하고 signal로 요청이 취소된다', async () => {
    const slow = new FakeChannel('slow', 'hang');
    const fast = new FakeChannel('fast');

    const result = await makeDispatcher([slow, fast], { timeoutMs: 20 }).dispatch(makeAlert());

    expect(result.deliveryStatus).toBe('partial');
    expect(result.channelsSent).toEqual(['fast']);
    expect(result.results.find((r) => r.channelName === 'slow')).toEqual({
      success: false,
      channelName: 'slow',
      errorMessage: 'Timeout after 20ms',
    });
    expect(slow.abortedBySignal).toBe(true);
  });

  it('모든 채널의 send가 동시에 시작된다', async () => {
    const started: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    // 두 채널이 모두 시작해야 gate가 열린다. 순차 전송이면 첫 채널이 타임아웃된다.
    const gated = (name: string): NotificationChannel => ({
      name,
      async send(): Promise<ChannelResult> {
        started.push(name);
        if (started.length === 2) release();
        await gate;
        return { success: true, channelName: name };
      },
      async testConnection(): Promise<ChannelResult> {
        return { success: true, channelName: name };
      },
    });

    const dispatcher = new AlertDispatcher({
      channels: [gated('discord'), gated('telegram')],
      timeoutMs: 100,
      logger: silentLogger,
    });
    const result = await dispatcher.dispatch(makeAlert());

    expect(started).toEqual(['discord', 'telegram']);
    expect(result.deliveryStatus).toBe('success');
    expect(result.channelsSent).toEqual(['discord', 'telegram']);
  });

  // ─── 심각도 필터 ──────────────────────────────────────────────────────────

  it('필터 항목이 없는 채널은 모든 심각도를 받는다', async () => {
    const discord = new FakeChannel('discord');
    const email = new FakeChannel('email');
    const dispatcher = makeDispatcher([discord, email], { filters: { email: ['critical'] } });

    const result = await dispatcher.dispatch(makeAlert({ severity: 'info' }));

    expect(result.channelsSent).toEqual(['discord']);
    expect(email.sent).toHaveLength(0);
  });

  it('필터 후 남은 채널이 없으면 아무것도 보내지 않고 success', async () => {
    const email = new FakeChannel('email');
    const dispatcher = makeDispatcher([email], { filters: { email: ['critical'] } });

    const result = await dispatcher.dispatch(makeAlert({ severity: 'warning' }));

    expect(result).toEqual({
      deliveryStatus: 'success',
      channelsSent: [],
      channelsFailed: [],
      errorMessage: null,
      results: [],
    });
    expect(email.sent).toHaveLength(0);
  });
});

describe('aggregateResults / applyDispatchResult', () => {
  it('결과 순서와 무관하게 같은 집합을 만든다', () => {
    const ok = { success: true as const, channelName: 'a' };
    const bad = { success: false as const, channelName: 'b', errorMessage: 'x' };

    const r1 = aggregateResults([ok, bad]);
    const r2 = aggregateResults([bad, ok]);

    expect(r1.deliveryStatus).toBe('partial');
    expect(r2.deliveryStatus).toBe('partial');
    expect(r1.channelsSent).toEqual(r2.channelsSent);
    expect(r1.channelsFailed).toEqual(r2.channelsFailed);
  });

  it('applyDispatchResult는 원본을 바꾸지 않고 전송 결과를 채운다', () => {
    const alert = makeAlert();
    const result = aggregateResults([{ success: true, channelName: 'telegram' }]);

    const updated = applyDispatchResult(alert, result);

    expect(updated.deliveryStatus).toBe('success');
    expect(updated.channelsSent).toEqual(['telegram']);
    expect(alert.deliveryStatus).toBe('pending');
    expect(alert.channelsSent).toEqual([]);
  });
});
