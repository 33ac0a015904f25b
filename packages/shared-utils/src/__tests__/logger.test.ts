import { describe, it, expect } from 'vitest';
import { createLogger, parseLogLevel, type LogLevel } from '../logger.js';

function capture(level?: LogLevel) {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  const logger = createLogger('zone-alert-bot', {
    level,
    sink: (lvl, line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null) {
        lines.push({ level: lvl, entry: { ...parsed } });
      }
    },
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('JSON 한 줄에 level/service/message/data를 담는다', () => {
    const { logger, lines } = capture('DEBUG');
    logger.info('알림 사이클 시작', { symbol: 'BTCUSDT' });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('INFO');
    expect(lines[0].entry).toMatchObject({
      level: 'INFO',
      service: 'zone-alert-bot',
      message: '알림 사이클 시작',
      data: { symbol: 'BTCUSDT' },
    });
  });

  it('minLevel보다 낮은 로그는 버린다', () => {
    const { logger, lines } = capture('WARN');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((l) => l.level)).toEqual(['WARN', 'ERROR']);
  });

  it('error는 Error를 message/stack으로 직렬화한다', () => {
    const { logger, lines } = capture('INFO');
    logger.error('실패', new Error('boom'));

    expect(lines[0].entry.data).toMatchObject({ message: 'boom' });
  });
});

describe('parseLogLevel', () => {
  it('WARNING은 WARN, 모르는 값은 INFO', () => {
    expect(parseLogLevel('warning')).toBe('WARN');
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel('verbose')).toBe('INFO');
    expect(parseLogLevel(undefined)).toBe('INFO');
  });
});
