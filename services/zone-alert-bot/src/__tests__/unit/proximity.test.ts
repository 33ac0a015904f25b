import Big from 'big.js';
import { describe, it, expect } from 'vitest';
import { InvalidPriceError } from '../../errors.js';
import {
  buildZoneKey,
  classifySeverity,
  computeProximity,
  dominantSide,
  totalDensity,
} from '../../proximity/proximity.js';
import { defaultThresholds, makeZone } from '../helpers/fixtures.js';

describe('computeProximity', () => {
  it('거리(%)를 소수 둘째 자리로 반올림한다', () => {
    const p = computeProximity(makeZone('94500', '5000000', '15000000'), new Big('94000'));

    expect(p.distancePct.toFixed(2)).toBe('0.53');
    expect(p.direction).toBe('above');
    expect(p.zoneKey).toBe('94500_short');
  });

  it('반올림은 half-up이다', () => {
    const p = computeProximity(makeZone('100.125', '1', '0'), new Big('100'));
    expect(p.distancePct.toFixed(2)).toBe('0.13');
  });

  it('존이 현재가 아래면 below, 거리는 음수가 아니다', () => {
    const p = computeProximity(makeZone('93000', '1', '0'), new Big('94000'));

    expect(p.direction).toBe('below');
    expect(p.distancePct.toFixed(2)).toBe('1.06');
    expect(p.distancePct.gte(0)).toBe(true);
  });

  it('존 가격 == 현재가면 거리 0, direction은 below', () => {
    const p = computeProximity(makeZone('94000', '1', '2'), new Big('94000'));

    expect(p.distancePct.toFixed(2)).toBe('0.00');
    expect(p.direction).toBe('below');
  });

  it('현재가가 0이면 InvalidPriceError', () => {
    expect(() => computeProximity(makeZone('94000', '1', '1'), new Big(0))).toThrow(InvalidPriceError);
  });

  it('현재가가 음수면 InvalidPriceError', () => {
    expect(() => computeProximity(makeZone('120000', '20000000', '0'), new Big('-94000'))).toThrow(
      'current price must be positive, got -94000',
    );
  });
});

describe('zone key', () => {
  it('94523.45 + short 우세 → 94500_short', () => {
    expect(buildZoneKey(makeZone('94523.45', '1000', '2000'))).toBe('94500_short');
  });

  it('94050 + long 우세 → 94000_long', () => {
    expect(buildZoneKey(makeZone('94050', '3000', '2000'))).toBe('94000_long');
  });

  it('long/short 밀도가 같으면 short', () => {
    expect(dominantSide(makeZone('94000', '5', '5'))).toBe('short');
  });

  it('totalDensity는 long + short', () => {
    expect(totalDensity(makeZone('94000', '5000000', '15000000')).toString()).toBe('20000000');
  });
});

describe('classifySeverity', () => {
  const thresholds = defaultThresholds();

  it('0.53% / 20M → critical', () => {
    const p = computeProximity(makeZone('94500', '5000000', '15000000'), new Big('94000'));
    expect(classifySeverity(p, thresholds)).toBe('critical');
  });

  it('같은 거리에 총 밀도 5M이면 critical을 건너뛰고 warning', () => {
    const p = computeProximity(makeZone('94500', '2000000', '3000000'), new Big('94000'));
    expect(classifySeverity(p, thresholds)).toBe('warning');
  });

  it('critical 조건을 만족하면 하위 티어 조건도 만족해도 critical', () => {
    // 0.11%, 50M: 세 티어 모두 충족
    const p = computeProximity(makeZone('94100', '25000000', '25000000'), new Big('94000'));
    expect(classifySeverity(p, thresholds)).toBe('critical');
  });

  it('거리 4%대, 밀도 2M → info', () => {
    const p = computeProximity(makeZone('98000', '1000000', '1000000'), new Big('94000'));
    expect(p.distancePct.toFixed(2)).toBe('4.26');
    expect(classifySeverity(p, thresholds)).toBe('info');
  });

  it('어느 티어도 충족하지 않으면 null', () => {
    const far = computeProximity(makeZone('110000', '50000000', '0'), new Big('94000'));
    const thin = computeProximity(makeZone('94100', '100', '100'), new Big('94000'));

    expect(classifySeverity(far, thresholds)).toBeNull();
    expect(classifySeverity(thin, thresholds)).toBeNull();
  });

  it('경계값: 거리 == 임계값이면 포함', () => {
    const p = computeProximity(makeZone('101', '10000000', '0'), new Big('100'));
    expect(p.distancePct.toFixed(2)).toBe('1.00');
    expect(classifySeverity(p, thresholds)).toBe('critical');
  });
});
