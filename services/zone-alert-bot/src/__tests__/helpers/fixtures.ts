import Big from 'big.js';
import { createLogger } from '@zone-alerts/shared-utils';
import type { Alert, LiquidationZone, ThresholdSet } from '../../types/alert.js';

export const silentLogger = createLogger('test', { sink: () => {} });

export function makeZone(price: string, longDensity: string, shortDensity: string): LiquidationZone {
  return {
    price: new Big(price),
    longDensity: new Big(longDensity),
    shortDensity: new Big(shortDensity),
  };
}

/** 1%/10M, 3%/5M, 5%/1M */
export function defaultThresholds(): ThresholdSet {
  return {
    critical: { distancePct: new Big('1'), minDensity: new Big('10000000') },
    warning: { distancePct: new Big('3'), minDensity: new Big('5000000') },
    info: { distancePct: new Big('5'), minDensity: new Big('1000000') },
  };
}

export function makeAlert(overrides?: Partial<Alert>): Alert {
  return {
    id: null,
    timestamp: '2025-01-15T12:00:00.000Z',
    symbol: 'BTCUSDT',
    currentPrice: new Big('94000'),
    zonePrice: new Big('94500'),
    zoneDensity: new Big('20000000'),
    zoneSide: 'short',
    distancePct: new Big('0.53'),
    severity: 'critical',
    message: null,
    channelsSent: [],
    deliveryStatus: 'pending',
    errorMessage: null,
    ...overrides,
  };
}
