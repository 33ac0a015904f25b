import Big from 'big.js';
import { InvalidPriceError } from '../errors.js';
import {
  ALERT_SEVERITIES,
  type AlertSeverity,
  type LiquidationZone,
  type ThresholdSet,
  type ZoneProximity,
  type ZoneSide,
} from '../types/alert.js';

const HUNDRED = new Big(100);
const ZONE_BUCKET_SIZE = 100;

export function totalDensity(zone: LiquidationZone): Big {
  return zone.longDensity.plus(zone.shortDensity);
}

/**
 * 동률이면 short
 */
export function dominantSide(zone: LiquidationZone): ZoneSide {
  return zone.longDensity.gt(zone.shortDensity) ? 'long' : 'short';
}

export function buildZoneKey(zone: LiquidationZone): string {
  const bucket = zone.price.div(ZONE_BUCKET_SIZE).round(0, Big.roundDown).times(ZONE_BUCKET_SIZE);
  return `${bucket.toFixed(0)}_${dominantSide(zone)}`;
}

/**
 * 현재가 대비 존까지의 거리(%)와 방향.
 * 가격이 같으면 direction은 'below'.
 */
export function computeProximity(zone: LiquidationZone, currentPrice: Big): ZoneProximity {
  if (currentPrice.lte(0)) {
    throw new InvalidPriceError(`current price must be positive, got ${currentPrice.toString()}`);
  }

  const distancePct = zone.price
    .minus(currentPrice)
    .abs()
    .div(currentPrice)
    .times(HUNDRED)
    .round(2, Big.roundHalfUp);

  return {
    zone,
    currentPrice,
    distancePct,
    direction: zone.price.gt(currentPrice) ? 'above' : 'below',
    zoneKey: buildZoneKey(zone),
  };
}

/**
 * CRITICAL → WARNING → INFO 순서로 거리/밀도 조건을 모두 만족하는 첫 티어.
 * 임계값은 로드 시점에 단조 증가로 검증되어 있다.
 */
export function classifySeverity(
  proximity: ZoneProximity,
  thresholds: ThresholdSet,
): AlertSeverity | null {
  const density = totalDensity(proximity.zone);

  for (const severity of ALERT_SEVERITIES) {
    const tier = thresholds[severity];
    if (proximity.distancePct.lte(tier.distancePct) && density.gte(tier.minDensity)) {
      return severity;
    }
  }

  return null;
}
