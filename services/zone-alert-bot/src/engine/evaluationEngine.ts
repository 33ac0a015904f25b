import { DateTime } from 'luxon';
import { createLogger, toIsoString, type Logger } from '@zone-alerts/shared-utils';
import { classifySeverity, computeProximity, dominantSide, totalDensity } from '../proximity/proximity.js';
import type { PriceSource } from '../sources/priceSource.js';
import type { ZoneSource } from '../sources/zoneSource.js';
import {
  SEVERITY_RANK,
  type Alert,
  type ThresholdSet,
  type TriggeredZone,
} from '../types/alert.js';

export type AlertEvaluationEngineOptions = {
  priceSource: PriceSource;
  zoneSource: ZoneSource;
  thresholds: ThresholdSet;
  symbol: string;
  logger?: Logger;
};

export function compareTriggered(a: TriggeredZone, b: TriggeredZone): number {
  const bySeverity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
  if (bySeverity !== 0) return bySeverity;
  return a.proximity.distancePct.cmp(b.proximity.distancePct);
}

export function buildAlert(
  triggered: TriggeredZone,
  symbol: string,
  now: DateTime = DateTime.utc(),
): Alert {
  const { proximity, severity } = triggered;
  return {
    id: null,
    timestamp: toIsoString(now),
    symbol,
    currentPrice: proximity.currentPrice,
    zonePrice: proximity.zone.price,
    zoneDensity: totalDensity(proximity.zone),
    zoneSide: dominantSide(proximity.zone),
    distancePct: proximity.distancePct,
    severity,
    message: null,
    channelsSent: [],
    deliveryStatus: 'pending',
    errorMessage: null,
  };
}

/**
 * 가격과 존을 가져와 경보 대상 존을 심각도 → 거리 순으로 돌려준다.
 * 조회 실패(PriceFetchError/ZoneFetchError)는 재시도 없이 그대로 전파된다.
 */
export class AlertEvaluationEngine {
  private readonly priceSource: PriceSource;
  private readonly zoneSource: ZoneSource;
  private readonly thresholds: ThresholdSet;
  readonly symbol: string;
  private readonly logger: Logger;

  constructor(opts: AlertEvaluationEngineOptions) {
    this.priceSource = opts.priceSource;
    this.zoneSource = opts.zoneSource;
    this.thresholds = opts.thresholds;
    this.symbol = opts.symbol;
    this.logger = opts.logger ?? createLogger('evaluation-engine');
  }

  async evaluate(): Promise<TriggeredZone[]> {
    const currentPrice = await this.priceSource.fetchPrice(this.symbol);
    const zones = await this.zoneSource.fetchZones(this.symbol);

    const triggered: TriggeredZone[] = [];
    for (const zone of zones) {
      const proximity = computeProximity(zone, currentPrice);
      const severity = classifySeverity(proximity, this.thresholds);
      if (severity === null) continue;

      triggered.push({ proximity, severity });
      this.logger.debug('경보 조건 충족', {
        severity,
        zonePrice: zone.price.toString(),
        distancePct: proximity.distancePct.toString(),
      });
    }

    triggered.sort(compareTriggered);

    this.logger.info('평가 완료', {
      symbol: this.symbol,
      price: currentPrice.toString(),
      zones: zones.length,
      triggered: triggered.length,
    });

    return triggered;
  }
}
