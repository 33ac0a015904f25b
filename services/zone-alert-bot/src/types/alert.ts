import type Big from 'big.js';

export const ALERT_SEVERITIES = ['critical', 'warning', 'info'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

/** CRITICAL이 가장 먼저 */
export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};

export type DeliveryStatus = 'pending' | 'success' | 'partial' | 'failed';
export type ZoneSide = 'long' | 'short';
export type ZoneDirection = 'above' | 'below';

export type LiquidationZone = {
  price: Big;
  /** USD */
  longDensity: Big;
  /** USD */
  shortDensity: Big;
};

export type ZoneProximity = {
  zone: LiquidationZone;
  currentPrice: Big;
  /** |zone - price| / price * 100, 소수 둘째 자리 half-up */
  distancePct: Big;
  direction: ZoneDirection;
  /** 쿨다운 파티션 키: `${floor(price / 100) * 100}_${dominantSide}` */
  zoneKey: string;
};

export type ThresholdConfig = {
  distancePct: Big;
  minDensity: Big;
};

export type ThresholdSet = Record<AlertSeverity, ThresholdConfig>;

export type TriggeredZone = {
  proximity: ZoneProximity;
  severity: AlertSeverity;
};

export type Alert = {
  /** 히스토리 저장 시 부여 */
  id: number | null;
  timestamp: string;
  symbol: string;
  currentPrice: Big;
  zonePrice: Big;
  zoneDensity: Big;
  zoneSide: ZoneSide;
  distancePct: Big;
  severity: AlertSeverity;
  message: string | null;
  channelsSent: string[];
  deliveryStatus: DeliveryStatus;
  errorMessage: string | null;
};

export type ChannelResult =
  | {
      success: true;
      channelName: string;
      responseData?: Record<string, unknown>;
    }
  | {
      success: false;
      channelName: string;
      errorMessage: string;
      responseData?: Record<string, unknown>;
    };

export type DispatchStatus = Exclude<DeliveryStatus, 'pending'>;

export type DispatchResult = {
  deliveryStatus: DispatchStatus;
  channelsSent: string[];
  channelsFailed: string[];
  errorMessage: string | null;
  results: ChannelResult[];
};

export const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  critical: '🚨',
  warning: '⚠️',
  info: 'ℹ️',
};
