import Big from 'big.js';
import { z } from 'zod';
import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import { ZoneFetchError } from '../errors.js';
import type { LiquidationZone } from '../types/alert.js';
import { fetchJson, withSymbol } from './http.js';

export interface ZoneSource {
  fetchZones(symbol: string): Promise<LiquidationZone[]>;
}

const DecimalInput = z.union([z.string(), z.number()]);

const HeatmapResponseSchema = z.object({
  data: z
    .array(
      z.object({
        levels: z
          .array(
            z.object({
              price: DecimalInput,
              long_density: DecimalInput.default(0),
              short_density: DecimalInput.default(0),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

/**
 * 마지막 스냅샷(data의 마지막 원소)만 사용한다.
 */
export function parseHeatmapResponse(body: unknown): LiquidationZone[] {
  const parsed = HeatmapResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ZoneFetchError(`Invalid heatmap response: ${parsed.error.message}`);
  }

  const latest = parsed.data.data.at(-1);
  if (!latest) return [];

  try {
    return latest.levels.map((level) => ({
      price: new Big(level.price),
      longDensity: new Big(level.long_density),
      shortDensity: new Big(level.short_density),
    }));
  } catch (error: unknown) {
    throw new ZoneFetchError(`Invalid zone level: ${formatUnknownError(error)}`, { cause: error });
  }
}

export class HttpZoneSource implements ZoneSource {
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs = 30_000,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('zone-source');
  }

  async fetchZones(symbol: string): Promise<LiquidationZone[]> {
    const url = withSymbol(this.endpoint, symbol);
    this.logger.debug('존 조회', { url });

    let body: unknown;
    try {
      body = await fetchJson(url, this.timeoutMs);
    } catch (error: unknown) {
      throw new ZoneFetchError(`Error fetching zones: ${formatUnknownError(error)}`, { cause: error });
    }

    const zones = parseHeatmapResponse(body);
    if (zones.length === 0) {
      this.logger.warn('응답에 존 데이터 없음', { symbol });
    } else {
      this.logger.info('존 조회 완료', { symbol, count: zones.length });
    }
    return zones;
  }
}
