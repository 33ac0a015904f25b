import Big from 'big.js';
import { z } from 'zod';
import { createLogger, formatUnknownError, type Logger } from '@zone-alerts/shared-utils';
import { PriceFetchError } from '../errors.js';
import { fetchJson, withSymbol } from './http.js';

export interface PriceSource {
  fetchPrice(symbol: string): Promise<Big>;
}

const PriceResponseSchema = z.object({
  price: z.union([z.string(), z.number()]),
});

export function parsePriceResponse(body: unknown): Big {
  const parsed = PriceResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new PriceFetchError(`Invalid response: missing 'price' field. Got: ${JSON.stringify(body)}`);
  }

  let price: Big;
  try {
    price = new Big(parsed.data.price);
  } catch (error: unknown) {
    throw new PriceFetchError(`Invalid price value: ${String(parsed.data.price)}`, { cause: error });
  }

  if (price.lte(0)) {
    throw new PriceFetchError(`Invalid price value: ${price.toString()} (must be positive)`);
  }
  return price;
}

export class HttpPriceSource implements PriceSource {
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs = 10_000,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('price-source');
  }

  async fetchPrice(symbol: string): Promise<Big> {
    const url = withSymbol(this.endpoint, symbol);
    this.logger.debug('가격 조회', { url });

    let body: unknown;
    try {
      body = await fetchJson(url, this.timeoutMs);
    } catch (error: unknown) {
      throw new PriceFetchError(`Error fetching price: ${formatUnknownError(error)}`, { cause: error });
    }

    const price = parsePriceResponse(body);
    this.logger.info('가격 조회 완료', { symbol, price: price.toString() });
    return price;
  }
}
