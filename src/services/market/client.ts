import pino from 'pino';
import type { z } from 'zod';
import { ok, type ApiError, type Result } from '../../utils/errors.js';
import type { TieredCache } from '../cache/tiered-cache.js';
import type { RequestExecutor } from './request-executor.js';
import {
  aggregatedPricesSchema,
  listingPageSchema,
  type AggregatedPricesResponse,
  type ListingPageResponse,
  type WireListing,
} from './schemas.js';
import type { AggregatedPrice, Listing, ListingPage, ListingQuery, RequestSpec } from './types.js';

const log = pino({ name: 'market-client' });

export const LISTINGS_PATH = '/exchange/v1/market/items';
export const AGGREGATED_PRICES_PATH = '/marketplace-api/v1/aggregated-prices';

/** Titles per aggregated-prices request. */
export const AGGREGATED_TITLES_PER_REQUEST = 100;

export interface MarketClientOptions {
  listingTtlSeconds: number;
  referenceTtlSeconds: number;
}

function parseCents(value: string): number {
  return Number.parseInt(value, 10);
}

export function toListing(wire: WireListing): Listing {
  return {
    itemId: wire.itemId,
    title: wire.title,
    gameId: wire.gameId,
    price: parseCents(wire.price.USD),
    suggestedPrice: wire.suggestedPrice ? parseCents(wire.suggestedPrice.USD) : null,
    recentSales: wire.extra?.saleCount ?? null,
  };
}

export function toListingPage(response: ListingPageResponse): ListingPage {
  const listings = response.objects.map(toListing);
  return {
    listings,
    cursor: listings.length > 0 && response.cursor ? response.cursor : null,
    total: response.total?.offers ?? response.total?.items ?? null,
  };
}

function toAggregatedPrices(response: AggregatedPricesResponse): AggregatedPrice[] {
  return response.aggregatedPrices.map((entry) => ({
    title: entry.title,
    orderBestPrice: entry.orderBestPrice ? parseCents(entry.orderBestPrice) : null,
    orderCount: entry.orderCount,
    offerBestPrice: entry.offerBestPrice ? parseCents(entry.offerBestPrice) : null,
    offerCount: entry.offerCount,
  }));
}

/**
 * Typed marketplace endpoints. Responses are served from the tiered cache when present
 * and re-validated against the endpoint schema, so a stale or foreign cache entry is
 * treated as a miss.
 */
export class MarketClient {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly cache: TieredCache,
    private readonly options: MarketClientOptions,
  ) {}

  async getListingPage(
    query: ListingQuery,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Result<ListingPage, ApiError>> {
    const spec: RequestSpec = {
      method: 'GET',
      path: LISTINGS_PATH,
      query: {
        gameId: query.gameId,
        limit: query.limit,
        currency: 'USD',
        orderBy: 'price',
        orderDir: 'asc',
        priceFrom: query.priceFrom,
        priceTo: query.priceTo,
        cursor,
      },
    };

    const result = await this.cachedSend(spec, listingPageSchema, this.options.listingTtlSeconds, signal);
    if (!result.success) return result;
    return ok(toListingPage(result.data));
  }

  /**
   * Best buy-order and sell-offer prices per title. Titles are de-duplicated, sorted and
   * sent in batches; the first failing batch fails the whole call.
   */
  async getAggregatedPrices(
    gameId: string,
    titles: string[],
    signal?: AbortSignal,
  ): Promise<Result<AggregatedPrice[], ApiError>> {
    const unique = [...new Set(titles)].sort();
    const prices: AggregatedPrice[] = [];

    for (let i = 0; i < unique.length; i += AGGREGATED_TITLES_PER_REQUEST) {
      const batch = unique.slice(i, i + AGGREGATED_TITLES_PER_REQUEST);
      const spec: RequestSpec = {
        method: 'POST',
        path: AGGREGATED_PRICES_PATH,
        body: { filter: { game: gameId, titles: batch }, limit: String(batch.length) },
      };

      const result = await this.cachedSend(spec, aggregatedPricesSchema, this.options.referenceTtlSeconds, signal);
      if (!result.success) return result;
      prices.push(...toAggregatedPrices(result.data));
    }

    return ok(prices);
  }

  private async cachedSend<T>(
    spec: RequestSpec,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ttlSeconds: number,
    signal?: AbortSignal,
  ): Promise<Result<T, ApiError>> {
    const cached = await this.cache.get(spec);
    if (cached !== undefined) {
      const parsed = schema.safeParse(cached);
      if (parsed.success) return ok(parsed.data);
      log.warn({ path: spec.path }, 'Discarding cached payload that no longer matches its schema');
    }

    const result = await this.executor.send(spec, schema, { signal });
    if (result.success) {
      await this.cache.put(spec, result.data, ttlSeconds);
    }
    return result;
  }
}
