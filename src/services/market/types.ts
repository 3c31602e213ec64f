export interface Credentials {
  readonly publicKey: string;
  readonly secretKey: string;
}

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | undefined;

export interface RequestSpec {
  method: HttpMethod;
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
}

/**
 * One marketplace offer. Prices are integer cents.
 */
export interface Listing {
  itemId: string;
  title: string;
  gameId: string;
  price: number;
  suggestedPrice: number | null;
  recentSales: number | null;
}

export interface ListingPage {
  listings: Listing[];
  /** Token for the next page; null when the upstream has no more pages. */
  cursor: string | null;
  total: number | null;
}

export interface ListingQuery {
  gameId: string;
  /** Inclusive lower bound, cents. */
  priceFrom: number;
  /** Inclusive upper bound, cents. */
  priceTo: number;
  limit: number;
}

export interface AggregatedPrice {
  title: string;
  orderBestPrice: number | null;
  orderCount: number;
  offerBestPrice: number | null;
  offerCount: number;
}
