import type { HttpResult, HttpTransport } from "../../util/http";
import type {
  AssetQuote,
  DefiProtocol,
  MarketSnapshot,
  SentimentReading,
  TrendingEntry,
} from "../types";
import {
  DEFAULT_LISTING_LIMIT,
  fetchBitcoinQuote,
  fetchGlobalSnapshot,
  fetchMarketListing,
  fetchTrending,
} from "./coingecko";
import { fetchDefiProtocols } from "./defillama";
import { DEFAULT_ENDPOINTS, ProviderEndpoints } from "./endpoints";
import { fetchSentiment } from "./fear_greed";

export * from "./coingecko";
export * from "./defillama";
export * from "./endpoints";
export * from "./fear_greed";

/**
 * The six market data sources a report draws on. None of them throws.
 */
export interface MarketDataProviders {
  fetchGlobalSnapshot(): Promise<HttpResult<MarketSnapshot>>;
  fetchMarketListing(): Promise<HttpResult<AssetQuote[]>>;
  fetchTrending(): Promise<HttpResult<TrendingEntry[]>>;
  fetchDefiProtocols(): Promise<HttpResult<DefiProtocol[]>>;
  fetchSentiment(): Promise<HttpResult<SentimentReading>>;
  fetchBitcoinQuote(): Promise<HttpResult<AssetQuote>>;
}

export interface MarketProvidersOptions {
  endpoints?: ProviderEndpoints;
  marketListingLimit?: number;
}

/**
 * Binds the provider functions to one shared transport.
 */
export function createMarketProviders(
  transport: HttpTransport,
  options: MarketProvidersOptions = {}
): MarketDataProviders {
  const endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;
  const coingecko = { baseUrl: endpoints.coingeckoBaseUrl };
  const limit = options.marketListingLimit ?? DEFAULT_LISTING_LIMIT;

  return {
    fetchGlobalSnapshot: () => fetchGlobalSnapshot(transport, coingecko),
    fetchMarketListing: () =>
      fetchMarketListing(transport, { ...coingecko, limit }),
    fetchTrending: () => fetchTrending(transport, coingecko),
    fetchDefiProtocols: () =>
      fetchDefiProtocols(transport, { baseUrl: endpoints.defillamaBaseUrl }),
    fetchSentiment: () =>
      fetchSentiment(transport, { url: endpoints.fearGreedUrl }),
    fetchBitcoinQuote: () => fetchBitcoinQuote(transport, coingecko),
  };
}
