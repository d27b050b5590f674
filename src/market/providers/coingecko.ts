/**
 * CoinGecko adapters: global stats, market listing, trending search and the
 * Bitcoin simple-price quote. Each issues one GET through the shared transport.
 */
import type { HttpResult, HttpTransport } from "../../util/http";
import { buildUrl } from "../../util/http";
import { ok } from "../../util/result";
import type {
  AssetQuote,
  MarketSnapshot,
  TrendingEntry,
} from "../types";
import { missingData, parsePayload } from "./payload";
import {
  GlobalResponseSchema,
  MarketListingSchema,
  SimplePriceResponseSchema,
  toOptionalNumber,
  TrendingResponseSchema,
} from "./schemas";

const PROVIDER = "coingecko";

export const DEFAULT_LISTING_LIMIT = 50;
export const TRENDING_LIMIT = 5;

export interface CoinGeckoOptions {
  baseUrl: string;
}

export async function fetchGlobalSnapshot(
  transport: HttpTransport,
  options: CoinGeckoOptions
): Promise<HttpResult<MarketSnapshot>> {
  const url = `${options.baseUrl}/global`;
  const payload = parsePayload(
    PROVIDER,
    url,
    await transport.getJson(url),
    GlobalResponseSchema
  );
  if (!payload.ok) return payload;

  const global = payload.data.data;
  return ok({
    totalMarketCapUsd: toOptionalNumber(global.total_market_cap?.usd),
    totalVolumeUsd: toOptionalNumber(global.total_volume?.usd),
    marketCapChange24h: toOptionalNumber(
      global.market_cap_change_percentage_24h_usd
    ),
    activeCryptocurrencies: toOptionalNumber(global.active_cryptocurrencies),
    btcDominance: toOptionalNumber(global.market_cap_percentage?.btc),
  });
}

/**
 * Top `limit` assets by market cap, in provider (market-cap-descending) order.
 */
export async function fetchMarketListing(
  transport: HttpTransport,
  options: CoinGeckoOptions & { limit?: number }
): Promise<HttpResult<AssetQuote[]>> {
  const url = `${options.baseUrl}/coins/markets`;
  const params = {
    vs_currency: "usd",
    order: "market_cap_desc",
    per_page: options.limit ?? DEFAULT_LISTING_LIMIT,
    page: 1,
    sparkline: false,
    locale: "en",
  };
  const payload = parsePayload(
    PROVIDER,
    buildUrl(url, params),
    await transport.getJson(url, params),
    MarketListingSchema
  );
  if (!payload.ok) return payload;

  return ok(
    payload.data.map(row => ({
      name: row.name ?? "Unknown",
      symbol: row.symbol ?? "",
      marketCapUsd: toOptionalNumber(row.market_cap),
      change24h: toOptionalNumber(row.price_change_percentage_24h),
      priceUsd: toOptionalNumber(row.current_price),
    }))
  );
}

/**
 * Currently trending coins; provider order is the rank order.
 */
export async function fetchTrending(
  transport: HttpTransport,
  options: CoinGeckoOptions
): Promise<HttpResult<TrendingEntry[]>> {
  const url = `${options.baseUrl}/search/trending`;
  const payload = parsePayload(
    PROVIDER,
    url,
    await transport.getJson(url),
    TrendingResponseSchema
  );
  if (!payload.ok) return payload;

  return ok(
    payload.data.coins.slice(0, TRENDING_LIMIT).map(({ item }) => ({
      name: item?.name ?? "Unknown",
      symbol: item?.symbol ?? "",
      marketCapRank: toOptionalNumber(item?.market_cap_rank),
      priceBtc: toOptionalNumber(item?.price_btc),
    }))
  );
}

export async function fetchBitcoinQuote(
  transport: HttpTransport,
  options: CoinGeckoOptions
): Promise<HttpResult<AssetQuote>> {
  const url = `${options.baseUrl}/simple/price`;
  const params = {
    ids: "bitcoin",
    vs_currencies: "usd",
    include_24hr_change: "true",
    include_market_cap: "true",
  };
  const target = buildUrl(url, params);
  const payload = parsePayload(
    PROVIDER,
    target,
    await transport.getJson(url, params),
    SimplePriceResponseSchema
  );
  if (!payload.ok) return payload;

  const btc = payload.data.bitcoin;
  if (!btc) return missingData(PROVIDER, target, "No bitcoin quote in response");

  return ok({
    name: "Bitcoin",
    symbol: "btc",
    priceUsd: toOptionalNumber(btc.usd),
    change24h: toOptionalNumber(btc.usd_24h_change),
    marketCapUsd: toOptionalNumber(btc.usd_market_cap),
  });
}
