import { z } from "zod";

/**
 * Wire schemas for provider payloads. Every field the report reads is
 * nullish so that an omitted value survives as undefined; unknown fields pass.
 */

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();

// CoinGecko sometimes returns numeric fields as strings (e.g. price_btc)
const numericLike = z.union([z.number(), z.string()]).nullish();

export const GlobalResponseSchema = z.object({
  data: z.object({
    total_market_cap: z.object({ usd: optionalNumber }).nullish(),
    total_volume: z.object({ usd: optionalNumber }).nullish(),
    market_cap_change_percentage_24h_usd: optionalNumber,
    active_cryptocurrencies: optionalNumber,
    market_cap_percentage: z.object({ btc: optionalNumber }).nullish(),
  }),
});

export const MarketRowSchema = z.object({
  name: optionalString,
  symbol: optionalString,
  market_cap: optionalNumber,
  price_change_percentage_24h: optionalNumber,
  current_price: optionalNumber,
});

export const MarketListingSchema = z.array(MarketRowSchema);

export const TrendingResponseSchema = z.object({
  coins: z.array(
    z.object({
      item: z
        .object({
          name: optionalString,
          symbol: optionalString,
          market_cap_rank: optionalNumber,
          price_btc: numericLike,
        })
        .nullish(),
    })
  ),
});

export const ProtocolRowSchema = z.object({
  name: optionalString,
  category: optionalString,
  tvl: optionalNumber,
  change_1d: optionalNumber,
});

export const ProtocolListingSchema = z.array(ProtocolRowSchema);

export const FearGreedResponseSchema = z.object({
  data: z.array(
    z.object({
      value: numericLike,
      value_classification: optionalString,
      timestamp: numericLike,
    })
  ),
});

export const SimplePriceResponseSchema = z.object({
  bitcoin: z
    .object({
      usd: optionalNumber,
      usd_24h_change: optionalNumber,
      usd_market_cap: optionalNumber,
    })
    .nullish(),
});

/** null and non-finite numbers become undefined; numeric strings are parsed. */
export function toOptionalNumber(
  value: number | string | null | undefined
): number | undefined {
  if (value == null) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
