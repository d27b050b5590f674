/**
 * Eligibility, ordering and truncation rules for the report sections.
 *
 * Sorting relies on Array.prototype.sort being stable: entries with equal
 * change keep the provider's market-cap-descending order.
 */
import type {
  AssetQuote,
  DefiProtocol,
  TopMovers,
  TrendingEntry,
} from "./types";

/** Market cap (movers) and TVL (DeFi) must be strictly above this, in USD. */
export const MIN_ELIGIBLE_USD = 1_000_000;

export const HOT_DEFI_LIMIT = 5;
export const TRENDING_DISPLAY_LIMIT = 5;

type WithChange<T> = T & { change24h: number };

function isEligibleMover(quote: AssetQuote): quote is WithChange<AssetQuote> {
  return (
    quote.change24h !== undefined &&
    quote.marketCapUsd !== undefined &&
    quote.marketCapUsd > MIN_ELIGIBLE_USD
  );
}

/**
 * Highest and lowest 24h movers among eligible assets.
 * Both are undefined when nothing is eligible.
 */
export function selectTopMovers(listing: readonly AssetQuote[]): TopMovers {
  const eligible = listing.filter(isEligibleMover);
  if (eligible.length === 0) {
    return { gainer: undefined, loser: undefined };
  }

  const ascending = [...eligible].sort((a, b) => a.change24h - b.change24h);
  return {
    gainer: ascending[ascending.length - 1],
    loser: ascending[0],
  };
}

function isEligibleProtocol(
  protocol: DefiProtocol
): protocol is DefiProtocol & { change1d: number } {
  return (
    protocol.change1d !== undefined &&
    protocol.tvlUsd !== undefined &&
    protocol.tvlUsd > MIN_ELIGIBLE_USD
  );
}

/**
 * Eligible protocols by 24h TVL change, best first.
 */
export function selectHotDefi(
  protocols: readonly DefiProtocol[],
  limit = HOT_DEFI_LIMIT
): DefiProtocol[] {
  return protocols
    .filter(isEligibleProtocol)
    .sort((a, b) => b.change1d - a.change1d)
    .slice(0, limit);
}

/**
 * Provider order is already the trending rank; only truncate.
 */
export function selectTrending(
  entries: readonly TrendingEntry[],
  limit = TRENDING_DISPLAY_LIMIT
): TrendingEntry[] {
  return entries.slice(0, limit);
}
