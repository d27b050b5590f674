/**
 * Normalized market records produced by the provider adapters.
 *
 * Numeric fields are optional: a value the provider omits (missing or null)
 * stays undefined and is rendered as "N/A", never as zero.
 */

export interface MarketSnapshot {
  totalMarketCapUsd?: number;
  totalVolumeUsd?: number;
  /** 24h change of the total market cap, in percent */
  marketCapChange24h?: number;
  activeCryptocurrencies?: number;
  /** BTC share of total market cap, in percent */
  btcDominance?: number;
}

export interface AssetQuote {
  name: string;
  /** Provider casing; usually lower-case */
  symbol: string;
  marketCapUsd?: number;
  /** 24h price change, in percent */
  change24h?: number;
  priceUsd?: number;
}

export interface TrendingEntry {
  name: string;
  symbol: string;
  marketCapRank?: number;
  /** Price expressed in BTC */
  priceBtc?: number;
}

export interface DefiProtocol {
  name: string;
  category: string;
  tvlUsd?: number;
  /** 24h TVL change, in percent */
  change1d?: number;
}

export interface SentimentReading {
  /** Integer 0–100 */
  value: number;
  classification: string;
  /** Unix seconds as reported by the provider */
  timestamp: string;
}

export interface TopMovers {
  gainer?: AssetQuote;
  loser?: AssetQuote;
}
