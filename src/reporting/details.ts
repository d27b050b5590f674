/**
 * Single-topic messages behind /btc, /trending and /defi and their buttons.
 */
import {
  formatNumber,
  formatPercentage,
  formatUsdPrice,
  formatUtc,
  truncate,
} from "../market/format";
import type { AssetQuote, DefiProtocol, TrendingEntry } from "../market/types";
import type { DetailVariant } from "./domain/types";
import { rankLabel } from "./sections";

const BUTTON_NAME_WIDTH = 15;

function clockLine(now: Date): string {
  return `⏰ ${formatUtc(now, "HH:mm")}`;
}

export function renderBitcoinDetail(
  quote: AssetQuote | undefined,
  variant: DetailVariant,
  now: Date
): string {
  if (!quote) {
    return variant === "command"
      ? "❌ Unable to fetch Bitcoin price data"
      : "❌ Unable to fetch Bitcoin data";
  }
  const title =
    variant === "command" ? "₿ *BITCOIN PRICE*" : "₿ *BITCOIN UPDATE*";
  return [
    title,
    "",
    `💰 *Price:* ${formatUsdPrice(quote.priceUsd, 2)}`,
    `📊 *24h Change:* ${formatPercentage(quote.change24h)}`,
    `🏦 *Market Cap:* ${formatNumber(quote.marketCapUsd)}`,
    "",
    clockLine(now),
  ].join("\n");
}

export function renderTrendingDetail(
  entries: readonly TrendingEntry[],
  variant: DetailVariant,
  now: Date
): string {
  if (entries.length === 0) return "❌ Unable to fetch trending data";

  if (variant === "command") {
    const blocks = entries.map(
      (coin, i) =>
        `${i + 1}. *${coin.name}* (${coin.symbol.toUpperCase()})\n` +
        `    📊 Rank: ${rankLabel(coin.marketCapRank, "Unranked")}`
    );
    return ["🔥 *TRENDING CRYPTOCURRENCIES*", ...blocks, clockLine(now)].join(
      "\n\n"
    );
  }

  const lines = entries.map(
    (coin, i) =>
      `${i + 1}. *${truncate(coin.name, BUTTON_NAME_WIDTH)}* ` +
      `(${coin.symbol.toUpperCase()}) ${rankLabel(coin.marketCapRank, "NR")}`
  );
  return ["🔥 *TRENDING COINS*", "", ...lines, "", clockLine(now)].join("\n");
}

export function renderDefiDetail(
  protocols: readonly DefiProtocol[],
  variant: DetailVariant,
  now: Date
): string {
  if (protocols.length === 0) return "❌ Unable to fetch DeFi data";

  if (variant === "command") {
    const blocks = protocols.map((project, i) =>
      [
        `${i + 1}. *${project.name}*`,
        `    💎 TVL: ${formatNumber(project.tvlUsd)}`,
        `    📊 24h: ${formatPercentage(project.change1d)}`,
        `    🏗️ ${project.category}`,
      ].join("\n")
    );
    return ["🏗️ *TOP DEFI PROTOCOLS*", ...blocks, clockLine(now)].join("\n\n");
  }

  const lines = protocols.flatMap((project, i) => [
    `${i + 1}. *${truncate(project.name, BUTTON_NAME_WIDTH)}*`,
    `    💎 ${formatNumber(project.tvlUsd)} ${formatPercentage(project.change1d)}`,
  ]);
  return ["🏗️ *TOP DEFI PROTOCOLS*", "", ...lines, "", clockLine(now)].join(
    "\n"
  );
}
