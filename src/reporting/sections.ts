/**
 * Summary layout.
 *
 * Section order is fixed: header, bitcoin, overview, sentiment, movers,
 * trending, defi, footer. A section appears only when its data is present;
 * header and footer always do.
 */
import type { BotIdentity } from "../bot/identity";
import {
  classifySentiment,
  formatNumber,
  formatPercentage,
  formatUsdPrice,
  formatUtc,
  NOT_AVAILABLE,
  sentimentEmoji,
  truncate,
} from "../market/format";
import type {
  AssetQuote,
  DefiProtocol,
  MarketSnapshot,
  SentimentReading,
  TopMovers,
  TrendingEntry,
} from "../market/types";
import type {
  MarketReportData,
  Report,
  ReportSection,
} from "./domain/types";

/** Display widths; they bound message size and are not data rules. */
export const NAME_WIDTH = {
  mover: 15,
  trending: 12,
  defiName: 15,
  defiCategory: 8,
} as const;

/** The summary lists only the head of the trending list. */
export const SUMMARY_TRENDING_COUNT = 3;

export const ERROR_DETAIL_LIMIT = 50;

const DIVIDER = "━━━━━━━━━━━━━━━━━━━━";

export function headerSection(generatedAt: Date): ReportSection {
  return {
    id: "header",
    lines: ["🚀 *CRYPTO MARKET ALPHA* 🚀", `📅 ${formatUtc(generatedAt)}`],
  };
}

export function bitcoinSection(quote: AssetQuote): ReportSection {
  const price = formatUsdPrice(quote.priceUsd);
  const change = formatPercentage(quote.change24h);
  return { id: "bitcoin", lines: [`₿ *Bitcoin*: ${price} ${change}`] };
}

export function overviewSection(snapshot: MarketSnapshot): ReportSection {
  const dominance =
    snapshot.btcDominance === undefined
      ? NOT_AVAILABLE
      : `${snapshot.btcDominance.toFixed(1)}%`;
  const active =
    snapshot.activeCryptocurrencies === undefined
      ? NOT_AVAILABLE
      : snapshot.activeCryptocurrencies.toLocaleString("en-US");
  return {
    id: "overview",
    lines: [
      "📊 *MARKET OVERVIEW*",
      `💎 Total Cap: ${formatNumber(snapshot.totalMarketCapUsd)}`,
      `💵 24h Volume: ${formatNumber(snapshot.totalVolumeUsd)}`,
      `📊 24h Change: ${formatPercentage(snapshot.marketCapChange24h)}`,
      `₿ BTC Dom: ${dominance}`,
      `🪙 Active Assets: ${active}`,
    ],
  };
}

export function sentimentSection(reading: SentimentReading): ReportSection {
  const emoji = sentimentEmoji(classifySentiment(reading.value));
  return {
    id: "sentiment",
    lines: [
      "🎭 *SENTIMENT*",
      `${emoji} Fear & Greed: ${reading.value}/100`,
      `📝 ${reading.classification}`,
    ],
  };
}

function moverLine(marker: string, quote: AssetQuote): string {
  const name = truncate(quote.name, NAME_WIDTH.mover);
  const symbol = quote.symbol.toUpperCase();
  return `${marker} ${name} (${symbol}) ${formatPercentage(quote.change24h)}`;
}

export function moversSection(movers: TopMovers): ReportSection | undefined {
  if (!movers.gainer && !movers.loser) return undefined;
  const lines = ["📈 *TOP MOVERS*"];
  if (movers.gainer) lines.push(moverLine("🥇", movers.gainer));
  if (movers.loser) lines.push(moverLine("🥉", movers.loser));
  return { id: "movers", lines };
}

export function rankLabel(rank: number | undefined, fallback: string): string {
  return rank === undefined ? fallback : `#${rank}`;
}

export function trendingSection(
  entries: readonly TrendingEntry[]
): ReportSection | undefined {
  if (entries.length === 0) return undefined;
  const lines = ["🔥 *TRENDING*"];
  entries.slice(0, SUMMARY_TRENDING_COUNT).forEach((coin, i) => {
    const name = truncate(coin.name, NAME_WIDTH.trending);
    const parts = [
      `${i + 1}. ${name} (${coin.symbol.toUpperCase()})`,
      rankLabel(coin.marketCapRank, ""),
    ];
    lines.push(parts.filter(part => part.length > 0).join(" "));
  });
  return { id: "trending", lines };
}

export function defiSection(
  hotDefi: readonly DefiProtocol[]
): ReportSection | undefined {
  const top = hotDefi[0];
  if (!top) return undefined;
  return {
    id: "defi",
    lines: [
      "🏗️ *TOP DEFI*",
      `⭐ ${truncate(top.name, NAME_WIDTH.defiName)}`,
      `💎 TVL: ${formatNumber(top.tvlUsd)} ${formatPercentage(top.change1d)}`,
      `🏗️ ${truncate(top.category, NAME_WIDTH.defiCategory)}`,
    ],
  };
}

export function footerSection(bot: BotIdentity): ReportSection {
  return {
    id: "footer",
    lines: [
      DIVIDER,
      `🤖 *${bot.name}* v${bot.version}`,
      "💡 Use /menu for more options",
    ],
  };
}

/**
 * Builds the summary from already-ranked data.
 */
export function assembleMarketReport(
  data: MarketReportData,
  generatedAt: Date,
  bot: BotIdentity
): Report {
  const optional: Array<ReportSection | undefined> = [
    data.bitcoin && bitcoinSection(data.bitcoin),
    data.snapshot && overviewSection(data.snapshot),
    data.sentiment && sentimentSection(data.sentiment),
    moversSection(data.movers),
    trendingSection(data.trending),
    defiSection(data.hotDefi),
  ];

  const sections: ReportSection[] = [headerSection(generatedAt)];
  for (const section of optional) {
    if (section) sections.push(section);
  }
  sections.push(footerSection(bot));

  return { generatedAt, sections };
}

/**
 * Plain text with `*bold*` markup; sections separated by a blank line.
 */
export function renderReport(report: Report): string {
  return report.sections.map(section => section.lines.join("\n")).join("\n\n");
}

export function renderFallback(errorDetail: string, bot: BotIdentity): string {
  return [
    "⚠️ *MARKET DATA ERROR* ⚠️",
    "",
    "❌ Unable to fetch data",
    `🔍 Error: ${truncate(errorDetail, ERROR_DETAIL_LIMIT)}...`,
    "",
    "🔄 Try again in a few moments",
    `🤖 *${bot.name}* v${bot.version}`,
  ].join("\n");
}
