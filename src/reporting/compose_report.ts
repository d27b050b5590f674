/**
 * Report composer: drives the providers, ranks their output and renders text.
 *
 * Provider calls run one after another; a failed provider only removes its
 * own section. Anything thrown while assembling is turned into the fallback
 * message, so the compose* methods never reject.
 */
import { BOT_IDENTITY, BotIdentity } from "../bot/identity";
import type { MarketDataProviders } from "../market/providers";
import { selectHotDefi, selectTopMovers, selectTrending } from "../market/rank";
import { describeError } from "../util/http";
import { getLogger } from "../util/logger";
import { unwrapOr } from "../util/result";
import {
  renderBitcoinDetail,
  renderDefiDetail,
  renderTrendingDetail,
} from "./details";
import type {
  DetailVariant,
  MarketReportData,
  Report,
} from "./domain/types";
import {
  assembleMarketReport,
  renderFallback,
  renderReport,
} from "./sections";

export interface ReportComposerDependencies {
  providers: MarketDataProviders;
  now?: () => Date;
  bot?: BotIdentity;
}

export interface ReportComposer {
  /** Structured summary; may reject on an assembly defect. */
  buildMarketReport(): Promise<Report>;
  composeMarketReport(): Promise<string>;
  composeBitcoinReport(variant: DetailVariant): Promise<string>;
  composeTrendingReport(variant: DetailVariant): Promise<string>;
  composeDefiReport(variant: DetailVariant): Promise<string>;
}

export function createReportComposer(
  deps: ReportComposerDependencies
): ReportComposer {
  const logger = getLogger("reporting/compose_report");
  const { providers } = deps;
  const now = deps.now ?? (() => new Date());
  const bot = deps.bot ?? BOT_IDENTITY;

  async function collectMarketData(): Promise<MarketReportData> {
    const snapshot = unwrapOr(await providers.fetchGlobalSnapshot());
    const listing = unwrapOr(await providers.fetchMarketListing()) ?? [];
    const trending = unwrapOr(await providers.fetchTrending()) ?? [];
    const protocols = unwrapOr(await providers.fetchDefiProtocols()) ?? [];
    const sentiment = unwrapOr(await providers.fetchSentiment());
    const bitcoin = unwrapOr(await providers.fetchBitcoinQuote());

    return {
      snapshot,
      movers: selectTopMovers(listing),
      trending: selectTrending(trending),
      hotDefi: selectHotDefi(protocols),
      sentiment,
      bitcoin,
    };
  }

  async function buildMarketReport(): Promise<Report> {
    const data = await collectMarketData();
    const report = assembleMarketReport(data, now(), bot);
    logger.debug(
      { sections: report.sections.map(section => section.id) },
      "market report assembled"
    );
    return report;
  }

  async function guarded(
    label: string,
    compose: () => Promise<string>
  ): Promise<string> {
    try {
      return await compose();
    } catch (err) {
      logger.error({ err, report: label }, "Error creating report");
      return renderFallback(describeError(err), bot);
    }
  }

  return {
    buildMarketReport,
    composeMarketReport: () =>
      guarded("market", async () => renderReport(await buildMarketReport())),
    composeBitcoinReport: variant =>
      guarded("bitcoin", async () =>
        renderBitcoinDetail(
          unwrapOr(await providers.fetchBitcoinQuote()),
          variant,
          now()
        )
      ),
    composeTrendingReport: variant =>
      guarded("trending", async () =>
        renderTrendingDetail(
          selectTrending(unwrapOr(await providers.fetchTrending()) ?? []),
          variant,
          now()
        )
      ),
    composeDefiReport: variant =>
      guarded("defi", async () =>
        renderDefiDetail(
          selectHotDefi(unwrapOr(await providers.fetchDefiProtocols()) ?? []),
          variant,
          now()
        )
      ),
  };
}
