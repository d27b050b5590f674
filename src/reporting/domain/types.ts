/**
 * Domain types for the composed market report.
 */
import type {
  AssetQuote,
  DefiProtocol,
  MarketSnapshot,
  SentimentReading,
  TopMovers,
  TrendingEntry,
} from "../../market/types";

export type ReportSectionId =
  | "header"
  | "bitcoin"
  | "overview"
  | "sentiment"
  | "movers"
  | "trending"
  | "defi"
  | "footer";

export interface ReportSection {
  readonly id: ReportSectionId;
  readonly lines: readonly string[];
}

export interface Report {
  readonly generatedAt: Date;
  /** Included sections, in display order */
  readonly sections: readonly ReportSection[];
}

/**
 * Everything a summary needs, after ranking. Absent records are undefined;
 * empty lists mean the provider returned nothing usable.
 */
export interface MarketReportData {
  snapshot?: MarketSnapshot;
  movers: TopMovers;
  trending: TrendingEntry[];
  hotDefi: DefiProtocol[];
  sentiment?: SentimentReading;
  bitcoin?: AssetQuote;
}

/** Verbose layout for slash commands, compact layout for button refreshes. */
export type DetailVariant = "command" | "button";
