/**
 * Presentation helpers for report text. Pure; absent input renders "N/A".
 */
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";

dayjs.extend(utc);

export const NOT_AVAILABLE = "N/A";

const MAGNITUDES: ReadonlyArray<{ threshold: number; suffix: string }> = [
  { threshold: 1e12, suffix: "T" },
  { threshold: 1e9, suffix: "B" },
  { threshold: 1e6, suffix: "M" },
  { threshold: 1e3, suffix: "K" },
];

/**
 * USD amount abbreviated by magnitude: `$2.50B`, `$-1.20M`, `$999.00`.
 * The tier is chosen on the absolute value; the sign is kept.
 */
export function formatNumber(amount?: number, decimals = 2): string {
  if (amount === undefined || Number.isNaN(amount)) return NOT_AVAILABLE;

  const magnitude = Math.abs(amount);
  for (const { threshold, suffix } of MAGNITUDES) {
    if (magnitude >= threshold) {
      return `$${(amount / threshold).toFixed(decimals)}${suffix}`;
    }
  }
  return `$${amount.toFixed(decimals)}`;
}

/**
 * Percentage with a direction marker. Zero counts as non-positive.
 */
export function formatPercentage(value?: number): string {
  if (value === undefined || Number.isNaN(value)) return NOT_AVAILABLE;
  if (value > 0) return `📈 +${value.toFixed(2)}%`;
  return `📉 ${value.toFixed(2)}%`;
}

/**
 * Full-precision USD price with thousands separators: `$64,250`.
 */
export function formatUsdPrice(value?: number, decimals = 0): string {
  if (value === undefined || Number.isNaN(value)) return NOT_AVAILABLE;
  return `$${value.toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  })}`;
}

export type SentimentBucket =
  | "extreme-greed"
  | "greed"
  | "neutral"
  | "fear"
  | "extreme-fear";

// Inclusive lower bounds, highest first
const SENTIMENT_BUCKETS: ReadonlyArray<{ min: number; bucket: SentimentBucket }> = [
  { min: 75, bucket: "extreme-greed" },
  { min: 55, bucket: "greed" },
  { min: 45, bucket: "neutral" },
  { min: 25, bucket: "fear" },
];

export function classifySentiment(value: number): SentimentBucket {
  for (const { min, bucket } of SENTIMENT_BUCKETS) {
    if (value >= min) return bucket;
  }
  return "extreme-fear";
}

const SENTIMENT_EMOJI: Record<SentimentBucket, string> = {
  "extreme-greed": "🤑",
  greed: "😊",
  neutral: "😐",
  fear: "😨",
  "extreme-fear": "😱",
};

export function sentimentEmoji(bucket: SentimentBucket): string {
  return SENTIMENT_EMOJI[bucket];
}

/** Clips text to its first `length` characters. */
export function truncate(text: string, length: number): string {
  return Array.from(text).slice(0, length).join("");
}

/**
 * UTC wall-clock label, e.g. `2026-10-18 09:30 UTC`.
 */
export function formatUtc(date: Date, pattern = "YYYY-MM-DD HH:mm"): string {
  return `${dayjs(date).utc().format(pattern)} UTC`;
}
