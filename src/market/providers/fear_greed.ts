import type { HttpResult, HttpTransport } from "../../util/http";
import { buildUrl } from "../../util/http";
import { ok } from "../../util/result";
import type { SentimentReading } from "../types";
import { missingData, parsePayload } from "./payload";
import { FearGreedResponseSchema, toOptionalNumber } from "./schemas";

const PROVIDER = "alternative.me";

/**
 * Latest Fear & Greed index reading.
 */
export async function fetchSentiment(
  transport: HttpTransport,
  options: { url: string }
): Promise<HttpResult<SentimentReading>> {
  const params = { limit: 1 };
  const target = buildUrl(options.url, params);
  const payload = parsePayload(
    PROVIDER,
    target,
    await transport.getJson(options.url, params),
    FearGreedResponseSchema
  );
  if (!payload.ok) return payload;

  const latest = payload.data.data[0];
  if (!latest) return missingData(PROVIDER, target, "Empty sentiment series");

  const value = toOptionalNumber(latest.value);
  if (value === undefined || !Number.isInteger(value)) {
    return missingData(PROVIDER, target, "Sentiment value is not an integer");
  }

  return ok({
    value,
    classification: latest.value_classification ?? "Unknown",
    timestamp: latest.timestamp == null ? "" : String(latest.timestamp),
  });
}
