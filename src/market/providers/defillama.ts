import type { HttpResult, HttpTransport } from "../../util/http";
import { ok } from "../../util/result";
import type { DefiProtocol } from "../types";
import { parsePayload } from "./payload";
import { ProtocolListingSchema, toOptionalNumber } from "./schemas";

/**
 * Every protocol DefiLlama tracks, unfiltered. Ranking happens downstream.
 */
export async function fetchDefiProtocols(
  transport: HttpTransport,
  options: { baseUrl: string }
): Promise<HttpResult<DefiProtocol[]>> {
  const url = `${options.baseUrl}/protocols`;
  const payload = parsePayload(
    "defillama",
    url,
    await transport.getJson(url),
    ProtocolListingSchema
  );
  if (!payload.ok) return payload;

  return ok(
    payload.data.map(row => ({
      name: row.name ?? "Unknown",
      category: row.category ?? "DeFi",
      tvlUsd: toOptionalNumber(row.tvl),
      change1d: toOptionalNumber(row.change_1d),
    }))
  );
}
