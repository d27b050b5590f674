import { getLogger } from "./logger";
import { fail, ok, Result } from "./result";

/**
 * Shared JSON-over-HTTP transport used by every market data provider.
 *
 * - One GET per call, bounded by `timeoutMs`; no retries
 * - Holds no per-request state, so a single instance serves concurrent reports
 * - Never throws: timeouts, connection errors, non-2xx statuses and
 *   undecodable bodies are logged and returned as failures
 */

export type FailureKind = "unavailable" | "malformed";

export interface FailureMeta {
  kind: FailureKind;
  url: string;
  status?: number;
}

export type HttpResult<T> = Result<T, FailureMeta>;

export type QueryParams = Record<string, string | number | boolean>;

/** The subset of the fetch Response the transport reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (
  input: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResponse>;

export interface HttpTransport {
  getJson(url: string, params?: QueryParams): Promise<HttpResult<unknown>>;
}

export interface HttpTransportOptions {
  userAgent: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

export const DEFAULT_TIMEOUT_MS = 15_000;

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  const sep = url.includes("?") ? "&" : "?";
  return `${url}${sep}${search.toString()}`;
}

export function createHttpTransport(
  options: HttpTransportOptions
): HttpTransport {
  const logger = getLogger("util/http");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  const headers = {
    Accept: "application/json",
    "User-Agent": options.userAgent,
  };

  async function getJson(
    url: string,
    params?: QueryParams
  ): Promise<HttpResult<unknown>> {
    const target = buildUrl(url, params);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let res: HttpResponse;
    try {
      res = await fetchFn(target, { headers, signal: controller.signal });
    } catch (err) {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        logger.error({ url: target, timeoutMs }, "request timed out");
        return failure(`Timeout requesting ${target}`, {
          kind: "unavailable",
          url: target,
        });
      }
      logger.error({ url: target, err }, "request failed");
      return failure(`Request error for ${target}: ${describeError(err)}`, {
        kind: "unavailable",
        url: target,
      });
    }

    try {
      if (!res.ok) {
        logger.error({ url: target, status: res.status }, "unexpected status");
        return failure(`HTTP ${res.status} for ${target}`, {
          kind: "unavailable",
          url: target,
          status: res.status,
        });
      }

      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        logger.error({ url: target, err }, "reading body failed");
        return failure(`Request error for ${target}: ${describeError(err)}`, {
          kind: "unavailable",
          url: target,
          status: res.status,
        });
      }

      try {
        const data: unknown = JSON.parse(text);
        return ok(data);
      } catch (err) {
        logger.error({ url: target, err }, "JSON decode error");
        return failure(`JSON decode error for ${target}: ${describeError(err)}`, {
          kind: "malformed",
          url: target,
          status: res.status,
        });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  return { getJson };
}

function failure(message: string, meta: FailureMeta): HttpResult<never> {
  return fail(message, meta);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
