import type { z } from "zod";
import type { FailureMeta, HttpResult } from "../../util/http";
import { getLogger } from "../../util/logger";
import { fail, ok } from "../../util/result";

const logger = getLogger("market/providers");

/**
 * Validates a decoded body against the provider's wire schema.
 * A shape mismatch is treated as a malformed response.
 */
export function parsePayload<T>(
  provider: string,
  url: string,
  response: HttpResult<unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): HttpResult<T> {
  if (!response.ok) {
    return response;
  }

  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    logger.error(
      { provider, url, issues: parsed.error.issues.slice(0, 3) },
      "unexpected payload shape"
    );
    return malformed(url, `Unexpected ${provider} payload`);
  }
  return ok(parsed.data);
}

/**
 * Failure for a payload that decoded and validated but carries no usable record.
 */
export function missingData(
  provider: string,
  url: string,
  message: string
): HttpResult<never> {
  logger.warn({ provider, url }, message);
  return malformed(url, message);
}

function malformed(url: string, message: string): HttpResult<never> {
  const meta: FailureMeta = { kind: "malformed", url };
  return fail(message, meta);
}
