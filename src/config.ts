import { z } from "zod";
import { DEFAULT_ENDPOINTS } from "./market/providers/endpoints";
import { DEFAULT_TIMEOUT_MS, describeError } from "./util/http";
import { getEnvVar, getNumber, getStage, isProduction } from "./util/env";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const ConfigSchema = z.object({
  botToken: z.string().min(1),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(120_000)
    .default(DEFAULT_TIMEOUT_MS),
  marketListingLimit: z.number().int().positive().max(250).default(50),
  endpoints: z
    .object({
      coingeckoBaseUrl: z.string().url(),
      defillamaBaseUrl: z.string().url(),
      fearGreedUrl: z.string().url(),
    })
    .default(DEFAULT_ENDPOINTS),
  stage: z.string(),
  production: z.boolean(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Reads and validates process configuration.
 * Throws ConfigError when TELEGRAM_BOT_TOKEN is missing or a value is invalid.
 */
export function loadConfig(): AppConfig {
  const botToken = getEnvVar("TELEGRAM_BOT_TOKEN");
  if (!botToken) {
    throw new ConfigError(
      "TELEGRAM_BOT_TOKEN environment variable not set (get one from @BotFather)"
    );
  }

  let raw: Record<string, unknown>;
  try {
    raw = {
      botToken,
      requestTimeoutMs: getNumber("REQUEST_TIMEOUT_MS"),
      marketListingLimit: getNumber("MARKET_LISTING_LIMIT"),
      endpoints: {
        coingeckoBaseUrl: trimSlash(
          getEnvVar("COINGECKO_BASE_URL") ?? DEFAULT_ENDPOINTS.coingeckoBaseUrl
        ),
        defillamaBaseUrl: trimSlash(
          getEnvVar("DEFILLAMA_BASE_URL") ?? DEFAULT_ENDPOINTS.defillamaBaseUrl
        ),
        fearGreedUrl:
          getEnvVar("FEAR_GREED_URL") ?? DEFAULT_ENDPOINTS.fearGreedUrl,
      },
      stage: getStage(),
      production: isProduction(),
    };
  } catch (e) {
    throw new ConfigError(describeError(e));
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.toString()}`);
  }
  return parsed.data;
}
