import { ConfigError, loadConfig } from "@src/config";
import { DEFAULT_ENDPOINTS } from "@src/market/providers";

describe("loadConfig", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv, STAGE: "dev" };
    delete process.env.TELEGRAM_BOT_TOKEN;
    delete process.env.REQUEST_TIMEOUT_MS;
    delete process.env.MARKET_LISTING_LIMIT;
    delete process.env.COINGECKO_BASE_URL;
    delete process.env.DEFILLAMA_BASE_URL;
    delete process.env.FEAR_GREED_URL;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("requires a bot token", () => {
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow("TELEGRAM_BOT_TOKEN");
  });

  test("applies defaults", () => {
    process.env.TELEGRAM_BOT_TOKEN = "test-token";
    const config = loadConfig();
    expect(config).toEqual({
      botToken: "test-token",
      requestTimeoutMs: 15_000,
      marketListingLimit: 50,
      endpoints: DEFAULT_ENDPOINTS,
      stage: "dev",
      production: false,
    });
  });

  test("reads overrides and trims trailing slashes from base urls", () => {
    process.env.TELEGRAM_BOT_TOKEN__dev = "staged-token";
    process.env.REQUEST_TIMEOUT_MS = "5000";
    process.env.MARKET_LISTING_LIMIT = "100";
    process.env.COINGECKO_BASE_URL = "https://cg.example.test/api/v3/";
    const config = loadConfig();
    expect(config.botToken).toBe("staged-token");
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.marketListingLimit).toBe(100);
    expect(config.endpoints.coingeckoBaseUrl).toBe(
      "https://cg.example.test/api/v3"
    );
    expect(config.endpoints.defillamaBaseUrl).toBe("https://api.llama.fi");
  });

  test("rejects out-of-range values", () => {
    process.env.TELEGRAM_BOT_TOKEN = "test-token";
    process.env.MARKET_LISTING_LIMIT = "1000";
    expect(() => loadConfig()).toThrow(/Invalid configuration/);
  });

  test("rejects non-numeric values", () => {
    process.env.TELEGRAM_BOT_TOKEN = "test-token";
    process.env.REQUEST_TIMEOUT_MS = "soon";
    expect(() => loadConfig()).toThrow(
      "Env var REQUEST_TIMEOUT_MS is not a number: soon"
    );
  });
});
