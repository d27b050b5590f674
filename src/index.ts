import "dotenv/config";
import { createBot } from "./bot/create_bot";
import { COMMAND_DESCRIPTIONS, createCommandHandlers } from "./bot/handlers";
import { BOT_IDENTITY, userAgentOf } from "./bot/identity";
import { loadConfig } from "./config";
import { createMarketProviders } from "./market/providers";
import { createReportComposer } from "./reporting/compose_report";
import { createHttpTransport, describeError } from "./util/http";
import { getLogger } from "./util/logger";

const logger = getLogger("main");

/**
 * Process entrypoint: builds the pipeline and runs the bot in long-polling mode.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  logger.info(
    { stage: config.stage, version: BOT_IDENTITY.version },
    `Starting ${BOT_IDENTITY.name}`
  );

  const transport = createHttpTransport({
    userAgent: userAgentOf(BOT_IDENTITY),
    timeoutMs: config.requestTimeoutMs,
  });
  const providers = createMarketProviders(transport, {
    endpoints: config.endpoints,
    marketListingLimit: config.marketListingLimit,
  });
  const composer = createReportComposer({ providers, bot: BOT_IDENTITY });
  const handlers = createCommandHandlers({
    composer,
    startedAt: new Date(),
    bot: BOT_IDENTITY,
  });
  const bot = createBot(config.botToken, handlers);

  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));

  await bot.telegram.setMyCommands([...COMMAND_DESCRIPTIONS]);
  logger.info("Running in polling mode");
  // Resolves once the bot is stopped
  await bot.launch({ dropPendingUpdates: true });
}

main().catch(err => {
  logger.fatal({ err }, `Error running bot: ${describeError(err)}`);
  process.exit(1);
});
