import "dotenv/config";
import pino from "pino";

import { createTelegramBot, startBot } from "./bot.js";
import { loadConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { createHttpServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const logger = pino({ level: config.LOG_LEVEL });

  const ctx = await createAppContext(config, logger);
  const app = createHttpServer(ctx, logger);
  const bot = config.TELEGRAM_BOT_TOKEN ? createTelegramBot(ctx, config.TELEGRAM_BOT_TOKEN, logger) : undefined;

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    bot?.stop(signal);
    await app.close();
    await ctx.close();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    logger.info({ host: config.HOST, port: config.PORT }, "studio-booking-bot started");
    if (bot) {
      await startBot(bot, logger);
    } else {
      logger.warn("TELEGRAM_BOT_TOKEN not set, telegram channel disabled");
    }
  } catch (error) {
    logger.error({ err: error }, "failed to start studio-booking-bot");
    process.exit(1);
  }
}

void main();
