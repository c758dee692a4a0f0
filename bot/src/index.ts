import { config, getBotToken } from "./config.js";
import { createApp } from "./app.js";
import { logger } from "./middleware/logging.js";
import { COMMANDS } from "./services/commands.js";
import { createBot, createTelegramSender } from "./services/telegram.js";

const bot = createBot(getBotToken());
let polling = false;

const app = createApp({
  send: createTelegramSender(bot),
  isReady: () => polling,
});

const server = app.listen(config.port, () => {
  logger.info("Bot delivery receiver started", {
    port: config.port,
    env: config.nodeEnv,
  });
});

bot.api.setMyCommands(COMMANDS.map((c) => ({ ...c }))).catch((error: unknown) => {
  logger.warn("Failed to register bot commands", {
    reason: error instanceof Error ? error.message : String(error),
  });
});

bot
  .start({
    drop_pending_updates: config.dropPendingUpdates,
    onStart: (me) => {
      polling = true;
      logger.info("Telegram polling started", { username: me.username });
    },
  })
  .catch((error: unknown) => {
    polling = false;
    logger.error("Telegram polling stopped", error instanceof Error ? error : undefined);
    process.exit(1);
  });

async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  polling = false;

  setTimeout(() => {
    process.exit(1);
  }, 30000).unref();

  try {
    await bot.stop();
  } catch (error) {
    logger.error("Failed to stop Telegram polling", error instanceof Error ? error : undefined);
  }

  server.close(() => {
    process.exit(0);
  });
}

function onSignal(signal: string) {
  shutdown(signal).catch((error: unknown) => {
    logger.error("Shutdown failed", error instanceof Error ? error : undefined);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
