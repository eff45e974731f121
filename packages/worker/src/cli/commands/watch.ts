import { Telegraf } from "telegraf";
import { registerChannelWatcher, runWatcher } from "../../monitor/watch";
import { createRuntime } from "../../runtime";

export async function watchCommand() {
  const runtime = await createRuntime();
  const { config, logger, watchConfig } = runtime;

  try {
    const token = config.telegram.botToken;
    if (!token) {
      throw new Error("TELEGRAM_BOT_TOKEN is required to watch channels.");
    }
    if (watchConfig.channels.length === 0) {
      logger.warn("No channels configured, posts from every channel the bot is in will be checked");
    }

    const bot = new Telegraf(token);
    registerChannelWatcher(bot, { processor: runtime.processor, channels: watchConfig.channels, logger });
    logger.info({ channels: watchConfig.channels }, "Starting channel watcher");
    await runWatcher(bot, logger);
  } finally {
    runtime.close();
  }
}
