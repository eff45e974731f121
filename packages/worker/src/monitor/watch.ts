import { Telegraf } from "telegraf";
import { ChannelId, Logger } from "@chanwatch/core";
import { channelMatches } from "../channels";
import { ChannelMessage } from "../messages/types";
import { MessageProcessor } from "./processMessage";

// The fields of a Bot API channel post this watcher reads.
export interface ChannelPostLike {
  message_id: number;
  date: number;
  chat: { id: number; username?: string; title?: string };
  text?: string;
  caption?: string;
}

export function toChannelMessage(post: ChannelPostLike): ChannelMessage {
  return {
    id: post.message_id,
    date: new Date(post.date * 1000),
    text: post.text ?? post.caption ?? "",
    chat: { id: post.chat.id, username: post.chat.username, title: post.chat.title },
  };
}

export function isWatchedChannel(message: ChannelMessage, channels: ChannelId[]): boolean {
  return channels.length === 0 || channels.some((c) => channelMatches(message.chat, c));
}

/**
 * Feeds channel posts the bot receives into the processor. The bot has to be
 * an administrator of every watched channel to get its posts.
 */
export function registerChannelWatcher(
  bot: Telegraf,
  opts: { processor: MessageProcessor; channels: ChannelId[]; logger: Logger }
): void {
  const { processor, channels, logger } = opts;

  bot.on("channel_post", async (ctx) => {
    const message = toChannelMessage(ctx.update.channel_post);
    if (!isWatchedChannel(message, channels)) {
      logger.debug({ chatId: message.chat.id }, "Ignoring post from unwatched channel");
      return;
    }
    await processor.process(message);
  });

  bot.catch((error) => {
    logger.error({ err: error }, "Telegram update handler failed");
  });
}

export async function runWatcher(bot: Telegraf, logger: Logger): Promise<void> {
  const stop = (signal: string) => {
    logger.info({ signal }, "Monitoring stopped");
    bot.stop(signal);
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  logger.info("Monitor started. Listening for new channel posts... (Ctrl+C to stop)");
  await bot.launch({ allowedUpdates: ["channel_post"] });
}
