import { setTimeout } from "timers/promises";
import { Logger, MatchResult, ProductMatcher } from "@chanwatch/core";
import { buildMessageLink, channelDisplayName } from "../channels";
import { isMessageTooOld } from "../messages/age";
import { ChannelMessage, ScanStats, emptyStats } from "../messages/types";
import { Notifier } from "../notify/Notifier";
import { MatchStore } from "../storage/sqlite";

const PREVIEW_CHARS = 100;

export interface MessageProcessorDeps {
  matcher: ProductMatcher;
  notifiers: Notifier[];
  store: MatchStore | null;
  logger: Logger;
  notifyDelayMs: number;
  maxAgeDays?: number;
  now?: () => Date;
}

function preview(text: string): string {
  const flat = text.slice(0, PREVIEW_CHARS).replace(/\n/g, " ");
  return text.length > PREVIEW_CHARS ? `${flat}...` : flat;
}

/**
 * Runs one message through matching, notification and persistence.
 * Never throws: failures are logged and counted in `stats.errors`.
 */
export class MessageProcessor {
  private readonly now: () => Date;

  constructor(private readonly deps: MessageProcessorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async process(message: ChannelMessage, stats: ScanStats = emptyStats()): Promise<MatchResult[]> {
    const { logger } = this.deps;
    const log = logger.child({ messageId: message.id, chatId: message.chat.id });

    try {
      stats.messagesScanned += 1;

      if (isMessageTooOld(message.date, this.deps.maxAgeDays, this.now())) {
        log.debug("⏭️ Skipped: too old");
        stats.messagesSkippedOld += 1;
        return [];
      }

      if (!message.text) {
        log.debug("⏭️ Skipped: no text");
        stats.messagesNoText += 1;
        return [];
      }

      log.info(`🔍 ${preview(message.text)}`);
      const matches = this.deps.matcher.matchMessage(message.text);
      if (matches.length === 0) {
        log.info("❌ No product matches");
        stats.messagesNoMatch += 1;
        return [];
      }

      const channelName = channelDisplayName(message.chat);
      const messageLink = buildMessageLink(message.chat, message.id);
      log.info({ count: matches.length }, "✅ Found product match(es)");

      let notified = false;
      for (const [idx, match] of matches.entries()) {
        log.info(
          { product: match.productName, keywords: match.matchedKeywords, price: match.price, currency: match.currency },
          `[${idx + 1}/${matches.length}] 📦 ${match.productName}`
        );

        if (match.notify && this.deps.notifiers.length > 0) {
          if (notified && this.deps.notifyDelayMs > 0) {
            await setTimeout(this.deps.notifyDelayMs);
          }
          await this.notify(log, { match, messageText: message.text, messageLink, channelName, messageDate: message.date });
          notified = true;
        }

        if (this.deps.store) {
          this.save(log, match, message, channelName, messageLink);
        }
        stats.matchesFound += 1;
      }
      return matches;
    } catch (error) {
      log.error({ err: error }, "Error processing message");
      stats.errors += 1;
      return [];
    }
  }

  private async notify(log: Logger, notification: Parameters<Notifier["send"]>[0]): Promise<void> {
    for (const notifier of this.deps.notifiers) {
      try {
        await notifier.send(notification);
      } catch (error) {
        log.error({ err: error, notifier: notifier.name }, "❌ Failed to send notification");
      }
    }
  }

  private save(log: Logger, match: MatchResult, message: ChannelMessage, channelName: string, messageLink: string) {
    const { store } = this.deps;
    if (!store) return;
    try {
      store.saveMatch({
        timestamp: this.now().toISOString(),
        productName: match.productName,
        matchedKeywords: match.matchedKeywords,
        price: match.price,
        currency: match.currency,
        channelName,
        messageText: message.text,
        messageLink,
        messageId: message.id,
        chatId: message.chat.id,
        messageDate: message.date ? message.date.toISOString() : null,
      });
    } catch (error) {
      log.error({ err: error }, "Failed to save match");
    }
  }
}
