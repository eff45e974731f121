import type { FmtString } from "telegraf/format";
import { Logger } from "@chanwatch/core";
import { FormatOptions, Notification, formatNotification } from "./formatNotification";
import { Notifier } from "./Notifier";

// The slice of telegraf's Telegram client this notifier uses. Formatting
// travels as entities on the FmtString, never as a parse mode.
export interface TelegramSender {
  sendMessage(
    chatId: number | string,
    text: FmtString,
    extra: { link_preview_options: { is_disabled: boolean } }
  ): Promise<unknown>;
}

export class TelegramNotifier implements Notifier {
  name = "telegram" as const;

  constructor(
    private readonly telegram: TelegramSender,
    private readonly chatId: number | string,
    private readonly opts: FormatOptions,
    private readonly logger: Logger
  ) {}

  async send(notification: Notification): Promise<void> {
    const text = formatNotification(notification, this.opts);
    await this.telegram.sendMessage(this.chatId, text, {
      link_preview_options: { is_disabled: true },
    });
    this.logger.info({ product: notification.match.productName, chatId: this.chatId }, "📤 Notification sent to Telegram");
  }
}
