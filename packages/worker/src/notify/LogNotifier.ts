import { Logger } from "@chanwatch/core";
import { FormatOptions, Notification, formatNotification } from "./formatNotification";
import { Notifier } from "./Notifier";

export class LogNotifier implements Notifier {
  name = "log" as const;

  constructor(
    private readonly logger: Logger,
    private readonly opts: FormatOptions
  ) {}

  async send(notification: Notification): Promise<void> {
    const { text } = formatNotification(notification, this.opts);
    this.logger.info({ product: notification.match.productName, link: notification.messageLink }, `\n${text}`);
  }
}
