import { Telegram } from "telegraf";
import {
  Config,
  Logger,
  ProductMatcher,
  WatchConfig,
  createLogger,
  getConfig,
  loadWatchConfig,
} from "@chanwatch/core";
import { MessageProcessor } from "./monitor/processMessage";
import { LogNotifier } from "./notify/LogNotifier";
import { Notifier } from "./notify/Notifier";
import { TelegramNotifier } from "./notify/TelegramNotifier";
import { MatchStore, openMatchStore } from "./storage/sqlite";

export interface Runtime {
  config: Config;
  watchConfig: WatchConfig;
  logger: Logger;
  matcher: ProductMatcher;
  store: MatchStore | null;
  processor: MessageProcessor;
  close(): void;
}

export function buildMatcher(watchConfig: WatchConfig, logger: Logger): ProductMatcher {
  if (watchConfig.products.length === 0) {
    logger.warn("No products configured, nothing will match");
  }
  return new ProductMatcher({
    products: watchConfig.products,
    matching: watchConfig.matching,
    pricePatterns: watchConfig.pricePatterns,
    priceNumberFormat: watchConfig.priceNumberFormat,
    logger,
  });
}

export function buildNotifiers(
  watchConfig: WatchConfig,
  botToken: string | undefined,
  logger: Logger
): Notifier[] {
  const { includeKeywords, includeLink, telegram } = watchConfig.notifications;
  const opts = { includeKeywords, includeLink };

  if (telegram.enabled) {
    if (botToken && telegram.chatId !== undefined) {
      return [new TelegramNotifier(new Telegram(botToken), telegram.chatId, opts, logger)];
    }
    logger.warn(
      { hasToken: Boolean(botToken), hasChatId: telegram.chatId !== undefined },
      "Telegram notifications need TELEGRAM_BOT_TOKEN and notifications.telegram.chatId, logging matches instead"
    );
  }
  return [new LogNotifier(logger, opts)];
}

/**
 * Wires the environment config, the watch config and the match store into
 * a ready-to-use processor.
 */
export async function createRuntime(opts: { notify?: boolean; store?: boolean } = {}): Promise<Runtime> {
  const config = getConfig();
  const logger = createLogger(config.log.level);

  const watchConfig = await loadWatchConfig(config.watchConfigPath);
  logger.info(
    {
      path: config.watchConfigPath,
      channels: watchConfig.channels.length,
      products: watchConfig.products.length,
      pricePatterns: watchConfig.pricePatterns.length,
    },
    "Loaded watch config"
  );

  const matcher = buildMatcher(watchConfig, logger);

  const wantStore = (opts.store ?? true) && watchConfig.monitoring.saveMatches;
  const store = wantStore ? await openMatchStore(config.sqlitePath) : null;

  const notifiers = opts.notify === false ? [] : buildNotifiers(watchConfig, config.telegram.botToken, logger);

  const processor = new MessageProcessor({
    matcher,
    notifiers,
    store,
    logger,
    notifyDelayMs: watchConfig.monitoring.notifyDelayMs,
    maxAgeDays: watchConfig.monitoring.maxAgeDays,
  });

  return {
    config,
    watchConfig,
    logger,
    matcher,
    store,
    processor,
    close: () => store?.close(),
  };
}
