import { KeywordMatcher, WatchConfig, createLogger, getConfig, loadWatchConfig } from "@chanwatch/core";
import { buildMatcher } from "../../runtime";

export interface ConfigSummary {
  channels: WatchConfig["channels"];
  products: Array<{ name: string; literalKeywords: string[]; priceRange: string }>;
  pricePatterns: number;
  saveMatches: boolean;
  telegramNotifications: boolean;
}

function describeRange(range: WatchConfig["products"][number]["priceRange"]): string {
  if (!range || (range.min === undefined && range.max === undefined)) return "any";
  return `${range.min ?? 0} - ${range.max ?? "∞"}`;
}

/** Keywords that will be matched literally because they do not compile as patterns. */
export function summarizeWatchConfig(watchConfig: WatchConfig, keywordMatcher: KeywordMatcher): ConfigSummary {
  return {
    channels: watchConfig.channels,
    products: watchConfig.products.map((p) => ({
      name: p.name,
      literalKeywords: watchConfig.matching.regexEnabled
        ? [...p.keywords, ...p.excludeKeywords].filter((k) => keywordMatcher.compile(k).mode === "literal")
        : [],
      priceRange: describeRange(p.priceRange),
    })),
    pricePatterns: watchConfig.pricePatterns.length,
    saveMatches: watchConfig.monitoring.saveMatches,
    telegramNotifications:
      watchConfig.notifications.telegram.enabled && watchConfig.notifications.telegram.chatId !== undefined,
  };
}

export async function checkConfigCommand() {
  const config = getConfig();
  const logger = createLogger(config.log.level);
  const watchConfig = await loadWatchConfig(config.watchConfigPath);

  // building the matcher logs every invalid keyword and price pattern
  buildMatcher(watchConfig, logger);
  const summary = summarizeWatchConfig(watchConfig, new KeywordMatcher(watchConfig.matching));
  console.log(JSON.stringify(summary, null, 2));
}
