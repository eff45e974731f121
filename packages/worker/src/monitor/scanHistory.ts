import { ChannelId, Logger } from "@chanwatch/core";
import { ChatInfo, channelDisplayName, channelMatches } from "../channels";
import { ChannelMessage, ScanStats, addStats, emptyStats } from "../messages/types";
import { MessageProcessor } from "./processMessage";

export interface ChannelScan {
  channel: string;
  stats: ScanStats;
}

export interface HistoryScanResult {
  overall: ScanStats;
  channels: ChannelScan[];
}

interface ChannelGroup {
  chat: ChatInfo;
  messages: ChannelMessage[];
}

function groupByChannel(messages: ChannelMessage[]): ChannelGroup[] {
  const groups = new Map<number, ChannelGroup>();
  for (const message of messages) {
    const group = groups.get(message.chat.id);
    if (group) {
      group.messages.push(message);
    } else {
      groups.set(message.chat.id, { chat: message.chat, messages: [message] });
    }
  }
  return [...groups.values()];
}

/**
 * Replays an exported history: per configured channel, the newest `limit`
 * messages are processed oldest first.
 */
export async function scanHistory(
  messages: ChannelMessage[],
  opts: { processor: MessageProcessor; channels: ChannelId[]; limit: number; logger: Logger }
): Promise<HistoryScanResult> {
  const { processor, channels, limit, logger } = opts;
  logger.info(`HISTORY SCAN: checking last ${limit} messages in each channel...`);

  const groups = groupByChannel(messages).filter(
    (g) => channels.length === 0 || channels.some((c) => channelMatches(g.chat, c))
  );
  if (groups.length === 0) {
    logger.warn("No messages from configured channels in the export");
  }

  const overall = emptyStats();
  const scans: ChannelScan[] = [];
  for (const group of groups) {
    const channel = channelDisplayName(group.chat);
    const stats = emptyStats();
    const ordered = [...group.messages].sort((a, b) => a.id - b.id);
    const selected = limit > 0 ? ordered.slice(-limit) : ordered;
    logger.info({ channel, requested: limit, available: ordered.length }, `📊 Scanning channel: ${channel}`);

    for (const message of selected) {
      await processor.process(message, stats);
    }

    logger.info({ channel, ...stats }, `✓ Scanned ${stats.messagesScanned} messages, ${stats.matchesFound} match(es)`);
    addStats(overall, stats);
    scans.push({ channel, stats });
  }

  logger.info({ ...overall }, "📊 SCAN COMPLETE");
  if (overall.matchesFound === 0) {
    logger.info("ℹ️ No matches found in scanned messages");
  }
  return { overall, channels: scans };
}
