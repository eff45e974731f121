import type { ChannelId } from "@chanwatch/core";

export interface ChatInfo {
  id: number;
  username?: string;
  title?: string;
}

const NUMERIC_ID_RE = /^-?\d+$/;

/**
 * Accepts the forms people paste into a config file:
 * https://t.me/name, t.me/name, @name, name, or a numeric id like -1001234567890.
 */
export function normalizeChannelId(channelId: ChannelId): ChannelId {
  if (typeof channelId === "number") return channelId;

  const value = channelId.trim();
  if (NUMERIC_ID_RE.test(value)) return parseInt(value, 10);

  const urlIdx = value.toLowerCase().indexOf("t.me/");
  if (urlIdx >= 0) {
    const rest = value.slice(urlIdx + "t.me/".length);
    return rest.split("/")[0].split("?")[0].trim();
  }

  if (value.startsWith("@")) return value.slice(1);
  return value;
}

export function channelMatches(chat: ChatInfo, channelId: ChannelId): boolean {
  const normalized = normalizeChannelId(channelId);
  if (typeof normalized === "number") return chat.id === normalized;
  return !!chat.username && chat.username.toLowerCase() === normalized.toLowerCase();
}

export function channelDisplayName(chat: ChatInfo): string {
  if (chat.username) return `@${chat.username}`;
  if (chat.title) return chat.title;
  return `Channel ${chat.id}`;
}

export function buildMessageLink(chat: ChatInfo, messageId: number): string {
  if (chat.username) return `https://t.me/${chat.username}/${messageId}`;
  // private channels: https://t.me/c/<id without the -100 prefix>/<message>
  let chatId = String(chat.id);
  if (chatId.startsWith("-100")) chatId = chatId.slice(4);
  return `https://t.me/c/${chatId}/${messageId}`;
}
