import { FmtString, bold, fmt, join, link } from "telegraf/format";
import { MatchResult } from "@chanwatch/core";

export const MAX_MESSAGE_CHARS = 500;

export interface Notification {
  match: MatchResult;
  messageText: string;
  messageLink?: string;
  channelName?: string;
  messageDate?: Date | null;
}

export interface FormatOptions {
  includeKeywords: boolean;
  includeLink: boolean;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function formatPrice(value: number, currency: string): string {
  // euro goes after the amount, everything else before
  return currency === "€" ? `${value.toFixed(2)}${currency}` : `${currency}${value.toFixed(2)}`;
}

function clip(text: string, max = MAX_MESSAGE_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Builds the notification as text plus message entities, so channel names and
 * post bodies go out verbatim with no Markdown to escape.
 */
export function formatNotification(n: Notification, opts: FormatOptions): FmtString {
  const { match } = n;
  const parts: FmtString[] = [fmt`🔔 ${bold(`Found: ${match.productName}`)}\n`];

  if (n.channelName) {
    parts.push(fmt`📢 ${bold("Channel:")} ${n.channelName}`);
  }
  if (n.messageDate) {
    parts.push(fmt`🕒 ${bold("Posted:")} ${formatTimestamp(n.messageDate)}`);
  }
  if (opts.includeKeywords && match.matchedKeywords.length > 0) {
    parts.push(fmt`🔑 ${bold("Keywords:")} ${match.matchedKeywords.join(", ")}`);
  }
  if (match.price) {
    parts.push(fmt`💰 ${bold("Price:")} ${formatPrice(match.price, match.currency ?? "")}`);
  }

  parts.push(fmt``);
  parts.push(fmt`📝 ${bold("Message:")}\n${clip(n.messageText)}`);

  if (opts.includeLink && n.messageLink) {
    parts.push(fmt`\n🔗 ${link("View Original Message", n.messageLink)}`);
  }

  return join(parts, "\n");
}
