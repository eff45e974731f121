import { ChatInfo } from "../channels";

export interface ChannelMessage {
  id: number;
  date: Date | null;
  text: string;
  chat: ChatInfo;
}

export interface ScanStats {
  messagesScanned: number;
  matchesFound: number;
  messagesSkippedOld: number;
  messagesNoText: number;
  messagesNoMatch: number;
  errors: number;
}

export function emptyStats(): ScanStats {
  return {
    messagesScanned: 0,
    matchesFound: 0,
    messagesSkippedOld: 0,
    messagesNoText: 0,
    messagesNoMatch: 0,
    errors: 0,
  };
}

export function addStats(target: ScanStats, other: ScanStats): void {
  target.messagesScanned += other.messagesScanned;
  target.matchesFound += other.matchesFound;
  target.messagesSkippedOld += other.messagesSkippedOld;
  target.messagesNoText += other.messagesNoText;
  target.messagesNoMatch += other.messagesNoMatch;
  target.errors += other.errors;
}
