import Database from "better-sqlite3";

export interface MatchRecord {
  timestamp: string;
  productName: string;
  matchedKeywords: string[];
  price: number | null;
  currency: string | null;
  channelName: string | null;
  messageText: string;
  messageLink: string | null;
  messageId: number | null;
  chatId: number | null;
  messageDate: string | null;
}

export interface StoredMatch extends MatchRecord {
  id: number;
}

// matchedKeywords is kept as a JSON array in its column
export type MatchRow = Omit<StoredMatch, "matchedKeywords"> & { matchedKeywords: string };

export interface MatchFilter {
  productName?: string;
}

export interface MatchStore {
  db: Database.Database;
  saveMatch: (record: MatchRecord) => number;
  listMatches: (limit?: number, filter?: MatchFilter) => StoredMatch[];
  countMatches: (filter?: MatchFilter) => number;
  close: () => void;
}
