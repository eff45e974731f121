import Database from "better-sqlite3";
import { DEFAULT_LIST_LIMIT } from "./constants";
import { MatchFilter, MatchRecord, MatchRow, StoredMatch } from "./types";

export const buildFilterWhere = (filter?: MatchFilter) => {
  const clauses: string[] = [];
  const params: Record<string, string> = {};
  if (filter?.productName) {
    clauses.push("productName = @productName");
    params.productName = filter.productName;
  }
  const clause = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
  return { clause, params };
};

function parseKeywords(raw: string): string[] {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export const toStoredMatch = (row: MatchRow): StoredMatch => ({
  ...row,
  matchedKeywords: parseKeywords(row.matchedKeywords),
});

export const makeSaveMatch = (db: Database.Database) => {
  const stmt = db.prepare(`
    INSERT INTO matches (timestamp, productName, matchedKeywords, price, currency, channelName, messageText, messageLink, messageId, chatId, messageDate)
    VALUES (@timestamp, @productName, @matchedKeywords, @price, @currency, @channelName, @messageText, @messageLink, @messageId, @chatId, @messageDate);
  `);
  return (record: MatchRecord): number => {
    const info = stmt.run({ ...record, matchedKeywords: JSON.stringify(record.matchedKeywords) });
    return Number(info.lastInsertRowid);
  };
};

export const makeListMatches = (db: Database.Database) => (limit = DEFAULT_LIST_LIMIT, filter?: MatchFilter) => {
  const { clause, params } = buildFilterWhere(filter);
  const stmt = db.prepare<Record<string, string | number>, MatchRow>(`
      SELECT id, timestamp, productName, matchedKeywords, price, currency, channelName, messageText, messageLink, messageId, chatId, messageDate
      FROM matches
      ${clause}
      ORDER BY id DESC
      LIMIT @limit;
    `);
  return stmt.all({ ...params, limit }).map(toStoredMatch);
};

export const makeCountMatches = (db: Database.Database) => (filter?: MatchFilter) => {
  const { clause, params } = buildFilterWhere(filter);
  const stmt = db.prepare<Record<string, string>, { cnt: number }>(`
      SELECT COUNT(*) as cnt
      FROM matches
      ${clause};
    `);
  return stmt.get(params)?.cnt ?? 0;
};
