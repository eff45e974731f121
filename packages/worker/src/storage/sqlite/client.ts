import Database from "better-sqlite3";
import fs from "fs/promises";
import path from "path";
import { DEFAULT_SQLITE_PATH, IN_MEMORY } from "./constants";
import { ensureSchema } from "./schema";
import { makeCountMatches, makeListMatches, makeSaveMatch } from "./queries";
import { MatchStore } from "./types";

export async function openMatchStore(dbPath: string = DEFAULT_SQLITE_PATH): Promise<MatchStore> {
  if (dbPath !== IN_MEMORY) {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  ensureSchema(db);

  return {
    db,
    saveMatch: makeSaveMatch(db),
    listMatches: makeListMatches(db),
    countMatches: makeCountMatches(db),
    close: () => db.close(),
  };
}
