import Database from "better-sqlite3";

export function ensureSchema(db: Database.Database) {
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS matches (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      productName TEXT NOT NULL,
      matchedKeywords TEXT NOT NULL,
      price REAL,
      currency TEXT,
      channelName TEXT,
      messageText TEXT NOT NULL,
      messageLink TEXT,
      messageId INTEGER,
      chatId INTEGER,
      messageDate TEXT
    );
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_matches_product ON matches(productName);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_matches_chat_message ON matches(chatId, messageId);`);
}
