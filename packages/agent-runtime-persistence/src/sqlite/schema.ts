/**
 * SQLite schema shared by the session and checkpoint stores.
 */

import type { Database as DatabaseInstance } from "better-sqlite3";

export function applySchema(db: DatabaseInstance): void {
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      parent_session_id TEXT,
      title TEXT NOT NULL,
      message_count INTEGER NOT NULL DEFAULT 0 CHECK (message_count >= 0),
      prompt_tokens INTEGER NOT NULL DEFAULT 0 CHECK (prompt_tokens >= 0),
      completion_tokens INTEGER NOT NULL DEFAULT 0 CHECK (completion_tokens >= 0),
      summary_message_id TEXT,
      cost REAL NOT NULL DEFAULT 0.0 CHECK (cost >= 0.0),
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS checkpoints (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      token_count INTEGER NOT NULL DEFAULT 0 CHECK (token_count >= 0),
      message_count INTEGER NOT NULL DEFAULT 0 CHECK (message_count >= 0),
      context_hash TEXT NOT NULL,
      state BLOB NOT NULL,
      compressed INTEGER NOT NULL DEFAULT 0,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (session_id) REFERENCES sessions (id) ON DELETE CASCADE
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_checkpoints_session ON checkpoints (session_id)");
  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_checkpoints_session_time ON checkpoints (session_id, timestamp DESC)"
  );
  db.exec("CREATE INDEX IF NOT EXISTS idx_checkpoints_created ON checkpoints (created_at DESC)");
}
