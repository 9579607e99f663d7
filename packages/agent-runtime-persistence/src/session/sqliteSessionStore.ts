/**
 * SQLite Session Store
 *
 * Owns the `sessions` rows that checkpoints hang off. Deleting a session
 * cascades to its checkpoints.
 */

import { randomUUID } from "node:crypto";
import type { Session } from "@tollgate/agent-runtime-core";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";
import { applySchema } from "../sqlite/schema";

export interface SQLiteSessionStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
}

interface SessionRow {
  id: string;
  parent_session_id: string | null;
  title: string;
  message_count: number;
  prompt_tokens: number;
  completion_tokens: number;
  summary_message_id: string | null;
  cost: number;
  created_at: number;
  updated_at: number;
}

type UpsertParams = [
  string,
  string | null,
  string,
  number,
  number,
  number,
  string | null,
  number,
  number,
  number,
];

type PreparedStatements = {
  upsert: Database.Statement<UpsertParams>;
  get: Database.Statement<[string], SessionRow>;
  list: Database.Statement<[], SessionRow>;
  delete: Database.Statement<[string]>;
};

export class SQLiteSessionStore {
  private readonly db: DatabaseInstance;
  private readonly statements: PreparedStatements;

  constructor(config: SQLiteSessionStoreConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    applySchema(this.db);
    this.statements = this.prepareStatements();
  }

  async create(title: string, parentSessionId?: string): Promise<Session> {
    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      parentSessionId,
      title,
      messageCount: 0,
      promptTokens: 0,
      completionTokens: 0,
      cost: 0,
      createdAt: now,
      updatedAt: now,
    };
    await this.save(session);
    return session;
  }

  async get(sessionId: string): Promise<Session | undefined> {
    const row = this.statements.get.get(sessionId);
    return row ? mapSession(row) : undefined;
  }

  /** Insert or overwrite the session row */
  async save(session: Session): Promise<void> {
    this.statements.upsert.run(
      session.id,
      session.parentSessionId ?? null,
      session.title,
      session.messageCount,
      session.promptTokens,
      session.completionTokens,
      session.summaryMessageId ?? null,
      session.cost,
      session.createdAt,
      session.updatedAt
    );
  }

  /** Newest first */
  async list(): Promise<Session[]> {
    return this.statements.list.all().map(mapSession);
  }

  async delete(sessionId: string): Promise<void> {
    this.statements.delete.run(sessionId);
  }

  close(): void {
    this.db.close();
  }

  private createDatabase(path?: string): DatabaseInstance {
    if (!path) {
      throw new Error("SQLiteSessionStore requires databasePath or database instance");
    }
    return new Database(path);
  }

  private prepareStatements(): PreparedStatements {
    return {
      upsert: this.db.prepare<UpsertParams>(`
        INSERT INTO sessions (
          id,
          parent_session_id,
          title,
          message_count,
          prompt_tokens,
          completion_tokens,
          summary_message_id,
          cost,
          created_at,
          updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          parent_session_id = excluded.parent_session_id,
          title = excluded.title,
          message_count = excluded.message_count,
          prompt_tokens = excluded.prompt_tokens,
          completion_tokens = excluded.completion_tokens,
          summary_message_id = excluded.summary_message_id,
          cost = excluded.cost,
          updated_at = excluded.updated_at
      `),
      get: this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?"),
      list: this.db.prepare<[], SessionRow>(
        "SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC"
      ),
      delete: this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?"),
    };
  }
}

function mapSession(row: SessionRow): Session {
  return {
    id: row.id,
    parentSessionId: row.parent_session_id ?? undefined,
    title: row.title,
    messageCount: row.message_count,
    promptTokens: row.prompt_tokens,
    completionTokens: row.completion_tokens,
    summaryMessageId: row.summary_message_id ?? undefined,
    cost: row.cost,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createSQLiteSessionStore(config: SQLiteSessionStoreConfig): SQLiteSessionStore {
  return new SQLiteSessionStore(config);
}
