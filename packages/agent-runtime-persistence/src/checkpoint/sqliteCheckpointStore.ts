import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";
import { applySchema } from "../sqlite/schema";
import type { Checkpoint, CheckpointStore } from "./types";

export interface SQLiteCheckpointStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
}

interface CheckpointRow {
  id: string;
  session_id: string;
  timestamp: number;
  token_count: number;
  message_count: number;
  context_hash: string;
  state: Buffer;
  compressed: number;
}

type InsertParams = [string, string, number, number, number, string, Buffer, number];

type PreparedStatements = {
  insert: Database.Statement<InsertParams>;
  get: Database.Statement<[string], CheckpointRow>;
  getLatest: Database.Statement<[string], CheckpointRow>;
  list: Database.Statement<[string], CheckpointRow>;
  delete: Database.Statement<[string]>;
  deleteOldest: Database.Statement<[string, string, number]>;
};

const CHECKPOINT_COLUMNS =
  "id, session_id, timestamp, token_count, message_count, context_hash, state, compressed";

/** Newest first; rowid breaks ties between checkpoints taken in the same millisecond */
const NEWEST_FIRST = "ORDER BY timestamp DESC, rowid DESC";

/**
 * Checkpoints in the `checkpoints` table. Each row references a `sessions` row
 * and is removed with it.
 */
export class SQLiteCheckpointStore implements CheckpointStore {
  private readonly db: DatabaseInstance;
  private readonly statements: PreparedStatements;

  constructor(config: SQLiteCheckpointStoreConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    applySchema(this.db);
    this.statements = this.prepareStatements();
  }

  async create(checkpoint: Checkpoint): Promise<void> {
    this.statements.insert.run(
      checkpoint.id,
      checkpoint.sessionId,
      checkpoint.timestamp,
      checkpoint.tokenCount,
      checkpoint.messageCount,
      checkpoint.contextHash,
      toBuffer(checkpoint.state),
      checkpoint.compressed ? 1 : 0
    );
  }

  async get(checkpointId: string): Promise<Checkpoint | undefined> {
    const row = this.statements.get.get(checkpointId);
    return row ? mapCheckpoint(row) : undefined;
  }

  async getLatest(sessionId: string): Promise<Checkpoint | undefined> {
    const row = this.statements.getLatest.get(sessionId);
    return row ? mapCheckpoint(row) : undefined;
  }

  async list(sessionId: string): Promise<Checkpoint[]> {
    return this.statements.list.all(sessionId).map(mapCheckpoint);
  }

  async delete(checkpointId: string): Promise<void> {
    this.statements.delete.run(checkpointId);
  }

  async deleteOldest(sessionId: string, keep: number): Promise<number> {
    const result = this.statements.deleteOldest.run(sessionId, sessionId, Math.max(0, keep));
    return result.changes;
  }

  close(): void {
    this.db.close();
  }

  private createDatabase(path?: string): DatabaseInstance {
    if (!path) {
      throw new Error("SQLiteCheckpointStore requires databasePath or database instance");
    }
    return new Database(path);
  }

  private prepareStatements(): PreparedStatements {
    return {
      insert: this.db.prepare<InsertParams>(
        `INSERT INTO checkpoints (${CHECKPOINT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ),
      get: this.db.prepare<[string], CheckpointRow>(
        `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints WHERE id = ?`
      ),
      getLatest: this.db.prepare<[string], CheckpointRow>(
        `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints WHERE session_id = ? ${NEWEST_FIRST} LIMIT 1`
      ),
      list: this.db.prepare<[string], CheckpointRow>(
        `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints WHERE session_id = ? ${NEWEST_FIRST}`
      ),
      delete: this.db.prepare<[string]>("DELETE FROM checkpoints WHERE id = ?"),
      deleteOldest: this.db.prepare<[string, string, number]>(`
        DELETE FROM checkpoints
        WHERE session_id = ?
          AND id NOT IN (
            SELECT id FROM checkpoints WHERE session_id = ? ${NEWEST_FIRST} LIMIT ?
          )
      `),
    };
  }
}

function mapCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    id: row.id,
    sessionId: row.session_id,
    timestamp: row.timestamp,
    tokenCount: row.token_count,
    messageCount: row.message_count,
    contextHash: row.context_hash,
    state: row.state,
    compressed: row.compressed === 1,
  };
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
