/**
 * Checkpoint Types
 */

/** Immutable snapshot of a session's resumable state */
export interface Checkpoint {
  id: string;
  sessionId: string;

  /** Unix timestamp in ms */
  timestamp: number;

  /** Prompt + completion tokens at snapshot time */
  tokenCount: number;
  messageCount: number;

  /** SHA-256 hex of `state` as persisted */
  contextHash: string;

  /** Encoded session; gzip-compressed when `compressed` is set */
  state: Uint8Array;
  compressed: boolean;
}

/**
 * Persistence backend for checkpoints. Lookups resolve undefined when nothing
 * matches; every other failure rejects.
 */
export interface CheckpointStore {
  create(checkpoint: Checkpoint): Promise<void>;
  get(checkpointId: string): Promise<Checkpoint | undefined>;
  getLatest(sessionId: string): Promise<Checkpoint | undefined>;

  /** Newest first */
  list(sessionId: string): Promise<Checkpoint[]>;

  /** Deleting an unknown ID is a no-op */
  delete(checkpointId: string): Promise<void>;

  /** Delete all but the `keep` newest checkpoints of a session; resolves the number deleted */
  deleteOldest(sessionId: string, keep: number): Promise<number>;
}
