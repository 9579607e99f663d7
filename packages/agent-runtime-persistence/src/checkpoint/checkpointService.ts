/**
 * Checkpoint Service
 *
 * Snapshots session state into immutable checkpoints, restores it, and
 * retires old checkpoints. The store is the only source of truth; nothing is
 * cached between calls.
 */

import { randomUUID } from "node:crypto";
import {
  type CheckpointConfig,
  CheckpointCodecError,
  CheckpointNotFoundError,
  CheckpointPersistenceError,
  type CheckpointStoreOperation,
  DEFAULT_MAX_CHECKPOINTS,
  describeError,
  resolveCheckpointConfig,
  type Session,
  totalTokens,
} from "@tollgate/agent-runtime-core";
import { getLogger, type Logger } from "@tollgate/agent-runtime-telemetry";
import { decodeSessionState, encodeSessionState, hashState } from "./sessionCodec";
import type { Checkpoint, CheckpointStore } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface CheckpointServiceOptions {
  store: CheckpointStore;

  /** Merged over defaults and TOLLGATE_CHECKPOINT_* env vars */
  config?: Partial<CheckpointConfig>;

  logger?: Logger;
}

// ============================================================================
// Checkpoint Service
// ============================================================================

export class CheckpointService {
  private readonly store: CheckpointStore;
  private readonly logger: Logger;
  private config: CheckpointConfig;

  constructor(options: CheckpointServiceOptions) {
    this.store = options.store;
    this.config = resolveCheckpointConfig(options.config);
    this.logger = options.logger ?? getLogger("checkpoints");
  }

  /** Replace the active policy; later calls read the new one. */
  setConfig(config: CheckpointConfig): void {
    this.config = { ...config };
  }

  getConfig(): CheckpointConfig {
    return { ...this.config };
  }

  /**
   * True when checkpointing is enabled and the session's token total has
   * reached a positive threshold. No side effects.
   */
  shouldCheckpoint(session: Session, config: CheckpointConfig = this.config): boolean {
    if (!config.enabled || config.tokenThreshold <= 0) {
      return false;
    }
    return totalTokens(session) >= config.tokenThreshold;
  }

  /**
   * Snapshot the session. Encoding failures reject before anything is written.
   */
  async create(session: Session): Promise<Checkpoint> {
    const { state, compressed, contextHash } = encodeSessionState(
      session,
      this.config.compressionLevel
    );

    const checkpoint: Checkpoint = {
      id: randomUUID(),
      sessionId: session.id,
      timestamp: Date.now(),
      tokenCount: totalTokens(session),
      messageCount: session.messageCount,
      contextHash,
      state,
      compressed,
    };

    await this.withStore("create", () => this.store.create(checkpoint));

    this.logger.forSession(session.id).info("Checkpoint created", {
      checkpointId: checkpoint.id,
      tokenCount: checkpoint.tokenCount,
      messageCount: checkpoint.messageCount,
      sizeBytes: state.byteLength,
      compressed,
    });
    return checkpoint;
  }

  async get(checkpointId: string): Promise<Checkpoint> {
    const checkpoint = await this.withStore("get", () => this.store.get(checkpointId));
    if (!checkpoint) {
      throw new CheckpointNotFoundError({ checkpointId });
    }
    return checkpoint;
  }

  async getLatest(sessionId: string): Promise<Checkpoint> {
    const checkpoint = await this.withStore("getLatest", () => this.store.getLatest(sessionId));
    if (!checkpoint) {
      throw new CheckpointNotFoundError({ sessionId });
    }
    return checkpoint;
  }

  /** Newest first */
  list(sessionId: string): Promise<Checkpoint[]> {
    return this.withStore("list", () => this.store.list(sessionId));
  }

  /**
   * Decode a checkpoint into a fresh session value. The stored hash is checked
   * first; a mismatch or an undecodable blob rejects with CheckpointCodecError.
   */
  async restore(checkpointId: string): Promise<Session> {
    const checkpoint = await this.get(checkpointId);

    if (!this.verify(checkpoint)) {
      throw new CheckpointCodecError("verify", `content hash mismatch for ${checkpointId}`);
    }

    const session = decodeSessionState(checkpoint.state, checkpoint.compressed);
    this.logger.forSession(checkpoint.sessionId).debug("Checkpoint restored", { checkpointId });
    return session;
  }

  /** Deleting an unknown ID succeeds */
  delete(checkpointId: string): Promise<void> {
    return this.withStore("delete", () => this.store.delete(checkpointId));
  }

  /**
   * Keep the `maxCheckpoints` newest checkpoints of a session and delete the
   * rest. Resolves the number deleted.
   */
  async cleanup(sessionId: string): Promise<number> {
    const keep =
      this.config.maxCheckpoints > 0 ? this.config.maxCheckpoints : DEFAULT_MAX_CHECKPOINTS;
    const deleted = await this.withStore("deleteOldest", () =>
      this.store.deleteOldest(sessionId, keep)
    );

    if (deleted > 0) {
      this.logger.forSession(sessionId).info("Old checkpoints removed", { deleted, kept: keep });
    }
    return deleted;
  }

  /** Whether `state` still hashes to `contextHash` */
  verify(checkpoint: Pick<Checkpoint, "state" | "contextHash">): boolean {
    return hashState(checkpoint.state) === checkpoint.contextHash;
  }

  /**
   * Checkpoint and clean up when the policy says so. Failures are logged and
   * resolve undefined.
   */
  async checkpointIfNeeded(session: Session): Promise<Checkpoint | undefined> {
    if (!this.shouldCheckpoint(session)) {
      return undefined;
    }

    const logger = this.logger.forSession(session.id);
    let checkpoint: Checkpoint;
    try {
      checkpoint = await this.create(session);
    } catch (error) {
      logger.error("Checkpoint failed", error);
      return undefined;
    }

    try {
      await this.cleanup(session.id);
    } catch (error) {
      logger.warn("Checkpoint cleanup failed", {
        checkpointId: checkpoint.id,
        error: describeError(error),
      });
    }
    return checkpoint;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async withStore<R>(operation: CheckpointStoreOperation, action: () => Promise<R>): Promise<R> {
    try {
      return await action();
    } catch (error) {
      throw new CheckpointPersistenceError(operation, error);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCheckpointService(options: CheckpointServiceOptions): CheckpointService {
  return new CheckpointService(options);
}
