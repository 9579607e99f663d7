/**
 * Runtime Errors
 *
 * Error classes for permission denials and checkpoint failures.
 */

// ============================================================================
// Permissions
// ============================================================================

/** Thrown by the tool runtime when a permission request is denied */
export class PermissionDeniedError extends Error {
  readonly sessionId: string;
  readonly toolName: string;
  readonly action: string;

  constructor(params: { sessionId: string; toolName: string; action: string }) {
    super(`Permission denied: ${params.toolName} (${params.action})`);
    this.name = "PermissionDeniedError";
    this.sessionId = params.sessionId;
    this.toolName = params.toolName;
    this.action = params.action;
  }
}

// ============================================================================
// Checkpoints
// ============================================================================

/** Error thrown when a checkpoint lookup finds nothing */
export class CheckpointNotFoundError extends Error {
  readonly checkpointId?: string;
  readonly sessionId?: string;

  constructor(target: { checkpointId: string } | { sessionId: string }) {
    super(
      "checkpointId" in target
        ? `Checkpoint not found: ${target.checkpointId}`
        : `No checkpoints for session: ${target.sessionId}`
    );
    this.name = "CheckpointNotFoundError";
    if ("checkpointId" in target) {
      this.checkpointId = target.checkpointId;
    } else {
      this.sessionId = target.sessionId;
    }
  }
}

export type CheckpointCodecStage = "serialize" | "compress" | "decompress" | "deserialize" | "verify";

/** Error thrown when session state cannot be encoded, decoded or verified */
export class CheckpointCodecError extends Error {
  readonly stage: CheckpointCodecStage;

  constructor(stage: CheckpointCodecStage, message: string, options?: { cause?: unknown }) {
    super(`Failed to ${stage} checkpoint state: ${message}`, options);
    this.name = "CheckpointCodecError";
    this.stage = stage;
  }
}

export type CheckpointStoreOperation =
  | "create"
  | "get"
  | "getLatest"
  | "list"
  | "delete"
  | "deleteOldest";

/** Error thrown when the persistence backend fails */
export class CheckpointPersistenceError extends Error {
  readonly operation: CheckpointStoreOperation;

  constructor(operation: CheckpointStoreOperation, cause: unknown) {
    super(`Checkpoint store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "CheckpointPersistenceError";
    this.operation = operation;
  }
}

export function isNotFoundError(error: unknown): error is CheckpointNotFoundError {
  return error instanceof CheckpointNotFoundError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
