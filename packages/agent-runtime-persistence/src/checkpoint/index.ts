/**
 * Checkpoint Module
 *
 * Session snapshots: codec, stores and the checkpoint service.
 */

export {
  CheckpointService,
  type CheckpointServiceOptions,
  createCheckpointService,
} from "./checkpointService";
export { InMemoryCheckpointStore } from "./inMemoryCheckpointStore";
export {
  compressState,
  decodeSessionState,
  decompressState,
  deserializeSession,
  type EncodedSessionState,
  encodeSessionState,
  hashState,
  SESSION_ENVELOPE_VERSION,
  serializeSession,
} from "./sessionCodec";
export { SQLiteCheckpointStore, type SQLiteCheckpointStoreConfig } from "./sqliteCheckpointStore";
export type { Checkpoint, CheckpointStore } from "./types";
