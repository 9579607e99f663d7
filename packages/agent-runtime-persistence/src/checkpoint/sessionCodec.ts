/**
 * Session Codec
 *
 * Session state is stored as a MessagePack envelope `{ v, session }`,
 * optionally gzip-compressed. The envelope version lets restore reject
 * checkpoints written by an incompatible layout.
 */

import { createHash } from "node:crypto";
import { gunzipSync, gzipSync } from "node:zlib";
import {
  CheckpointCodecError,
  type CheckpointCodecStage,
  describeError,
  type Session,
} from "@tollgate/agent-runtime-core";
import { decode, encode } from "@msgpack/msgpack";
import { z } from "zod";

export const SESSION_ENVELOPE_VERSION = 1;

const MIN_GZIP_LEVEL = 1;
const MAX_GZIP_LEVEL = 9;

const sessionSchema = z
  .object({
    id: z.string().min(1),
    parentSessionId: z.string().optional(),
    title: z.string(),
    messageCount: z.number().int().nonnegative(),
    promptTokens: z.number().int().nonnegative(),
    completionTokens: z.number().int().nonnegative(),
    summaryMessageId: z.string().optional(),
    cost: z.number(),
    createdAt: z.number(),
    updatedAt: z.number(),
  })
  .strict();

const envelopeSchema = z.object({
  v: z.number().int(),
  session: z.unknown(),
});

export interface EncodedSessionState {
  state: Uint8Array;
  compressed: boolean;
  contextHash: string;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode a session for a checkpoint. A compression level of 0 or less stores
 * the envelope as is; higher levels are clamped to gzip's 1..9.
 */
export function encodeSessionState(session: Session, compressionLevel: number): EncodedSessionState {
  const serialized = serializeSession(session);
  const compressed = compressionLevel > 0;
  const state = compressed ? compressState(serialized, compressionLevel) : serialized;

  return { state, compressed, contextHash: hashState(state) };
}

/** Sessions that would not restore are rejected here, before any bytes exist. */
export function serializeSession(session: Session): Uint8Array {
  const snapshot = validateSession("serialize", snapshotSession(session));
  return runStage("serialize", () =>
    encode({ v: SESSION_ENVELOPE_VERSION, session: snapshot }, { ignoreUndefined: true })
  );
}

export function compressState(bytes: Uint8Array, level: number): Uint8Array {
  const clamped = Math.min(MAX_GZIP_LEVEL, Math.max(MIN_GZIP_LEVEL, Math.trunc(level)));
  return runStage("compress", () => gzipSync(bytes, { level: clamped }));
}

export function hashState(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

// ============================================================================
// Decoding
// ============================================================================

export function decodeSessionState(state: Uint8Array, compressed: boolean): Session {
  const serialized = compressed ? decompressState(state) : state;
  return deserializeSession(serialized);
}

export function decompressState(bytes: Uint8Array): Uint8Array {
  return runStage("decompress", () => gunzipSync(bytes));
}

export function deserializeSession(bytes: Uint8Array): Session {
  const raw = runStage("deserialize", () => decode(bytes));

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new CheckpointCodecError("deserialize", "not a session envelope");
  }
  if (envelope.data.v !== SESSION_ENVELOPE_VERSION) {
    throw new CheckpointCodecError(
      "deserialize",
      `unsupported envelope version ${envelope.data.v}`
    );
  }

  return validateSession("deserialize", envelope.data.session);
}

// ============================================================================
// Helpers
// ============================================================================

/** Copy exactly the resumable fields; anything else on the object is left out */
function snapshotSession(session: Session): Session {
  return {
    id: session.id,
    parentSessionId: session.parentSessionId,
    title: session.title,
    messageCount: session.messageCount,
    promptTokens: session.promptTokens,
    completionTokens: session.completionTokens,
    summaryMessageId: session.summaryMessageId,
    cost: session.cost,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

function validateSession(stage: CheckpointCodecStage, value: unknown): Session {
  const session = sessionSchema.safeParse(value);
  if (!session.success) {
    const issue = session.error.issues[0];
    const message = issue ? `${issue.path.join(".") || "session"}: ${issue.message}` : "invalid session";
    throw new CheckpointCodecError(stage, message, { cause: session.error });
  }
  return session.data;
}

function runStage<R>(stage: CheckpointCodecStage, action: () => R): R {
  try {
    return action();
  } catch (error) {
    throw new CheckpointCodecError(stage, describeError(error), { cause: error });
  }
}
