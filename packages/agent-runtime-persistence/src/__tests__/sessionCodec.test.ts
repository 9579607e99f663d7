/**
 * Session Codec Tests
 */

import { CheckpointCodecError } from "@tollgate/agent-runtime-core";
import { encode } from "@msgpack/msgpack";
import { describe, expect, it } from "vitest";
import {
  compressState,
  decodeSessionState,
  decompressState,
  deserializeSession,
  encodeSessionState,
  hashState,
  serializeSession,
} from "../checkpoint";
import { makeSession } from "./fixtures/sessions";

function codecFailure(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("expected a codec failure");
}

describe("session codec", () => {
  describe("encodeSessionState", () => {
    it("should store the envelope uncompressed at level 0", () => {
      const session = makeSession();

      const encoded = encodeSessionState(session, 0);

      expect(encoded.compressed).toBe(false);
      expect(Array.from(encoded.state)).toEqual(Array.from(serializeSession(session)));
      expect(decodeSessionState(encoded.state, false)).toEqual(session);
    });

    it("should gzip the envelope at positive levels", () => {
      const session = makeSession({ parentSessionId: "session-0", summaryMessageId: "msg-9" });

      const encoded = encodeSessionState(session, 6);

      expect(encoded.compressed).toBe(true);
      expect(encoded.state[0]).toBe(0x1f);
      expect(encoded.state[1]).toBe(0x8b);
      expect(decodeSessionState(encoded.state, true)).toEqual(session);
    });

    it("should hash the bytes as persisted", () => {
      const encoded = encodeSessionState(makeSession(), 6);

      expect(encoded.contextHash).toBe(hashState(encoded.state));
      expect(encoded.contextHash).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should leave out fields that are not part of a session", () => {
      const session = Object.assign(makeSession(), { scratch: "not persisted" });

      const restored = deserializeSession(serializeSession(session));

      expect(restored).toEqual(makeSession());
      expect(restored).not.toHaveProperty("scratch");
    });

    it("should refuse a session the decoder would reject", () => {
      const error = codecFailure(() => serializeSession(makeSession({ messageCount: -1 })));

      expect(error).toBeInstanceOf(CheckpointCodecError);
      expect(error).toMatchObject({
        stage: "serialize",
        message: "Failed to serialize checkpoint state: messageCount: Number must be greater than or equal to 0",
      });
    });
  });

  describe("compression", () => {
    it("should clamp out-of-range levels", () => {
      const bytes = serializeSession(makeSession());

      expect(Array.from(decompressState(compressState(bytes, 42)))).toEqual(Array.from(bytes));
      expect(Array.from(decompressState(compressState(bytes, -3)))).toEqual(Array.from(bytes));
    });

    it("should reject bytes that are not gzip", () => {
      const error = codecFailure(() => decompressState(new Uint8Array([1, 2, 3])));

      expect(error).toBeInstanceOf(CheckpointCodecError);
      expect(error).toMatchObject({ stage: "decompress" });
    });
  });

  describe("hashState", () => {
    it("should produce SHA-256 hex", () => {
      expect(hashState(new Uint8Array())).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
      );
    });
  });

  describe("deserializeSession", () => {
    it("should reject an unknown envelope version", () => {
      const bytes = encode({ v: 2, session: makeSession() });

      const error = codecFailure(() => deserializeSession(bytes));

      expect(error).toBeInstanceOf(CheckpointCodecError);
      expect(error).toMatchObject({
        stage: "deserialize",
        message: "Failed to deserialize checkpoint state: unsupported envelope version 2",
      });
    });

    it("should reject values that are not an envelope", () => {
      const error = codecFailure(() => deserializeSession(encode("hello")));

      expect(error).toMatchObject({
        stage: "deserialize",
        message: "Failed to deserialize checkpoint state: not a session envelope",
      });
    });

    it("should reject a malformed session", () => {
      const bytes = encode({ v: 1, session: { id: "session-1", messageCount: -1 } });

      const error = codecFailure(() => deserializeSession(bytes));

      expect(error).toBeInstanceOf(CheckpointCodecError);
      expect(error).toMatchObject({ stage: "deserialize" });
    });

    it("should reject bytes that are not MessagePack", () => {
      const error = codecFailure(() => deserializeSession(new Uint8Array([0xc1])));

      expect(error).toBeInstanceOf(CheckpointCodecError);
      expect(error).toMatchObject({ stage: "deserialize" });
    });
  });
});
