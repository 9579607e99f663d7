import { describe, expect, it } from "vitest";
import {
  CheckpointCodecError,
  CheckpointNotFoundError,
  CheckpointPersistenceError,
  isNotFoundError,
  PermissionDeniedError,
} from "../errors";

describe("runtime errors", () => {
  it("should describe permission denials", () => {
    const error = new PermissionDeniedError({
      sessionId: "s1",
      toolName: "bash",
      action: "execute",
    });

    expect(error.name).toBe("PermissionDeniedError");
    expect(error.message).toBe("Permission denied: bash (execute)");
    expect(error.toolName).toBe("bash");
  });

  it("should distinguish missing checkpoints from missing sessions", () => {
    const byId = new CheckpointNotFoundError({ checkpointId: "cp-1" });
    const bySession = new CheckpointNotFoundError({ sessionId: "s1" });

    expect(byId.message).toBe("Checkpoint not found: cp-1");
    expect(byId.checkpointId).toBe("cp-1");
    expect(bySession.message).toBe("No checkpoints for session: s1");
    expect(bySession.sessionId).toBe("s1");
    expect(isNotFoundError(byId)).toBe(true);
    expect(isNotFoundError(new Error("other"))).toBe(false);
  });

  it("should keep the backend error as cause", () => {
    const cause = new Error("SQLITE_BUSY");
    const error = new CheckpointPersistenceError("create", cause);

    expect(error.message).toBe("Checkpoint store create failed: SQLITE_BUSY");
    expect(error.cause).toBe(cause);
    expect(error.operation).toBe("create");
  });

  it("should name the codec stage", () => {
    const error = new CheckpointCodecError("decompress", "incorrect header check");

    expect(error.message).toBe("Failed to decompress checkpoint state: incorrect header check");
    expect(error.stage).toBe("decompress");
  });
});
