/**
 * Checkpoint Store Tests
 */

import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  type Checkpoint,
  type CheckpointStore,
  InMemoryCheckpointStore,
  SQLiteCheckpointStore,
} from "../checkpoint";
import { SQLiteSessionStore } from "../session";
import { makeSession } from "./fixtures/sessions";

function createCheckpoint(id: string, timestamp: number, sessionId = "session-1"): Checkpoint {
  return {
    id,
    sessionId,
    timestamp,
    tokenCount: 1500,
    messageCount: 10,
    contextHash: "placeholder-hash",
    state: new Uint8Array([1, 2, 3]),
    compressed: false,
  };
}

interface StoreHarness {
  store: CheckpointStore;
  close: () => void;
}

const harnesses: Array<{ name: string; open: () => Promise<StoreHarness> }> = [
  {
    name: "SQLiteCheckpointStore",
    open: async () => {
      const db = new Database(":memory:");
      const sessions = new SQLiteSessionStore({ database: db });
      await sessions.save(makeSession({ id: "session-1" }));
      await sessions.save(makeSession({ id: "session-2" }));
      return { store: new SQLiteCheckpointStore({ database: db }), close: () => db.close() };
    },
  },
  {
    name: "InMemoryCheckpointStore",
    open: async () => ({ store: new InMemoryCheckpointStore(), close: () => undefined }),
  },
];

describe.each(harnesses)("$name", ({ open }) => {
  let harness: StoreHarness;
  let store: CheckpointStore;

  beforeEach(async () => {
    harness = await open();
    store = harness.store;
  });

  afterEach(() => {
    harness.close();
  });

  it("should store and retrieve a checkpoint", async () => {
    await store.create(createCheckpoint("ckpt-1", 100));

    const loaded = await store.get("ckpt-1");

    expect(loaded).toMatchObject({
      id: "ckpt-1",
      sessionId: "session-1",
      timestamp: 100,
      tokenCount: 1500,
      messageCount: 10,
      contextHash: "placeholder-hash",
      compressed: false,
    });
    expect(Array.from(loaded?.state ?? [])).toEqual([1, 2, 3]);
  });

  it("should return undefined for unknown checkpoints and sessions", async () => {
    expect(await store.get("missing")).toBeUndefined();
    expect(await store.getLatest("session-1")).toBeUndefined();
    expect(await store.list("session-1")).toEqual([]);
  });

  it("should reject a duplicate ID", async () => {
    await store.create(createCheckpoint("ckpt-1", 100));

    await expect(store.create(createCheckpoint("ckpt-1", 200))).rejects.toThrow();
  });

  it("should list newest first", async () => {
    await store.create(createCheckpoint("ckpt-a", 100));
    await store.create(createCheckpoint("ckpt-c", 300));
    await store.create(createCheckpoint("ckpt-b", 200));

    const listed = await store.list("session-1");

    expect(listed.map((c) => c.id)).toEqual(["ckpt-c", "ckpt-b", "ckpt-a"]);
    expect((await store.getLatest("session-1"))?.id).toBe("ckpt-c");
  });

  it("should order checkpoints taken in the same millisecond by creation", async () => {
    await store.create(createCheckpoint("ckpt-1", 500));
    await store.create(createCheckpoint("ckpt-2", 500));
    await store.create(createCheckpoint("ckpt-3", 500));

    expect((await store.list("session-1")).map((c) => c.id)).toEqual(["ckpt-3", "ckpt-2", "ckpt-1"]);
    expect((await store.getLatest("session-1"))?.id).toBe("ckpt-3");
  });

  it("should keep sessions apart", async () => {
    await store.create(createCheckpoint("ckpt-1", 100, "session-1"));
    await store.create(createCheckpoint("ckpt-2", 200, "session-2"));

    expect((await store.list("session-1")).map((c) => c.id)).toEqual(["ckpt-1"]);
    expect((await store.getLatest("session-2"))?.id).toBe("ckpt-2");
  });

  it("should delete a checkpoint and ignore unknown IDs", async () => {
    await store.create(createCheckpoint("ckpt-1", 100));

    await store.delete("ckpt-1");
    await store.delete("ckpt-1");
    await store.delete("missing");

    expect(await store.get("ckpt-1")).toBeUndefined();
  });

  it("should delete all but the newest checkpoints of one session", async () => {
    for (let i = 1; i <= 4; i++) {
      await store.create(createCheckpoint(`ckpt-${i}`, i * 100));
    }
    await store.create(createCheckpoint("other", 50, "session-2"));

    expect(await store.deleteOldest("session-1", 2)).toBe(2);
    expect(await store.deleteOldest("session-1", 2)).toBe(0);

    expect((await store.list("session-1")).map((c) => c.id)).toEqual(["ckpt-4", "ckpt-3"]);
    expect((await store.list("session-2")).map((c) => c.id)).toEqual(["other"]);
  });

  it("should delete everything when asked to keep none", async () => {
    await store.create(createCheckpoint("ckpt-1", 100));
    await store.create(createCheckpoint("ckpt-2", 200));

    expect(await store.deleteOldest("session-1", 0)).toBe(2);
    expect(await store.list("session-1")).toEqual([]);
  });
});

describe("SQLiteCheckpointStore schema", () => {
  let db: Database.Database;
  let sessions: SQLiteSessionStore;
  let store: SQLiteCheckpointStore;

  beforeEach(async () => {
    db = new Database(":memory:");
    sessions = new SQLiteSessionStore({ database: db });
    store = new SQLiteCheckpointStore({ database: db });
    await sessions.save(makeSession());
  });

  afterEach(() => {
    db.close();
  });

  it("should require the session row to exist", async () => {
    await expect(store.create(createCheckpoint("ckpt-1", 100, "no-such-session"))).rejects.toThrow(
      "FOREIGN KEY constraint failed"
    );
  });

  it("should remove checkpoints with their session", async () => {
    await store.create(createCheckpoint("ckpt-1", 100));
    await store.create(createCheckpoint("ckpt-2", 200));

    await sessions.delete("session-1");

    expect(await store.list("session-1")).toEqual([]);
  });

  it("should reject negative counters", async () => {
    await expect(
      store.create({ ...createCheckpoint("ckpt-1", 100), tokenCount: -1 })
    ).rejects.toThrow("CHECK constraint failed");
  });

  it("should require a database path or instance", () => {
    expect(() => new SQLiteCheckpointStore({})).toThrow(
      "SQLiteCheckpointStore requires databasePath or database instance"
    );
  });
});
