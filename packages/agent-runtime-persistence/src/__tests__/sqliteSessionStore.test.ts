/**
 * SQLite Session Store Tests
 */

import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSQLiteSessionStore, type SQLiteSessionStore } from "../session";
import { makeSession } from "./fixtures/sessions";

describe("SQLiteSessionStore", () => {
  let db: Database.Database;
  let store: SQLiteSessionStore;

  beforeEach(() => {
    db = new Database(":memory:");
    store = createSQLiteSessionStore({ database: db });
  });

  afterEach(() => {
    db.close();
  });

  it("should create a session with zeroed counters", async () => {
    const session = await store.create("New chat");

    expect(session).toMatchObject({
      title: "New chat",
      messageCount: 0,
      promptTokens: 0,
      completionTokens: 0,
      cost: 0,
    });
    expect(session.createdAt).toBe(session.updatedAt);
    expect(await store.get(session.id)).toEqual(session);
  });

  it("should record the parent of a child session", async () => {
    const parent = await store.create("Parent");
    const child = await store.create("Child", parent.id);

    expect((await store.get(child.id))?.parentSessionId).toBe(parent.id);
    expect((await store.get(parent.id))?.parentSessionId).toBeUndefined();
  });

  it("should overwrite an existing session on save", async () => {
    const session = makeSession();
    await store.save(session);

    await store.save({ ...session, messageCount: 12, promptTokens: 2000, summaryMessageId: "msg-4" });

    expect(await store.get(session.id)).toEqual({
      ...session,
      messageCount: 12,
      promptTokens: 2000,
      summaryMessageId: "msg-4",
    });
  });

  it("should list newest first", async () => {
    await store.save(makeSession({ id: "old", createdAt: 100 }));
    await store.save(makeSession({ id: "new", createdAt: 300 }));
    await store.save(makeSession({ id: "mid", createdAt: 200 }));

    expect((await store.list()).map((s) => s.id)).toEqual(["new", "mid", "old"]);
  });

  it("should delete a session", async () => {
    await store.save(makeSession());

    await store.delete("session-1");

    expect(await store.get("session-1")).toBeUndefined();
  });
});
