/**
 * Agent Runtime Persistence
 *
 * Session rows and checkpoint snapshots backed by SQLite.
 */

export * from "./checkpoint";
export * from "./session";
