export {
  createSQLiteSessionStore,
  SQLiteSessionStore,
  type SQLiteSessionStoreConfig,
} from "./sqliteSessionStore";
