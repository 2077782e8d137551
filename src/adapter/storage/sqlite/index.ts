export {
  DEFAULT_SQLITE_DB_REL_PATH,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteRunResult,
  type SQLiteStorageOptions,
  type Storage,
} from "./sqlite.storage";

export {
  SQLiteSessionStore,
  createSQLiteSessionStore,
  type SQLiteSessionStoreOptions,
} from "./sqlite_session.store";
