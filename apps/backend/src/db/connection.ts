import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string): Database.Database => {
  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  // Cart items, line items and payments all cascade or null out via FKs
  db.pragma("foreign_keys = ON");

  return db;
};

/**
 * In-memory database for tests and scripts. Same pragmas minus WAL,
 * which SQLite ignores for :memory: anyway.
 */
export const openMemoryDatabase = (): Database.Database => {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  return db;
};

/** better-sqlite3 surfaces constraint failures as SqliteError with a `code`. */
export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Database.SqliteError &&
  (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY");
