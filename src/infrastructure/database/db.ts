import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as schema from "./schema";

export type TodoDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  db: TodoDb;
  close(): void;
}

/** Raw DDL, applied on every connection (all statements are idempotent). */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS todo_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    is_completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    due_date TEXT,
    priority INTEGER NOT NULL DEFAULT 1,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_todo_items_is_deleted ON todo_items(is_deleted);
CREATE INDEX IF NOT EXISTS idx_todo_items_is_completed ON todo_items(is_completed);
CREATE INDEX IF NOT EXISTS idx_todo_items_priority ON todo_items(priority);
CREATE INDEX IF NOT EXISTS idx_todo_items_created_at ON todo_items(created_at);
CREATE INDEX IF NOT EXISTS idx_todo_items_due_date ON todo_items(due_date);
`;

/**
 * Open a Drizzle connection with pragmas and schema applied.
 * Pass ':memory:' for an in-memory database (tests).
 */
export function createDatabase(path: string): DatabaseConnection {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.exec(CREATE_SCHEMA_SQL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
