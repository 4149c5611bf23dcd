import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { runMigrations } from "./migrate.ts";

export type Db = Database.Database;

export const MEMORY_DB = ":memory:";

function resolveDbPath(dbPath: string): string {
  const p = String(dbPath || "").trim() || "data/rag.sqlite";
  if (p === MEMORY_DB) { return p; }
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

/** Opens (creating if needed) the database file and brings its schema up to date. */
export function openDb(dbPath: string): Db {
  const filePath = resolveDbPath(dbPath);
  if (filePath !== MEMORY_DB) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  if (filePath !== MEMORY_DB) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  runMigrations(db);
  return db;
}
