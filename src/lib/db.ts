import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

const SCHEMA_SQL = new URL("./schema.sql", import.meta.url);

/**
 * Open (or create) the slot database and make sure the schema exists.
 * ":memory:" gives a throwaway database.
 */
export function openDatabase(path: string): { db: AppDatabase; close: () => void } {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL"); // Better concurrent read performance
  sqlite.exec(readFileSync(SCHEMA_SQL, "utf8"));

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
