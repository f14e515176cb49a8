import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import path from "path";
import fs from "fs";
import * as schema from "@shared/schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface Store {
  sqlite: Database.Database;
  db: AppDatabase;
  close(): void;
}

const IN_MEMORY = ":memory:";

/**
 * Opens the SQLite store. The handle is owned by the caller and passed to
 * the services that need it; close it when the process shuts down.
 */
export function openStore(dbPath: string): Store {
  if (dbPath !== IN_MEMORY) {
    const dbDir = path.dirname(dbPath);
    if (dbDir && !fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);

  if (dbPath !== IN_MEMORY) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  // Writers from a second connection wait for the lock instead of failing
  sqlite.pragma("busy_timeout = 5000");

  const db = drizzle(sqlite, { schema });

  return {
    sqlite,
    db,
    close: () => sqlite.close(),
  };
}
