import { openStore, type Store } from "../server/db";
import { initializeDatabase } from "../server/init-db";
import { DbStorage } from "../server/storage";
import { SaleEngine } from "../server/sales";
import type { User } from "@shared/schema";

export interface TestContext {
  store: Store;
  storage: DbStorage;
  engine: SaleEngine;
}

export async function createTestContext(dbPath = ":memory:", clock?: () => Date): Promise<TestContext> {
  const store = openStore(dbPath);
  await initializeDatabase(store.db);
  const storage = new DbStorage(store.db);
  return { store, storage, engine: new SaleEngine(store.db, storage, clock) };
}

export async function createWorker(storage: DbStorage, username = "worker1"): Promise<User> {
  // Plaintext on purpose: the store compares credentials verbatim
  return storage.createUser({ username, password: "test-secret", role: "worker" });
}

export function countRows(store: Store, table: "shops" | "users" | "items" | "sales"): number {
  const row = store.sqlite.prepare(`SELECT count(*) AS count FROM ${table}`).get();
  if (typeof row !== "object" || row === null || !("count" in row) || typeof row.count !== "number") {
    throw new Error(`Unexpected count result for ${table}`);
  }
  return row.count;
}
