import { eq, getTableColumns, sql } from "drizzle-orm";
import type { SQLiteTable } from "drizzle-orm/sqlite-core";
import { shops, users, items, sales } from "@shared/schema";
import type { AppDatabase } from "./db";
import { SchemaMismatchError, storeCall } from "./errors";

export const DEFAULT_SHOP_NAME = "Default Shop";
export const DEFAULT_ADMIN_USERNAME = "admin";
export const DEFAULT_ADMIN_PASSWORD = "admin";

const tablesSql = `
  CREATE TABLE IF NOT EXISTS shops (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  );

  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('admin', 'worker'))
  );

  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    shop_id INTEGER NOT NULL REFERENCES shops(id),
    name TEXT NOT NULL,
    price REAL NOT NULL CHECK (price >= 0),
    quantity INTEGER NOT NULL CHECK (quantity >= 0)
  );

  CREATE TABLE IF NOT EXISTS sales (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    shop_id INTEGER NOT NULL REFERENCES shops(id),
    item_id INTEGER NOT NULL REFERENCES items(id),
    user_id INTEGER NOT NULL REFERENCES users(id),
    quantity INTEGER NOT NULL CHECK (quantity > 0),
    total REAL NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
  );

  CREATE INDEX IF NOT EXISTS sales_shop_created_idx ON sales (shop_id, created_at)
`;

interface ColumnInfo {
  name: string;
}

function tableColumns(db: AppDatabase, table: string): string[] {
  return db.all<ColumnInfo>(sql.raw(`PRAGMA table_info(${table})`)).map((c) => c.name);
}

/**
 * Compares the live columns of a table with its drizzle definition.
 */
export function verifyTable(db: AppDatabase, name: string, table: SQLiteTable): void {
  const expected = Object.values(getTableColumns(table)).map((column) => column.name);
  const actual = tableColumns(db, name);

  const missing = expected.filter((column) => !actual.includes(column));
  const unexpected = actual.filter((column) => !expected.includes(column));

  if (missing.length > 0 || unexpected.length > 0) {
    throw new SchemaMismatchError(name, missing, unexpected);
  }
}

async function ensureDefaultShop(db: AppDatabase): Promise<number> {
  const [first] = await db.select().from(shops).orderBy(shops.id).limit(1);
  if (first) {
    return first.id;
  }

  const [created] = await db.insert(shops).values({ name: DEFAULT_SHOP_NAME }).returning();
  console.log(`[DB] ✓ Created shop "${created.name}"`);
  return created.id;
}

async function ensureItemsShopColumn(db: AppDatabase, defaultShopId: number): Promise<void> {
  if (tableColumns(db, "items").includes("shop_id")) {
    return;
  }

  // SQLite refuses ADD COLUMN ... REFERENCES with a non-null default,
  // so legacy rows get the plain column pointing at the first shop.
  await db.run(
    sql.raw(`ALTER TABLE items ADD COLUMN shop_id INTEGER NOT NULL DEFAULT ${Math.trunc(defaultShopId)}`),
  );
  console.log(`[DB] ✓ Migrated items table: assigned existing items to shop ${defaultShopId}`);
}

async function ensureAdmin(db: AppDatabase): Promise<void> {
  const [existingAdmin] = await db.select().from(users).where(eq(users.role, "admin")).limit(1);

  if (existingAdmin) {
    return;
  }

  await db.insert(users).values({
    username: DEFAULT_ADMIN_USERNAME,
    password: DEFAULT_ADMIN_PASSWORD,
    role: "admin",
  });
  console.log(`[DB] ✓ Admin user created (login: ${DEFAULT_ADMIN_USERNAME}, password: ${DEFAULT_ADMIN_PASSWORD})`);
}

/**
 * Creates the tables, migrates a pre-multi-shop items table and seeds the
 * default shop and admin. Safe to run on every start.
 */
export async function initializeDatabase(db: AppDatabase): Promise<void> {
  try {
    console.log("[DB] Initializing database...");

    await storeCall("createTables", async () => {
      const statements = tablesSql.split(";").filter((s) => s.trim());
      for (const statement of statements) {
        await db.run(sql.raw(statement + ";"));
      }
    });

    const defaultShopId = await storeCall("ensureDefaultShop", () => ensureDefaultShop(db));

    await storeCall("migrateItems", async () => {
      await ensureItemsShopColumn(db, defaultShopId);
      await db.run(sql.raw("CREATE INDEX IF NOT EXISTS items_shop_id_idx ON items (shop_id);"));
    });

    verifyTable(db, "shops", shops);
    verifyTable(db, "users", users);
    verifyTable(db, "items", items);
    verifyTable(db, "sales", sales);

    await storeCall("ensureAdmin", () => ensureAdmin(db));

    console.log("[DB] ✅ Database initialized successfully");
  } catch (error) {
    console.error("[DB] ❌ Failed to initialize database:", error);
    throw error;
  }
}
