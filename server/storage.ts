import {
  shops,
  users,
  items,
  sales,
  type Shop,
  type User,
  type InsertUser,
  type Item,
  type InsertItem,
  type SalesReportRow,
  type SalesSummary,
  type ActionResult,
} from "@shared/schema";
import { eq, and, desc, sql } from "drizzle-orm";
import type { AppDatabase } from "./db";
import { storeCall } from "./errors";

export interface IStorage {
  // Shop methods
  getAllShops(): Promise<Shop[]>;
  getShop(id: number): Promise<Shop | undefined>;
  getShopByName(name: string): Promise<Shop | undefined>;
  createShop(name: string): Promise<Shop>;

  // User methods
  getUser(id: number): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserByCredentials(username: string, password: string): Promise<User | undefined>;
  getAllUsers(): Promise<User[]>;
  createUser(user: InsertUser): Promise<User>;

  // Inventory methods, always scoped to one shop
  listItems(shopId: number | null): Promise<Item[]>;
  getItem(id: number, shopId?: number): Promise<Item | undefined>;
  createItem(shopId: number, item: InsertItem): Promise<Item>;
  updateItem(id: number, shopId: number, item: InsertItem): Promise<Item | undefined>;
  deleteItem(id: number, shopId: number): Promise<ActionResult>;

  // Reporting
  getSalesReport(shopId: number): Promise<SalesReportRow[]>;
  getSalesSummary(shopId: number): Promise<SalesSummary>;
}

export class DbStorage implements IStorage {
  constructor(private readonly db: AppDatabase) {}

  async getAllShops(): Promise<Shop[]> {
    return storeCall("getAllShops", async () => this.db.select().from(shops).orderBy(shops.id));
  }

  async getShop(id: number): Promise<Shop | undefined> {
    return storeCall("getShop", async () => {
      const result = await this.db.select().from(shops).where(eq(shops.id, id)).limit(1);
      return result[0];
    });
  }

  async getShopByName(name: string): Promise<Shop | undefined> {
    return storeCall("getShopByName", async () => {
      const result = await this.db.select().from(shops).where(eq(shops.name, name)).limit(1);
      return result[0];
    });
  }

  async createShop(name: string): Promise<Shop> {
    return storeCall("createShop", async () => {
      const result = await this.db.insert(shops).values({ name }).returning();
      return result[0];
    });
  }

  async getUser(id: number): Promise<User | undefined> {
    return storeCall("getUser", async () => {
      const result = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
      return result[0];
    });
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    return storeCall("getUserByUsername", async () => {
      const result = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
      return result[0];
    });
  }

  async getUserByCredentials(username: string, password: string): Promise<User | undefined> {
    return storeCall("getUserByCredentials", async () => {
      const result = await this.db
        .select()
        .from(users)
        .where(and(eq(users.username, username), eq(users.password, password)))
        .limit(1);
      return result[0];
    });
  }

  async getAllUsers(): Promise<User[]> {
    return storeCall("getAllUsers", async () => this.db.select().from(users).orderBy(users.id));
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    return storeCall("createUser", async () => {
      const result = await this.db.insert(users).values(insertUser).returning();
      return result[0];
    });
  }

  async listItems(shopId: number | null): Promise<Item[]> {
    if (shopId === null) {
      return [];
    }

    return storeCall("listItems", async () =>
      this.db.select().from(items).where(eq(items.shopId, shopId)).orderBy(desc(items.id)),
    );
  }

  async getItem(id: number, shopId?: number): Promise<Item | undefined> {
    const condition = shopId === undefined ? eq(items.id, id) : and(eq(items.id, id), eq(items.shopId, shopId));

    return storeCall("getItem", async () => {
      const result = await this.db.select().from(items).where(condition).limit(1);
      return result[0];
    });
  }

  async createItem(shopId: number, item: InsertItem): Promise<Item> {
    return storeCall("createItem", async () => {
      const result = await this.db
        .insert(items)
        .values({ shopId, name: item.name, price: item.price, quantity: item.quantity })
        .returning();
      return result[0];
    });
  }

  async updateItem(id: number, shopId: number, item: InsertItem): Promise<Item | undefined> {
    return storeCall("updateItem", async () => {
      const result = await this.db
        .update(items)
        .set({ name: item.name, price: item.price, quantity: item.quantity })
        .where(and(eq(items.id, id), eq(items.shopId, shopId)))
        .returning();
      return result[0];
    });
  }

  async deleteItem(id: number, shopId: number): Promise<ActionResult> {
    return storeCall("deleteItem", async () => {
      const existing = await this.getItem(id, shopId);
      if (!existing) {
        return { success: false, message: "Item not found." };
      }

      const [{ saleCount }] = await this.db
        .select({ saleCount: sql<number>`count(*)` })
        .from(sales)
        .where(eq(sales.itemId, id));

      // Sales keep a foreign key to their item
      if (saleCount > 0) {
        return { success: false, message: "Item has recorded sales and cannot be deleted." };
      }

      await this.db.delete(items).where(and(eq(items.id, id), eq(items.shopId, shopId)));
      return { success: true, message: `Deleted item: ${existing.name}` };
    });
  }

  async getSalesReport(shopId: number): Promise<SalesReportRow[]> {
    return storeCall("getSalesReport", async () =>
      this.db
        .select({
          id: sales.id,
          itemName: items.name,
          username: users.username,
          quantity: sales.quantity,
          total: sales.total,
          createdAt: sales.createdAt,
        })
        .from(sales)
        .innerJoin(items, eq(sales.itemId, items.id))
        .innerJoin(users, eq(sales.userId, users.id))
        .where(eq(sales.shopId, shopId))
        .orderBy(desc(sales.createdAt), desc(sales.id)),
    );
  }

  async getSalesSummary(shopId: number): Promise<SalesSummary> {
    return storeCall("getSalesSummary", async () => {
      const [row] = await this.db
        .select({
          saleCount: sql<number>`count(*)`,
          unitsSold: sql<number>`coalesce(sum(${sales.quantity}), 0)`,
          revenue: sql<number>`coalesce(sum(${sales.total}), 0)`,
        })
        .from(sales)
        .where(eq(sales.shopId, shopId));

      return {
        saleCount: row.saleCount,
        unitsSold: row.unitsSold,
        revenue: Math.round(row.revenue * 100) / 100,
      };
    });
  }
}
