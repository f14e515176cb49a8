import { sql } from "drizzle-orm";
import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ═══════════════════════════════════════════════════════════════════
// SHOPS - tenant boundary, every item and sale belongs to one shop
// ═══════════════════════════════════════════════════════════════════

export const shops = sqliteTable("shops", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
});

// ═══════════════════════════════════════════════════════════════════
// USERS - 'admin' or 'worker'
// ═══════════════════════════════════════════════════════════════════

export const USER_ROLES = ["admin", "worker"] as const;

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  username: text("username").notNull().unique(),
  // Stored as entered: credentials are compared verbatim
  password: text("password").notNull(),
  role: text("role", { enum: USER_ROLES }).notNull(),
});

// ═══════════════════════════════════════════════════════════════════
// ITEMS - stock on hand per shop
// ═══════════════════════════════════════════════════════════════════

export const items = sqliteTable(
  "items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    shopId: integer("shop_id")
      .notNull()
      .references(() => shops.id),
    name: text("name").notNull(),
    price: real("price").notNull(),
    quantity: integer("quantity").notNull(),
  },
  (table) => ({
    shopIdx: index("items_shop_id_idx").on(table.shopId),
  }),
);

// ═══════════════════════════════════════════════════════════════════
// SALES - immutable record of stock leaving a shop
// ═══════════════════════════════════════════════════════════════════

export const sales = sqliteTable(
  "sales",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    shopId: integer("shop_id")
      .notNull()
      .references(() => shops.id),
    itemId: integer("item_id")
      .notNull()
      .references(() => items.id),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    quantity: integer("quantity").notNull(),
    // Price snapshot: quantity x item price at the moment of sale
    total: real("total").notNull(),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => ({
    shopCreatedIdx: index("sales_shop_created_idx").on(table.shopId, table.createdAt),
  }),
);

// ═══════════════════════════════════════════════════════════════════
// INSERT SCHEMAS
// ═══════════════════════════════════════════════════════════════════

export const insertShopSchema = createInsertSchema(shops, {
  name: z.string().trim().min(1, "Shop name is required"),
}).omit({
  id: true,
});

export const insertUserSchema = createInsertSchema(users, {
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
}).omit({
  id: true,
});

// Form posts arrive as text, JSON clients send numbers. Blank text and null
// are rejected rather than read as 0.
export const wholeNumberSchema = z.union([
  z.number().int().safe(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, "Expected a whole number")
    .transform(Number)
    .refine(Number.isSafeInteger, "Number is too large"),
]);

export const decimalNumberSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^[+-]?(\d+(\.\d*)?|\.\d+)$/, "Expected a number")
    .transform(Number),
]);

export const insertItemSchema = createInsertSchema(items, {
  name: z.string().trim().min(1, "Name is required"),
  price: decimalNumberSchema.pipe(z.number().finite().min(0, "Price cannot be negative")),
  quantity: wholeNumberSchema.pipe(z.number().int().min(0, "Quantity cannot be negative")),
}).omit({
  id: true,
  shopId: true,
});

export type Shop = typeof shops.$inferSelect;

export type UserRole = (typeof USER_ROLES)[number];
export type InsertUser = z.infer<typeof insertUserSchema>;
export type User = typeof users.$inferSelect;
export type PublicUser = Omit<User, "password">;

export type InsertItem = z.infer<typeof insertItemSchema>;
export type Item = typeof items.$inferSelect;

export type Sale = typeof sales.$inferSelect;

export interface SalesReportRow {
  id: number;
  itemName: string;
  username: string;
  quantity: number;
  total: number;
  createdAt: string;
}

export interface SalesSummary {
  saleCount: number;
  unitsSold: number;
  revenue: number;
}

// Outcome of an action whose expected failures are business rules, not faults
export interface ActionResult {
  success: boolean;
  message: string;
}
