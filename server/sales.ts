import { items, sales, wholeNumberSchema, type Item, type Sale } from "@shared/schema";
import { and, eq, gte, sql } from "drizzle-orm";
import type { AppDatabase } from "./db";
import type { IStorage } from "./storage";
import { storeCall } from "./errors";

export const SaleMessages = {
  INVALID_INPUT: "Please select a valid item and quantity.",
  QUANTITY_TOO_LOW: "Quantity must be at least 1.",
  ITEM_NOT_FOUND: "Selected item not found.",
  NOT_ENOUGH_STOCK: "Not enough stock to complete the sale.",
  RECORDED: "Sale recorded successfully.",
} as const;

export interface SaleContext {
  userId: number;
  shopId: number;
}

export type SaleOutcome =
  | { success: true; message: string; sale: Sale; remainingQuantity: number }
  | { success: false; message: string };

type TransactionResult =
  | { kind: "recorded"; sale: Sale; remainingQuantity: number }
  | { kind: "not_found" }
  | { kind: "insufficient" };

// "3" and 3 pass, "3.5", "abc", "" and unsafe integers do not
export function parseWholeNumber(raw: unknown): number | null {
  const result = wholeNumberSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Sale total in currency units: price x quantity rounded to whole cents, so
 * 9.99 x 3 is exactly 29.97 and 0.004 x 1000 is 4.
 */
export function saleTotal(price: number, quantity: number): number {
  return Math.round(price * quantity * 100) / 100;
}

function rejected(message: string): SaleOutcome {
  return { success: false, message };
}

export class SaleEngine {
  constructor(
    private readonly db: AppDatabase,
    private readonly storage: IStorage,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Validates and records a sale for the caller's selected shop.
   *
   * Stock is decremented with a conditional update inside an IMMEDIATE
   * transaction, so a sale that passed the early stock check against a stale
   * read still cannot oversell.
   */
  async sell(ctx: SaleContext, rawItemId: unknown, rawQuantity: unknown): Promise<SaleOutcome> {
    const itemId = parseWholeNumber(rawItemId);
    const quantity = parseWholeNumber(rawQuantity);

    if (itemId === null || quantity === null) {
      return rejected(SaleMessages.INVALID_INPUT);
    }

    if (quantity < 1) {
      return rejected(SaleMessages.QUANTITY_TOO_LOW);
    }

    const item = await this.storage.getItem(itemId, ctx.shopId);
    if (!item) {
      return rejected(SaleMessages.ITEM_NOT_FOUND);
    }

    if (quantity > item.quantity) {
      return rejected(SaleMessages.NOT_ENOUGH_STOCK);
    }

    const result = await storeCall("recordSale", () => this.recordSale(ctx, item, quantity));

    switch (result.kind) {
      case "not_found":
        return rejected(SaleMessages.ITEM_NOT_FOUND);
      case "insufficient":
        return rejected(SaleMessages.NOT_ENOUGH_STOCK);
      case "recorded":
        console.log(
          `[SALES] shop=${ctx.shopId} item=${item.id} qty=${quantity} total=${result.sale.total} user=${ctx.userId}`,
        );
        return {
          success: true,
          message: SaleMessages.RECORDED,
          sale: result.sale,
          remainingQuantity: result.remainingQuantity,
        };
    }
  }

  private recordSale(ctx: SaleContext, item: Item, quantity: number): TransactionResult {
    const scope = and(eq(items.id, item.id), eq(items.shopId, ctx.shopId));

    return this.db.transaction(
      (tx): TransactionResult => {
        const current = tx.select().from(items).where(scope).get();
        if (!current) {
          return { kind: "not_found" };
        }

        const update = tx
          .update(items)
          .set({ quantity: sql`${items.quantity} - ${quantity}` })
          .where(and(scope, gte(items.quantity, quantity)))
          .run();

        if (update.changes === 0) {
          return { kind: "insufficient" };
        }

        const sale = tx
          .insert(sales)
          .values({
            shopId: ctx.shopId,
            itemId: current.id,
            userId: ctx.userId,
            quantity,
            total: saleTotal(current.price, quantity),
            createdAt: this.clock().toISOString(),
          })
          .returning()
          .get();

        return { kind: "recorded", sale, remainingQuantity: current.quantity - quantity };
      },
      { behavior: "immediate" },
    );
  }
}
