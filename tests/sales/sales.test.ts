import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { insertItemSchema, type Shop, type User } from "@shared/schema";
import { SaleEngine, SaleMessages, parseWholeNumber, saleTotal } from "../../server/sales";
import { DbStorage } from "../../server/storage";
import { openStore } from "../../server/db";
import { StoreError } from "../../server/errors";
import { countRows, createTestContext, createWorker, type TestContext } from "../helpers";

describe("SaleEngine", () => {
  let ctx: TestContext;
  let alpha: Shop;
  let worker: User;

  beforeEach(async () => {
    ctx = await createTestContext();
    alpha = await ctx.storage.createShop("Alpha");
    worker = await createWorker(ctx.storage);
  });

  afterEach(() => {
    ctx.store.close();
  });

  it("records a sale and rejects one that exceeds the remaining stock", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    const saleCtx = { userId: worker.id, shopId: alpha.id };

    const sold = await ctx.engine.sell(saleCtx, String(widget.id), "3");

    expect(sold.success).toBe(true);
    expect(sold.message).toBe("Sale recorded successfully.");
    if (sold.success) {
      expect(sold.remainingQuantity).toBe(7);
      expect(sold.sale.total).toBe(29.97);
      expect(sold.sale.quantity).toBe(3);
    }
    expect((await ctx.storage.getItem(widget.id))?.quantity).toBe(7);

    const report = await ctx.storage.getSalesReport(alpha.id);
    expect(report).toHaveLength(1);
    expect(report[0].total).toBe(29.97);

    const tooMany = await ctx.engine.sell(saleCtx, String(widget.id), "20");

    expect(tooMany).toEqual({ success: false, message: "Not enough stock to complete the sale." });
    expect((await ctx.storage.getItem(widget.id))?.quantity).toBe(7);
    expect(countRows(ctx.store, "sales")).toBe(1);
  });

  it("rejects quantities below one without touching stock", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    const saleCtx = { userId: worker.id, shopId: alpha.id };

    for (const quantity of [0, -2, "0"]) {
      expect(await ctx.engine.sell(saleCtx, widget.id, quantity)).toEqual({
        success: false,
        message: SaleMessages.QUANTITY_TOO_LOW,
      });
    }

    expect((await ctx.storage.getItem(widget.id))?.quantity).toBe(10);
    expect(countRows(ctx.store, "sales")).toBe(0);
  });

  it("rejects input that is not a whole number", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    const saleCtx = { userId: worker.id, shopId: alpha.id };

    expect(await ctx.engine.sell(saleCtx, widget.id, "abc")).toEqual({
      success: false,
      message: "Please select a valid item and quantity.",
    });
    expect(await ctx.engine.sell(saleCtx, widget.id, "2.5")).toEqual({
      success: false,
      message: SaleMessages.INVALID_INPUT,
    });
    expect(await ctx.engine.sell(saleCtx, "", 1)).toEqual({ success: false, message: SaleMessages.INVALID_INPUT });
    expect(await ctx.engine.sell(saleCtx, undefined, undefined)).toEqual({
      success: false,
      message: SaleMessages.INVALID_INPUT,
    });
    expect(countRows(ctx.store, "sales")).toBe(0);
  });

  it("does not sell an item that belongs to another shop", async () => {
    const beta = await ctx.storage.createShop("Beta");
    const bolt = await ctx.storage.createItem(beta.id, { name: "Bolt", price: 0.25, quantity: 100 });

    const outcome = await ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, bolt.id, 1);

    expect(outcome).toEqual({ success: false, message: "Selected item not found." });
    expect((await ctx.storage.getItem(bolt.id))?.quantity).toBe(100);
    expect(countRows(ctx.store, "sales")).toBe(0);
  });

  it("answers not found for an unknown item id", async () => {
    const outcome = await ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, 9999, 1);

    expect(outcome).toEqual({ success: false, message: SaleMessages.ITEM_NOT_FOUND });
  });

  it("sells the whole stock down to zero and no further", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 2, quantity: 10 });
    const saleCtx = { userId: worker.id, shopId: alpha.id };
    const attempts = [4, 5, 3, 2, 7, 1];
    const results: boolean[] = [];

    for (const quantity of attempts) {
      const outcome = await ctx.engine.sell(saleCtx, widget.id, quantity);
      results.push(outcome.success);
      const current = await ctx.storage.getItem(widget.id);
      expect(current?.quantity).toBeGreaterThanOrEqual(0);
    }

    expect(results).toEqual([true, true, false, false, false, true]);
    expect((await ctx.storage.getItem(widget.id))?.quantity).toBe(0);
    expect(countRows(ctx.store, "sales")).toBe(3);
  });

  it("lets only one of two concurrent sales through when together they exceed stock", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    const other = await createWorker(ctx.storage, "worker2");

    const outcomes = await Promise.all([
      ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, widget.id, 6),
      ctx.engine.sell({ userId: other.id, shopId: alpha.id }, widget.id, 6),
    ]);

    expect(outcomes.filter((o) => o.success)).toHaveLength(1);
    expect(outcomes.filter((o) => !o.success).map((o) => o.message)).toEqual([SaleMessages.NOT_ENOUGH_STOCK]);
    expect((await ctx.storage.getItem(widget.id))?.quantity).toBe(4);
    expect(countRows(ctx.store, "sales")).toBe(1);
  });

  it("keeps the recorded total when the price changes later", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    await ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, widget.id, 3);

    await ctx.storage.updateItem(widget.id, alpha.id, { name: "Widget", price: 20, quantity: 7 });

    const [row] = await ctx.storage.getSalesReport(alpha.id);
    expect(row.total).toBe(29.97);
  });

  it("rounds the product, not the unit price, for a sub-cent price", async () => {
    const washer = await ctx.storage.createItem(
      alpha.id,
      insertItemSchema.parse({ name: "Washer", price: "0.004", quantity: "1000" }),
    );

    const outcome = await ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, washer.id, "1000");

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.sale.total).toBe(4);
      expect(outcome.remainingQuantity).toBe(0);
    }
  });

  it("attributes the sale to the caller's shop and user at the clock's time", async () => {
    ctx.store.close();
    ctx = await createTestContext(":memory:", () => new Date("2026-01-02T03:04:05.000Z"));
    alpha = await ctx.storage.createShop("Alpha");
    worker = await createWorker(ctx.storage);
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 1.25, quantity: 5 });

    const outcome = await ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, widget.id, 2);

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.sale).toEqual({
        id: 1,
        shopId: alpha.id,
        itemId: widget.id,
        userId: worker.id,
        quantity: 2,
        total: 2.5,
        createdAt: "2026-01-02T03:04:05.000Z",
      });
    }
  });

  it("raises a StoreError when the store is unavailable", async () => {
    const widget = await ctx.storage.createItem(alpha.id, { name: "Widget", price: 9.99, quantity: 10 });
    ctx.store.close();

    await expect(ctx.engine.sell({ userId: worker.id, shopId: alpha.id }, widget.id, 1)).rejects.toBeInstanceOf(
      StoreError,
    );
  });
});

describe("SaleEngine across two connections", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "shop-sales-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("does not oversell when two connections sell the same item", async () => {
    const dbPath = path.join(dir, "shop.db");
    const first = await createTestContext(dbPath);
    const secondStore = openStore(dbPath);
    const secondEngine = new SaleEngine(secondStore.db, new DbStorage(secondStore.db));

    try {
      const shop = await first.storage.createShop("Alpha");
      const worker = await createWorker(first.storage);
      const widget = await first.storage.createItem(shop.id, { name: "Widget", price: 9.99, quantity: 10 });
      const saleCtx = { userId: worker.id, shopId: shop.id };

      const outcomes = await Promise.all([
        first.engine.sell(saleCtx, widget.id, 6),
        secondEngine.sell(saleCtx, widget.id, 6),
      ]);

      expect(outcomes.map((o) => o.success).sort()).toEqual([false, true]);
      expect((await first.storage.getItem(widget.id))?.quantity).toBe(4);
      expect(countRows(first.store, "sales")).toBe(1);
    } finally {
      secondStore.close();
      first.store.close();
    }
  });
});

describe("parseWholeNumber", () => {
  it("accepts integers and integer text", () => {
    expect(parseWholeNumber(5)).toBe(5);
    expect(parseWholeNumber("3")).toBe(3);
    expect(parseWholeNumber(" 7 ")).toBe(7);
    expect(parseWholeNumber("-2")).toBe(-2);
  });

  it("rejects anything else", () => {
    expect(parseWholeNumber("3.5")).toBeNull();
    expect(parseWholeNumber(2.5)).toBeNull();
    expect(parseWholeNumber("abc")).toBeNull();
    expect(parseWholeNumber("")).toBeNull();
    expect(parseWholeNumber(null)).toBeNull();
    expect(parseWholeNumber(undefined)).toBeNull();
    expect(parseWholeNumber("99999999999999999999")).toBeNull();
    expect(parseWholeNumber(1e20)).toBeNull();
  });
});

describe("saleTotal", () => {
  it("rounds price times quantity to whole cents", () => {
    expect(saleTotal(9.99, 3)).toBe(29.97);
    expect(saleTotal(0.1, 3)).toBe(0.3);
    expect(saleTotal(2.5, 4)).toBe(10);
    expect(saleTotal(0.004, 1000)).toBe(4);
    expect(saleTotal(0.125, 3)).toBe(0.38);
  });
});
