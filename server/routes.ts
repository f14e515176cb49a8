import type { Express, Request, Response, NextFunction } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { insertItemSchema, insertShopSchema, insertUserSchema } from "@shared/schema";
import type { IStorage } from "./storage";
import type { SaleEngine } from "./sales";
import { parseWholeNumber } from "./sales";
import type { DeploymentController } from "./deployment";
import type { InventoryFeed } from "./websocket";
import {
  AuthMessages,
  authOf,
  createAuthMiddleware,
  shopScopeOf,
  toPublicUser,
  type AuthService,
  type ItemMutationPolicy,
} from "./auth";

export interface RouteDeps {
  storage: IStorage;
  auth: AuthService;
  sales: SaleEngine;
  feed: InventoryFeed;
  deployment: DeploymentController;
  itemPolicy: ItemMutationPolicy;
}

const loginSchema = z.object({
  username: z.string().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

const selectShopSchema = z.object({
  shopId: z.union([z.number(), z.string(), z.null()]),
});

const createWorkerSchema = insertUserSchema.omit({ role: true });

function validationError(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: fromZodError(error).message });
}

function itemIdParam(req: Request): number | null {
  return parseWholeNumber(req.params.id);
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { storage, auth, sales, feed, deployment } = deps;
  const { requireAuth, requireShop, requireAdmin, requireItemMutation } = createAuthMiddleware(
    auth,
    deps.itemPolicy,
  );

  // ═══════════════════════════════════════════════════════════════════
  // AUTH
  // ═══════════════════════════════════════════════════════════════════

  app.post("/api/auth/login", async (req, res, next) => {
    try {
      const validation = loginSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      const result = await auth.login(validation.data.username, validation.data.password);
      if (!result.success) {
        return res.status(401).json({ error: result.message });
      }

      return res.json({ token: result.token, user: result.user });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/auth/logout", requireAuth, (req, res) => {
    auth.logout(authOf(req).token);
    return res.json({ success: true });
  });

  app.get("/api/auth/me", requireAuth, (req, res) => {
    const { user, shopId } = authOf(req);
    return res.json({ user: toPublicUser(user), shopId });
  });

  // ═══════════════════════════════════════════════════════════════════
  // SHOPS
  // ═══════════════════════════════════════════════════════════════════

  app.get("/api/shops", requireAuth, async (req, res, next) => {
    try {
      const allShops = await storage.getAllShops();
      return res.json({ shops: allShops, selectedShopId: authOf(req).shopId });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/shops", requireAuth, requireAdmin, async (req, res, next) => {
    try {
      const validation = insertShopSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      const existing = await storage.getShopByName(validation.data.name);
      if (existing) {
        return res.status(400).json({ error: "A shop with this name already exists." });
      }

      const shop = await storage.createShop(validation.data.name);
      console.log(`[SHOPS] Created shop "${shop.name}" (${shop.id})`);
      return res.status(201).json(shop);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/shops/select", requireAuth, async (req, res, next) => {
    try {
      const validation = selectShopSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      let shopId: number | null = null;
      if (validation.data.shopId !== null && validation.data.shopId !== "") {
        shopId = parseWholeNumber(validation.data.shopId);
        if (shopId === null) {
          return res.status(400).json({ error: AuthMessages.SHOP_NOT_FOUND });
        }
      }

      const result = await auth.selectShop(authOf(req).token, shopId);
      if (!result.success) {
        return res.status(400).json({ error: result.message });
      }

      return res.json({ shopId: result.shopId });
    } catch (error) {
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════════
  // ITEMS
  // ═══════════════════════════════════════════════════════════════════

  app.get("/api/items", requireAuth, requireShop, async (req, res, next) => {
    try {
      const { shopId } = shopScopeOf(req);
      return res.json(await storage.listItems(shopId));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/items/:id", requireAuth, requireShop, async (req, res, next) => {
    try {
      const id = itemIdParam(req);
      const item = id === null ? undefined : await storage.getItem(id, shopScopeOf(req).shopId);
      if (!item) {
        return res.status(404).json({ error: "Item not found." });
      }
      return res.json(item);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/items", requireAuth, requireShop, requireItemMutation, async (req, res, next) => {
    try {
      const validation = insertItemSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      const { shopId } = shopScopeOf(req);
      const item = await storage.createItem(shopId, validation.data);
      feed.publish({ event: "item_created", shopId, itemId: item.id, quantity: item.quantity });
      return res.status(201).json(item);
    } catch (error) {
      next(error);
    }
  });

  app.put("/api/items/:id", requireAuth, requireShop, requireItemMutation, async (req, res, next) => {
    try {
      const id = itemIdParam(req);
      if (id === null) {
        return res.status(404).json({ error: "Item not found." });
      }

      const validation = insertItemSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      const { shopId } = shopScopeOf(req);
      const updated = await storage.updateItem(id, shopId, validation.data);
      if (!updated) {
        return res.status(404).json({ error: "Item not found." });
      }

      feed.publish({ event: "item_updated", shopId, itemId: updated.id, quantity: updated.quantity });
      return res.json(updated);
    } catch (error) {
      next(error);
    }
  });

  app.delete("/api/items/:id", requireAuth, requireShop, requireItemMutation, async (req, res, next) => {
    try {
      const id = itemIdParam(req);
      if (id === null) {
        return res.status(404).json({ error: "Item not found." });
      }

      const { shopId } = shopScopeOf(req);
      const result = await storage.deleteItem(id, shopId);
      if (!result.success) {
        return res.status(400).json({ error: result.message });
      }

      feed.publish({ event: "item_deleted", shopId, itemId: id, quantity: null });
      return res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════════
  // SALES & REPORTS
  // ═══════════════════════════════════════════════════════════════════

  app.post("/api/sales", requireAuth, requireShop, async (req, res, next) => {
    try {
      const { userId, shopId } = shopScopeOf(req);
      const body: Record<string, unknown> = typeof req.body === "object" && req.body !== null ? req.body : {};
      const outcome = await sales.sell({ userId, shopId }, body.itemId, body.quantity);

      if (!outcome.success) {
        return res.status(400).json(outcome);
      }

      feed.publish({
        event: "sale_recorded",
        shopId,
        itemId: outcome.sale.itemId,
        quantity: outcome.remainingQuantity,
      });
      return res.status(201).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/reports/sales", requireAuth, requireShop, async (req, res, next) => {
    try {
      const { shopId } = shopScopeOf(req);
      const [rows, summary] = await Promise.all([storage.getSalesReport(shopId), storage.getSalesSummary(shopId)]);
      return res.json({ shopId, summary, rows });
    } catch (error) {
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════════
  // USERS (admin)
  // ═══════════════════════════════════════════════════════════════════

  app.get("/api/users", requireAuth, requireAdmin, async (_req, res, next) => {
    try {
      const allUsers = await storage.getAllUsers();
      return res.json(allUsers.map(toPublicUser));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/users", requireAuth, requireAdmin, async (req, res, next) => {
    try {
      const validation = createWorkerSchema.safeParse(req.body);
      if (!validation.success) {
        return validationError(res, validation.error);
      }

      const existing = await storage.getUserByUsername(validation.data.username);
      if (existing) {
        return res.status(400).json({ error: "A user with this username already exists." });
      }

      const user = await storage.createUser({ ...validation.data, role: "worker" });
      console.log(`[USERS] Worker ${user.username} created by ${authOf(req).user.username}`);
      return res.status(201).json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════════
  // SYSTEM
  // ═══════════════════════════════════════════════════════════════════

  app.post("/api/system/update", requireAuth, requireAdmin, async (_req, res, next) => {
    try {
      const result = await deployment.triggerUpdate();
      return res.status(result.success ? 200 : 500).json(result);
    } catch (error) {
      next(error);
    }
  });

  // Store faults and anything else unexpected
  app.use("/api", (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[SERVER] Request failed:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  const httpServer = createServer(app);

  feed.attach(httpServer);

  return httpServer;
}
