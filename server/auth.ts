import type { Request, NextFunction } from "express";
import { randomBytes } from "crypto";
import type { PublicUser, User, UserRole } from "@shared/schema";
import type { IStorage } from "./storage";

const DEFAULT_SESSION_TTL = 24 * 60 * 60 * 1000; // 24 hours

export const AuthMessages = {
  INVALID_CREDENTIALS: "Invalid username or password.",
  AUTH_REQUIRED: "Authentication required",
  INVALID_SESSION: "Invalid or expired session",
  SHOP_REQUIRED: "Select a shop first.",
  SHOP_NOT_FOUND: "Shop not found.",
  ADMIN_REQUIRED: "Admin access required",
  ITEM_MUTATION_DENIED: "You are not allowed to change items.",
} as const;

// Where the presentation layer should send a caller that was turned away
export const Redirects = {
  LOGIN: "/login",
  SELECT_SHOP: "/shops",
  HOME: "/",
} as const;

export interface SessionContext {
  userId: number;
  shopId: number | null;
}

interface Session extends SessionContext {
  expiresAt: number;
}

export function generateSessionToken(): string {
  return randomBytes(32).toString("hex");
}

/**
 * Token-keyed sessions. Each holds the authenticated user and the shop the
 * user is currently working in.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly ttlMs: number = DEFAULT_SESSION_TTL,
    private readonly now: () => number = Date.now,
  ) {}

  create(userId: number): string {
    const token = generateSessionToken();
    this.sessions.set(token, { userId, shopId: null, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  get(token: string): SessionContext | undefined {
    const session = this.sessions.get(token);

    if (!session) {
      return undefined;
    }

    if (this.now() > session.expiresAt) {
      this.sessions.delete(token);
      return undefined;
    }

    return { userId: session.userId, shopId: session.shopId };
  }

  setShop(token: string, shopId: number | null): boolean {
    const session = this.sessions.get(token);
    if (!session || this.now() > session.expiresAt) {
      return false;
    }
    session.shopId = shopId;
    return true;
  }

  destroy(token: string): void {
    this.sessions.delete(token);
  }

  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, session] of Array.from(this.sessions.entries())) {
      if (now > session.expiresAt) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Periodically drops expired sessions. Returns a function that stops the sweep.
   */
  startSweeper(intervalMs: number = 60 * 60 * 1000): () => void {
    const timer = setInterval(() => {
      const removed = this.sweepExpired();
      if (removed > 0) {
        console.log(`[AUTH] Removed ${removed} expired session(s)`);
      }
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

export function toPublicUser(user: User): PublicUser {
  const { password: _password, ...publicUser } = user;
  return publicUser;
}

export function isAdmin(user: Pick<User, "role">): boolean {
  return user.role === "admin";
}

// Which roles may create, edit and delete items
export type ItemMutationPolicy = "any" | "admin";

export function canMutateItems(policy: ItemMutationPolicy, user: Pick<User, "role">): boolean {
  return policy === "any" || isAdmin(user);
}

export type LoginResult =
  | { success: true; token: string; user: PublicUser }
  | { success: false; message: string };

export type SelectShopResult = { success: true; shopId: number | null } | { success: false; message: string };

/**
 * Login, logout and shop selection over a session store.
 */
export class AuthService {
  constructor(
    private readonly storage: IStorage,
    private readonly sessions: SessionStore,
  ) {}

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.storage.getUserByCredentials(username.trim(), password);

    if (!user) {
      return { success: false, message: AuthMessages.INVALID_CREDENTIALS };
    }

    const token = this.sessions.create(user.id);
    console.log(`[AUTH] User ${user.username} logged in`);
    return { success: true, token, user: toPublicUser(user) };
  }

  logout(token: string): void {
    this.sessions.destroy(token);
  }

  /**
   * Resolves a token to its user and selected shop. Sessions whose user no
   * longer exists are treated as unauthenticated.
   */
  async resolve(token: string): Promise<{ user: User; shopId: number | null } | undefined> {
    const session = this.sessions.get(token);
    if (!session) {
      return undefined;
    }

    const user = await this.storage.getUser(session.userId);
    if (!user) {
      this.sessions.destroy(token);
      return undefined;
    }

    return { user, shopId: session.shopId };
  }

  async selectShop(token: string, shopId: number | null): Promise<SelectShopResult> {
    if (shopId !== null) {
      const shop = await this.storage.getShop(shopId);
      if (!shop) {
        return { success: false, message: AuthMessages.SHOP_NOT_FOUND };
      }
    }

    if (!this.sessions.setShop(token, shopId)) {
      return { success: false, message: AuthMessages.INVALID_SESSION };
    }

    return { success: true, shopId };
  }
}

// ═══════════════════════════════════════════════════════════════════
// EXPRESS MIDDLEWARE
// ═══════════════════════════════════════════════════════════════════

export interface RequestAuth {
  token: string;
  user: User;
  shopId: number | null;
}

export interface ShopScope {
  userId: number;
  role: UserRole;
  shopId: number;
}

declare global {
  namespace Express {
    interface Request {
      auth?: RequestAuth;
    }
  }
}

// The parts of an express request and response the middleware touches
export type AuthRequest = Pick<Request, "headers" | "auth">;

export interface JsonResponder {
  status(code: number): { json(body: unknown): unknown };
}

export function bearerToken(req: Pick<Request, "headers">): string | undefined {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) {
    return undefined;
  }
  return header.slice("Bearer ".length).trim() || undefined;
}

/**
 * Auth of a request that went through `requireAuth`.
 */
export function authOf(req: Pick<Request, "auth">): RequestAuth {
  if (!req.auth) {
    throw new Error("Route is missing the requireAuth middleware");
  }
  return req.auth;
}

/**
 * Shop scope of a request that went through `requireShop`.
 */
export function shopScopeOf(req: Pick<Request, "auth">): ShopScope {
  const auth = authOf(req);
  if (auth.shopId === null) {
    throw new Error("Route is missing the requireShop middleware");
  }
  return { userId: auth.user.id, role: auth.user.role, shopId: auth.shopId };
}

export function createAuthMiddleware(auth: AuthService, itemPolicy: ItemMutationPolicy) {
  async function requireAuth(req: AuthRequest, res: JsonResponder, next: NextFunction) {
    const token = bearerToken(req);

    if (!token) {
      return res.status(401).json({ error: AuthMessages.AUTH_REQUIRED, redirect: Redirects.LOGIN });
    }

    try {
      const resolved = await auth.resolve(token);

      if (!resolved) {
        return res.status(401).json({ error: AuthMessages.INVALID_SESSION, redirect: Redirects.LOGIN });
      }

      req.auth = { token, user: resolved.user, shopId: resolved.shopId };
      next();
    } catch (error) {
      next(error);
    }
  }

  // Shop-scoped operations never run shop-less
  function requireShop(req: AuthRequest, res: JsonResponder, next: NextFunction) {
    if (authOf(req).shopId === null) {
      return res.status(409).json({ error: AuthMessages.SHOP_REQUIRED, redirect: Redirects.SELECT_SHOP });
    }
    next();
  }

  function requireAdmin(req: AuthRequest, res: JsonResponder, next: NextFunction) {
    if (!isAdmin(authOf(req).user)) {
      return res.status(403).json({ error: AuthMessages.ADMIN_REQUIRED, redirect: Redirects.HOME });
    }
    next();
  }

  function requireItemMutation(req: AuthRequest, res: JsonResponder, next: NextFunction) {
    if (!canMutateItems(itemPolicy, authOf(req).user)) {
      return res.status(403).json({ error: AuthMessages.ITEM_MUTATION_DENIED, redirect: Redirects.HOME });
    }
    next();
  }

  return { requireAuth, requireShop, requireAdmin, requireItemMutation };
}
