import { WebSocketServer, WebSocket } from "ws";
import type { Server } from "http";
import { z } from "zod";
import type { SessionStore } from "./auth";

export type InventoryEventName = "item_created" | "item_updated" | "item_deleted" | "sale_recorded";

export interface InventoryEvent {
  event: InventoryEventName;
  shopId: number;
  itemId: number;
  // Stock after the change, null once the item is gone
  quantity: number | null;
}

// The part of a ws socket the feed relies on
export interface FeedSocket {
  readyState: number;
  send(data: string): void;
  close(): void;
}

const authMessageSchema = z.object({
  type: z.literal("auth"),
  token: z.string().min(1),
});

/**
 * Pushes inventory changes to connected clients. A client receives events of
 * the shop selected in its session at the time the event is published.
 */
export class InventoryFeed {
  // session token -> sockets authenticated with it
  private readonly clients = new Map<string, Set<FeedSocket>>();
  private readonly tokens = new Map<FeedSocket, string>();

  constructor(private readonly sessions: SessionStore) {}

  authenticate(socket: FeedSocket, token: string): boolean {
    const session = this.sessions.get(token);

    if (!session) {
      console.log("[WS] Authentication failed: Invalid token");
      socket.send(JSON.stringify({ type: "auth_error", error: "Invalid token" }));
      socket.close();
      return false;
    }

    this.remove(socket);

    let tokenClients = this.clients.get(token);
    if (!tokenClients) {
      tokenClients = new Set();
      this.clients.set(token, tokenClients);
    }
    tokenClients.add(socket);
    this.tokens.set(socket, token);

    console.log(`[WS] User ${session.userId} authenticated, total devices: ${tokenClients.size}`);
    socket.send(JSON.stringify({ type: "auth_success", userId: session.userId, shopId: session.shopId }));
    return true;
  }

  handleMessage(socket: FeedSocket, raw: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      socket.send(JSON.stringify({ type: "error", error: "Malformed message" }));
      return;
    }

    const auth = authMessageSchema.safeParse(payload);
    if (auth.success) {
      this.authenticate(socket, auth.data.token);
      return;
    }

    socket.send(JSON.stringify({ type: "error", error: "Unsupported message" }));
  }

  remove(socket: FeedSocket): void {
    const token = this.tokens.get(socket);
    if (token === undefined) {
      return;
    }

    this.tokens.delete(socket);
    const tokenClients = this.clients.get(token);
    if (tokenClients) {
      tokenClients.delete(socket);
      if (tokenClients.size === 0) {
        this.clients.delete(token);
      }
    }
  }

  /**
   * Sends the event to every open socket whose session has the event's shop
   * selected. Sockets of expired or destroyed sessions are closed.
   */
  publish(event: InventoryEvent): number {
    const message = JSON.stringify({ type: "inventory", ...event });
    let sentCount = 0;

    for (const [token, sockets] of Array.from(this.clients.entries())) {
      const session = this.sessions.get(token);

      if (!session) {
        for (const socket of Array.from(sockets)) {
          this.remove(socket);
          socket.close();
        }
        continue;
      }

      if (session.shopId !== event.shopId) {
        continue;
      }

      sockets.forEach((socket) => {
        if (socket.readyState === WebSocket.OPEN) {
          socket.send(message);
          sentCount++;
        }
      });
    }

    return sentCount;
  }

  connectionCount(): number {
    return this.tokens.size;
  }

  attach(server: Server): WebSocketServer {
    const wss = new WebSocketServer({ server, path: "/ws" });
    const alive = new WeakMap<WebSocket, boolean>();

    // Heartbeat to detect disconnected clients
    const interval = setInterval(() => {
      wss.clients.forEach((ws) => {
        if (alive.get(ws) === false) {
          this.remove(ws);
          return ws.terminate();
        }
        alive.set(ws, false);
        ws.ping();
      });
    }, 30000);

    wss.on("close", () => {
      clearInterval(interval);
    });

    wss.on("connection", (ws, req) => {
      console.log("[WS] New connection from:", req.socket.remoteAddress);
      alive.set(ws, true);

      ws.on("pong", () => {
        alive.set(ws, true);
      });

      ws.on("message", (data) => {
        this.handleMessage(ws, data.toString());
      });

      ws.on("close", () => {
        this.remove(ws);
      });

      ws.on("error", (error) => {
        console.error("[WS] Socket error:", error);
        this.remove(ws);
      });
    });

    return wss;
  }
}
