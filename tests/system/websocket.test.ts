import { describe, it, expect, beforeEach, vi } from "vitest";
import { WebSocket } from "ws";
import { SessionStore } from "../../server/auth";
import { InventoryFeed } from "../../server/websocket";

function fakeSocket() {
  return { readyState: WebSocket.OPEN, send: vi.fn<(data: string) => void>(), close: vi.fn<() => void>() };
}

describe("InventoryFeed", () => {
  let sessions: SessionStore;
  let feed: InventoryFeed;

  beforeEach(() => {
    sessions = new SessionStore();
    feed = new InventoryFeed(sessions);
  });

  it("closes a socket that presents an unknown token", () => {
    const socket = fakeSocket();

    expect(feed.authenticate(socket, "missing-token")).toBe(false);

    expect(socket.send).toHaveBeenCalledWith(JSON.stringify({ type: "auth_error", error: "Invalid token" }));
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(feed.connectionCount()).toBe(0);
  });

  it("acknowledges a valid token with the session's user and shop", () => {
    const token = sessions.create(5);
    sessions.setShop(token, 2);
    const socket = fakeSocket();

    feed.handleMessage(socket, JSON.stringify({ type: "auth", token }));

    expect(socket.send).toHaveBeenCalledWith(JSON.stringify({ type: "auth_success", userId: 5, shopId: 2 }));
    expect(feed.connectionCount()).toBe(1);
  });

  it("sends events only to sockets working in the event's shop", () => {
    const alphaToken = sessions.create(1);
    sessions.setShop(alphaToken, 1);
    const betaToken = sessions.create(2);
    sessions.setShop(betaToken, 2);
    const alphaSocket = fakeSocket();
    const secondAlphaSocket = fakeSocket();
    const betaSocket = fakeSocket();
    feed.authenticate(alphaSocket, alphaToken);
    feed.authenticate(secondAlphaSocket, alphaToken);
    feed.authenticate(betaSocket, betaToken);

    const sent = feed.publish({ event: "sale_recorded", shopId: 1, itemId: 9, quantity: 7 });

    expect(sent).toBe(2);
    expect(alphaSocket.send).toHaveBeenLastCalledWith(
      JSON.stringify({ type: "inventory", event: "sale_recorded", shopId: 1, itemId: 9, quantity: 7 }),
    );
    expect(betaSocket.send).toHaveBeenCalledTimes(1);
  });

  it("follows a shop switch made after the socket authenticated", () => {
    const token = sessions.create(1);
    sessions.setShop(token, 1);
    const socket = fakeSocket();
    feed.authenticate(socket, token);

    sessions.setShop(token, 2);

    expect(feed.publish({ event: "item_updated", shopId: 1, itemId: 3, quantity: 4 })).toBe(0);
    expect(feed.publish({ event: "item_deleted", shopId: 2, itemId: 8, quantity: null })).toBe(1);
  });

  it("skips sockets that are no longer open", () => {
    const token = sessions.create(1);
    sessions.setShop(token, 1);
    const socket = { ...fakeSocket(), readyState: WebSocket.CLOSING };
    feed.authenticate(socket, token);

    expect(feed.publish({ event: "item_created", shopId: 1, itemId: 1, quantity: 10 })).toBe(0);
  });

  it("closes sockets whose session has ended", () => {
    const token = sessions.create(1);
    sessions.setShop(token, 1);
    const socket = fakeSocket();
    feed.authenticate(socket, token);

    sessions.destroy(token);

    expect(feed.publish({ event: "item_created", shopId: 1, itemId: 1, quantity: 10 })).toBe(0);
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(feed.connectionCount()).toBe(0);
  });

  it("answers malformed and unsupported messages with an error", () => {
    const socket = fakeSocket();

    feed.handleMessage(socket, "{not json");
    feed.handleMessage(socket, JSON.stringify({ type: "subscribe" }));

    expect(socket.send.mock.calls).toEqual([
      [JSON.stringify({ type: "error", error: "Malformed message" })],
      [JSON.stringify({ type: "error", error: "Unsupported message" })],
    ]);
    expect(socket.close).not.toHaveBeenCalled();
  });

  it("forgets removed sockets", () => {
    const token = sessions.create(1);
    sessions.setShop(token, 1);
    const socket = fakeSocket();
    feed.authenticate(socket, token);

    feed.remove(socket);

    expect(feed.connectionCount()).toBe(0);
    expect(feed.publish({ event: "item_created", shopId: 1, itemId: 1, quantity: 1 })).toBe(0);
  });
});
