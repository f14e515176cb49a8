import { describe, it, expect } from "vitest";
import { loadConfig } from "../../server/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({ APP_DIR: "/srv/shop" });

    expect(config).toEqual({
      port: 8000,
      host: "0.0.0.0",
      sqlitePath: "instance/shop.db",
      sessionTtlMs: 24 * 60 * 60 * 1000,
      itemMutationRole: "any",
      appDir: "/srv/shop",
      updateSteps: [
        ["git", "pull", "--ff-only"],
        ["npm", "install"],
      ],
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "9090",
      SQLITE_PATH: "/var/lib/shop/shop.db",
      SESSION_TTL_HOURS: "2",
      ITEM_MUTATION_ROLE: "admin",
      UPDATE_COMMAND: "git pull origin main",
      UPDATE_INSTALL: "false",
    });

    expect(config.port).toBe(9090);
    expect(config.sqlitePath).toBe("/var/lib/shop/shop.db");
    expect(config.sessionTtlMs).toBe(7_200_000);
    expect(config.itemMutationRole).toBe("admin");
    expect(config.updateSteps).toEqual([["git", "pull", "origin", "main"]]);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/\[Config\]/);
    expect(() => loadConfig({ ITEM_MUTATION_ROLE: "manager" })).toThrow(/ITEM_MUTATION_ROLE/);
  });
});
