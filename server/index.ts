import express, { type Express } from "express";
import { loadConfig, type AppConfig } from "./config";
import { openStore, type Store } from "./db";
import { initializeDatabase } from "./init-db";
import { DbStorage } from "./storage";
import { SaleEngine } from "./sales";
import { AuthService, SessionStore } from "./auth";
import { InventoryFeed } from "./websocket";
import { ShellDeploymentController } from "./deployment";
import { registerRoutes } from "./routes";

function requestLogger(app: Express) {
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        console.log(`[SERVER] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });
}

async function startServer(config: AppConfig): Promise<{ store: Store; close: () => void }> {
  const store = openStore(config.sqlitePath);
  console.log(`[DB] SQLite database: ${config.sqlitePath}`);

  // Nothing is served until the schema is in place
  await initializeDatabase(store.db);

  const storage = new DbStorage(store.db);
  const sessions = new SessionStore(config.sessionTtlMs);
  const stopSweeper = sessions.startSweeper();

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  requestLogger(app);

  const server = registerRoutes(app, {
    storage,
    auth: new AuthService(storage, sessions),
    sales: new SaleEngine(store.db, storage),
    feed: new InventoryFeed(sessions),
    deployment: new ShellDeploymentController(config.appDir, config.updateSteps),
    itemPolicy: config.itemMutationRole,
  });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => resolve());
  });
  console.log(`[SERVER] Listening on http://${config.host}:${config.port}`);

  return {
    store,
    close: () => {
      stopSweeper();
      server.close();
      store.close();
    },
  };
}

Promise.resolve()
  .then(() => startServer(loadConfig()))
  .then(({ close }) => {
    const shutdown = () => {
      console.log("[SERVER] Shutting down...");
      close();
      process.exit(0);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  })
  .catch((error) => {
    console.error("[SERVER] Failed to start:", error);
    process.exit(1);
  });
