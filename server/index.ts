import express from "express";
import { loadConfig } from "./config";
import { pool } from "./db";
import { startEngine } from "./engine";
import { registerRoutes } from "./routes";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.apiKey) {
    console.warn("[server] API_KEY is not set; every /api request will be rejected");
  }
  const engine = await startEngine(config);

  const app = express();
  app.use(express.json({ limit: "10mb" }));
  const server = await registerRoutes(app, engine.service, { apiKey: config.apiKey });

  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close();
    engine
      .close()
      .then(() => (config.storage === "pg" ? pool.end() : undefined))
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[server] shutdown failed:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});
