import "dotenv/config";
import { initConfig } from "./config/index.js";
import { buildApp } from "./app.js";

async function start() {
  // 1. Load config; fails fast on malformed numeric or log-level settings
  const config = initConfig();

  // 2. Start server
  const app = await buildApp();

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Phrasedrill API running on ${config.host}:${config.port} [${config.env}]`);
  } catch (err) {
    app.log.error(err, "Failed to start server");
    process.exit(1);
  }

  // 3. Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    app.log.info("Shutdown complete.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "Unhandled promise rejection");
    void shutdown("unhandledRejection");
  });
}

start().catch((err: unknown) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
