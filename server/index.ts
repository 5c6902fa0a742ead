import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { DatabaseStorage } from "./storage";
import { createApp } from "./app";
import { log } from "./logger";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

(async () => {
  const config = loadConfig();
  const database = createDatabase(config.databaseUrl);

  try {
    const storage = new DatabaseStorage(database.db);
    const { httpServer } = await createApp(storage);

    async function gracefulShutdown(signal: string) {
      console.log(`[Process] Received ${signal}, shutting down gracefully...`);
      try {
        await new Promise<void>((resolve, reject) => {
          httpServer.close((err) => (err ? reject(err) : resolve()));
        });
        await database.close();
        process.exit(0);
      } catch (err) {
        console.error("[Process] Error during shutdown:", err);
        process.exit(1);
      }
    }

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

    if (!(await storage.ping())) {
      log("database did not answer the startup ping; serving anyway", "startup");
    }

    httpServer.listen(config.port, "0.0.0.0", () => {
      log(`serving on port ${config.port} (${config.nodeEnv})`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    await database.close();
    process.exit(1);
  }
})();
