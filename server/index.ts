import { getEnv, isProduction } from "./src/config/env";
import { buildMonitorConfig } from "./config";
import { createMonitor } from "./monitor";

const INITIAL_SYNC_DELAY_MS = 5000;

async function main(): Promise<void> {
  const env = getEnv();
  const config = buildMonitorConfig(env);

  console.log(
    `[Monitor] Starting (${isProduction(env) ? "production" : "development"}, roster mode "${config.roster.mode}")`,
  );

  const monitor = createMonitor(config);
  monitor.scheduler.start();

  const initialSync = setTimeout(() => {
    console.log("[Monitor] Running initial sync...");
    monitor.scheduler.runNow("startup").catch((error: unknown) => {
      console.error("[Monitor] Initial sync failed:", error);
    });
  }, INITIAL_SYNC_DELAY_MS);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Monitor] ${signal} received, shutting down`);
    clearTimeout(initialSync);
    monitor
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[Monitor] Error during shutdown:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("[Monitor] Fatal startup error:", error);
  process.exit(1);
});
