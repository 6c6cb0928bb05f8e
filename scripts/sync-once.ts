/**
 * Runs one sync pass and exits.
 *
 * Run with: npx tsx scripts/sync-once.ts
 */

import { getEnv } from "../server/src/config/env";
import { buildMonitorConfig } from "../server/config";
import { createMonitor } from "../server/monitor";

async function main(): Promise<number> {
  const monitor = createMonitor(buildMonitorConfig(getEnv()));
  try {
    const result = await monitor.orchestrator.run("manual");
    console.log("[SyncOnce] Result:", JSON.stringify({ ...result, checkpoint: undefined }, null, 2));
    return 0;
  } catch (error) {
    console.error("[SyncOnce] Sync failed:", error);
    return 1;
  } finally {
    await monitor.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("[SyncOnce] Error:", error);
    process.exit(1);
  });
