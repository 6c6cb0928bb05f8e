/**
 * Rescans every active participant and restores conversations and messages
 * missing from the local store.
 *
 * Run with: npx tsx scripts/reconcile.ts [--dry-run]
 */

import { getEnv } from "../server/src/config/env";
import { buildMonitorConfig } from "../server/config";
import { createMonitor } from "../server/monitor";

async function main(): Promise<void> {
  const dryRun = process.argv.includes("--dry-run");
  const monitor = createMonitor(buildMonitorConfig(getEnv()));

  try {
    const report = await monitor.reconciler.reconcile({ dryRun });

    console.log("=".repeat(60));
    console.log(dryRun ? "Missing data (dry run, nothing written)" : "Missing data restored");
    console.log("=".repeat(60));
    for (const gap of report.gaps) {
      if (gap.error) {
        console.log(`${gap.label}: rescan failed (${gap.error})`);
        continue;
      }
      console.log(
        `${gap.label}: ${gap.missingConversations.length} conversations, ${gap.missingMessages.length} messages`,
      );
    }
    console.log(
      `Checked ${report.participantsChecked} participants; restored ${report.conversationsRestored} conversations, ` +
        `${report.messagesRestored} messages; sent ${report.alertsSent} alerts`,
    );
  } finally {
    await monitor.close();
  }
}

main().catch((error: unknown) => {
  console.error("[Reconcile] Error:", error);
  process.exit(1);
});
