/**
 * Sends a fixed test message through the configured SMS transport.
 *
 * Run with: npx tsx scripts/send-test-sms.ts <phone-number>
 */

import { getEnv } from "../server/src/config/env";
import { buildMonitorConfig } from "../server/config";
import { createSmsTransport, maskPhoneNumber } from "../server/twilioClient";
import { RiskNotifier } from "../server/services/riskNotifier";

async function main(): Promise<number> {
  const to = process.argv[2];
  if (!to) {
    console.error("Usage: npx tsx scripts/send-test-sms.ts <phone-number>");
    return 1;
  }

  const config = buildMonitorConfig(getEnv());
  const notifier = new RiskNotifier(createSmsTransport(config.twilio), {
    recipients: [to],
    timezone: config.alerts.timezone,
  });

  const result = await notifier.sendTestMessage(to);
  console.log(`[TestSms] ${maskPhoneNumber(to)}: ${result.detail}`);
  return result.ok ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("[TestSms] Error:", error);
    process.exit(1);
  });
