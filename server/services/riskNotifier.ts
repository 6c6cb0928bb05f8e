import type { Participant } from "@shared/schema";
import { maskPhoneNumber, type SmsTransport } from "../twilioClient";
import { participantLabel } from "./participantMerge";

const PREVIEW_LENGTH = 100;

export type AlertParticipant = Pick<Participant, "identifier" | "remoteId" | "directoryId" | "handlerLabel">;

export interface RiskNotifierOptions {
  recipients: string[];
  timezone: string;
  now?: () => Date;
}

export function formatAlertTime(date: Date, timezone: string): string {
  return new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
    timeZoneName: "short",
  }).format(date);
}

export function messagePreview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

export function formatRiskAlert(
  participant: AlertParticipant,
  messageText: string,
  riskScore: number,
  time: string,
): string {
  const lines = [
    "RISK ALERT",
    "High-risk message detected!",
    "",
    `Participant: ${participantLabel(participant)}`,
  ];
  if (participant.handlerLabel) lines.push(`Handler: ${participant.handlerLabel}`);
  lines.push(
    `Risk Score: ${riskScore.toFixed(2)}`,
    `Time: ${time}`,
    "",
    `Message preview: ${messagePreview(messageText)}`,
  );
  return lines.join("\n");
}

/**
 * Sends one alert per flagged message to every configured recipient.
 * Never throws: the caller decides what an unsent alert means.
 */
export class RiskNotifier {
  private readonly now: () => Date;

  constructor(
    private readonly transport: SmsTransport,
    private readonly options: RiskNotifierOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async notify(participant: AlertParticipant, messageText: string, riskScore: number): Promise<boolean> {
    const recipients = this.options.recipients.map((number) => number.trim()).filter((number) => number.length > 0);
    if (recipients.length === 0) {
      console.warn("[RiskNotifier] No alert recipients configured, alert not sent");
      return false;
    }

    const now = this.now();
    let time: string;
    try {
      time = formatAlertTime(now, this.options.timezone);
    } catch (error) {
      console.error(`[RiskNotifier] Cannot format time in zone "${this.options.timezone}", using UTC:`, error);
      time = now.toISOString();
    }
    const body = formatRiskAlert(participant, messageText, riskScore, time);

    let delivered = 0;
    const failed: string[] = [];

    for (const recipient of recipients) {
      try {
        const result = await this.transport.send(recipient, body);
        if (result.ok) {
          delivered++;
          console.log(`[RiskNotifier] Alert sent to ${maskPhoneNumber(recipient)}: ${result.sid}`);
        } else {
          failed.push(recipient);
          console.error(`[RiskNotifier] Failed to send alert to ${maskPhoneNumber(recipient)}: ${result.error}`);
        }
      } catch (error) {
        failed.push(recipient);
        console.error(`[RiskNotifier] Transport error for ${maskPhoneNumber(recipient)}:`, error);
      }
    }

    if (failed.length > 0) {
      console.warn(`[RiskNotifier] ${failed.length} of ${recipients.length} recipients did not receive the alert`);
    }

    return delivered > 0;
  }

  async sendTestMessage(to: string): Promise<{ ok: boolean; detail: string }> {
    const result = await this.transport.send(
      to,
      "This is a test message from the participant monitor. SMS alerts are working!",
    );
    return result.ok
      ? { ok: true, detail: `Test message sent. SID: ${result.sid}` }
      : { ok: false, detail: `Failed to send test message: ${result.error}` };
  }
}
