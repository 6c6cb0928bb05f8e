import type { Participant } from "@shared/schema";
import type { AlertConfig } from "../config";
import type { IStorage } from "../storage";
import type { RiskNotifier } from "./riskNotifier";
import { participantLabel } from "./participantMerge";
import { exceedsThreshold } from "./riskScore";

export interface DispatchResult {
  sent: number;
  failed: number;
}

export interface DispatchOptions {
  /** Only these freshly inserted message ids; omitted means every pending one. */
  messageIds?: string[];
}

/**
 * Claim, send, then flag. The claim keeps a concurrent run from sending the
 * same alert; it is released when the send fails so the next run retries.
 */
export class AlertDispatcher {
  constructor(
    private readonly storage: IStorage,
    private readonly notifier: Pick<RiskNotifier, "notify">,
    private readonly config: Pick<AlertConfig, "threshold" | "claimLeaseMs">,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async dispatchFor(participant: Participant, options: DispatchOptions = {}): Promise<DispatchResult> {
    const now = this.now();
    const claimed = await this.storage.claimPendingAlerts({
      participantId: participant.id,
      threshold: this.config.threshold,
      now: now.toISOString(),
      claimedBefore: new Date(now.getTime() - this.config.claimLeaseMs).toISOString(),
      messageIds: options.messageIds,
    });

    const result: DispatchResult = { sent: 0, failed: 0 };
    for (const message of claimed) {
      if (message.riskScore === null || !exceedsThreshold(message.riskScore, this.config.threshold)) {
        await this.storage.releaseAlertClaim(message.id);
        continue;
      }

      const delivered = await this.notifier.notify(participant, message.text, message.riskScore);
      if (delivered) {
        await this.storage.markAlertDispatched(message.id);
        result.sent++;
      } else {
        await this.storage.releaseAlertClaim(message.id);
        result.failed++;
        console.warn(
          `[AlertDispatcher] Alert for message ${message.remoteId} (${participantLabel(participant)}) not delivered, will retry`,
        );
      }
    }

    return result;
  }
}
