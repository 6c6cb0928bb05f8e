import type { Participant } from "@shared/schema";
import { errorMessage } from "../errors";
import type { IStorage } from "../storage";
import type { AlertDispatcher } from "./alertDispatcher";
import type { ConversationSource, RemoteConversationRecord, RemoteMessageRecord } from "./conversationSource";
import { participantLabel } from "./participantMerge";

export interface ParticipantGap {
  participantId: string;
  label: string;
  missingConversations: string[];
  missingMessages: string[];
  error?: string;
}

export interface ReconcileReport {
  dryRun: boolean;
  participantsChecked: number;
  conversationsRestored: number;
  messagesRestored: number;
  alertsSent: number;
  gaps: ParticipantGap[];
}

/**
 * Full rescan of every active participant, ignoring the watermark, to find
 * remote records the incremental sync never stored. Writes no checkpoint.
 */
export class MissingDataReconciler {
  constructor(
    private readonly storage: IStorage,
    private readonly source: ConversationSource,
    private readonly dispatcher: Pick<AlertDispatcher, "dispatchFor">,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async reconcile(options: { dryRun: boolean }): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      dryRun: options.dryRun,
      participantsChecked: 0,
      conversationsRestored: 0,
      messagesRestored: 0,
      alertsSent: 0,
      gaps: [],
    };

    const participants = await this.storage.listActiveParticipants();
    for (const participant of participants) {
      if (!participant.remoteId) continue;
      report.participantsChecked++;

      const gap = await this.reconcileParticipant(participant, participant.remoteId, options.dryRun, report);
      if (gap.error || gap.missingConversations.length > 0 || gap.missingMessages.length > 0) {
        report.gaps.push(gap);
      }
    }

    console.log(
      `[Reconciler] ${options.dryRun ? "Found" : "Restored"} ${sumBy(report.gaps, (gap) => gap.missingConversations.length)} conversations ` +
        `and ${sumBy(report.gaps, (gap) => gap.missingMessages.length)} messages across ${report.participantsChecked} participants`,
    );
    return report;
  }

  private async reconcileParticipant(
    participant: Participant,
    remoteId: string,
    dryRun: boolean,
    report: ReconcileReport,
  ): Promise<ParticipantGap> {
    const label = participantLabel(participant);
    const gap: ParticipantGap = {
      participantId: participant.id,
      label,
      missingConversations: [],
      missingMessages: [],
    };

    let conversations: RemoteConversationRecord[];
    const messages: RemoteMessageRecord[] = [];
    try {
      conversations = await this.source.fetchConversations(remoteId);
      for (const conversation of conversations) {
        messages.push(...(await this.source.fetchMessages(remoteId, conversation.remoteId)));
      }
    } catch (error) {
      console.warn(`[Reconciler] Could not rescan ${label}:`, errorMessage(error));
      gap.error = errorMessage(error);
      return gap;
    }

    const known = await this.storage.listKnownRemoteIds(participant.id);
    const missingConversations = conversations.filter((conversation) => !known.conversations.has(conversation.remoteId));
    const missingMessages = messages.filter((message) => !known.messages.has(message.remoteId));
    gap.missingConversations = missingConversations.map((conversation) => conversation.remoteId);
    gap.missingMessages = missingMessages.map((message) => message.remoteId);

    if (dryRun || (missingConversations.length === 0 && missingMessages.length === 0)) {
      return gap;
    }

    const batch = await this.storage.persistParticipantBatch(
      participant.id,
      missingConversations,
      missingMessages,
      this.now().toISOString(),
    );
    report.conversationsRestored += batch.conversationsInserted;
    report.messagesRestored += batch.messagesInserted.length;

    if (batch.messagesInserted.length > 0) {
      const dispatched = await this.dispatcher.dispatchFor(participant, {
        messageIds: batch.messagesInserted.map((message) => message.id),
      });
      report.alertsSent += dispatched.sent;
    }

    return gap;
  }
}

function sumBy<T>(items: T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}
