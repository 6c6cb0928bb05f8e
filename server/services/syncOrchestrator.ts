import type { Participant, SyncCheckpoint } from "@shared/schema";
import type { AlertConfig } from "../config";
import { errorMessage } from "../errors";
import type { IStorage } from "../storage";
import type { AlertDispatcher } from "./alertDispatcher";
import type { ConversationSource, RemoteConversationRecord, RemoteMessageRecord } from "./conversationSource";
import { participantLabel } from "./participantMerge";
import type { RosterSource } from "./participantResolver";
import { laterTimestamp, maxOccurredAt } from "./watermark";

export type SyncPhase =
  | "idle"
  | "resolving-roster"
  | "syncing-participants"
  | "detecting-risk"
  | "checkpointing"
  | "failed";

export type SyncTrigger = "scheduled" | "manual" | "startup";

export interface UnitFailure {
  scope: "participant" | "conversation";
  participant: string;
  conversationId?: string;
  error: string;
}

export interface SyncRunResult {
  trigger: SyncTrigger;
  participantsSynced: number;
  participantsDeactivated: number;
  conversationsSynced: number;
  messagesSynced: number;
  alertsSent: number;
  alertsFailed: number;
  unitFailures: UnitFailure[];
  watermark: string | null;
  durationMs: number;
  checkpoint: SyncCheckpoint;
}

export interface SyncOrchestratorDeps {
  storage: IStorage;
  roster: RosterSource;
  source: ConversationSource;
  dispatcher: Pick<AlertDispatcher, "dispatchFor">;
  alerts: Pick<AlertConfig, "retryPending">;
  now?: () => Date;
}

interface ParticipantSyncOutcome {
  participant: Participant;
  conversationsInserted: number;
  insertedMessageIds: string[];
  fetched: RemoteMessageRecord[];
}

/**
 * One end-to-end pass: roster, incremental fetch per participant, risk alerts
 * and a checkpoint. Remote failures are confined to their participant or
 * conversation; directory and store failures abort the run without a
 * checkpoint.
 */
export class SyncOrchestrator {
  private phase: SyncPhase = "idle";
  private readonly now: () => Date;

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  getPhase(): SyncPhase {
    return this.phase;
  }

  async run(trigger: SyncTrigger = "manual"): Promise<SyncRunResult> {
    const { storage } = this.deps;
    const startedAt = this.now();
    const syncedAt = startedAt.toISOString();
    const unitFailures: UnitFailure[] = [];

    console.log(`[SyncOrchestrator] Starting ${trigger} sync`);

    try {
      this.phase = "resolving-roster";
      const previous = await storage.getLatestCheckpoint();
      const since = previous?.watermark ?? undefined;

      const roster = await this.deps.roster.resolve();
      const participants: Participant[] = [];
      for (const descriptor of roster) {
        participants.push(await storage.upsertParticipant(descriptor, syncedAt));
      }
      const participantsDeactivated = await storage.deactivateParticipantsExcept(
        participants.map((participant) => participant.id),
      );
      if (participantsDeactivated > 0) {
        console.log(`[SyncOrchestrator] Deactivated ${participantsDeactivated} participants no longer in the roster`);
      }

      this.phase = "syncing-participants";
      console.log(
        `[SyncOrchestrator] Syncing ${participants.length} participants since ${since ?? "the beginning"}`,
      );
      const outcomes: ParticipantSyncOutcome[] = [];
      for (const participant of participants) {
        if (!participant.remoteId) continue;
        const outcome = await this.syncParticipant(participant, participant.remoteId, since, syncedAt, unitFailures);
        if (outcome) outcomes.push(outcome);
      }

      this.phase = "detecting-risk";
      let alertsSent = 0;
      let alertsFailed = 0;
      for (const outcome of outcomes) {
        if (!this.deps.alerts.retryPending && outcome.insertedMessageIds.length === 0) continue;
        const dispatched = await this.deps.dispatcher.dispatchFor(
          outcome.participant,
          this.deps.alerts.retryPending ? {} : { messageIds: outcome.insertedMessageIds },
        );
        alertsSent += dispatched.sent;
        alertsFailed += dispatched.failed;
      }

      this.phase = "checkpointing";
      const fetchedMax = maxOccurredAt(outcomes.flatMap((outcome) => outcome.fetched));
      const conversationsSynced = sum(outcomes.map((outcome) => outcome.conversationsInserted));
      const messagesSynced = sum(outcomes.map((outcome) => outcome.insertedMessageIds.length));
      const durationMs = this.now().getTime() - startedAt.getTime();

      const checkpoint = await storage.appendCheckpoint({
        runAt: syncedAt,
        participantsSynced: participants.length,
        conversationsSynced,
        messagesSynced,
        alertsSent,
        unitFailures: unitFailures.length,
        durationMs,
        watermark: laterTimestamp(since, fetchedMax),
      });

      this.phase = "idle";
      console.log(
        `[SyncOrchestrator] Sync complete: ${participants.length} participants, ${conversationsSynced} conversations, ` +
          `${messagesSynced} messages, ${alertsSent} alerts, ${unitFailures.length} unit failures in ${durationMs}ms`,
      );

      return {
        trigger,
        participantsSynced: participants.length,
        participantsDeactivated,
        conversationsSynced,
        messagesSynced,
        alertsSent,
        alertsFailed,
        unitFailures,
        watermark: checkpoint.watermark,
        durationMs,
        checkpoint,
      };
    } catch (error) {
      this.phase = "failed";
      console.error(`[SyncOrchestrator] Sync failed, no checkpoint written:`, error);
      throw error;
    }
  }

  private async syncParticipant(
    participant: Participant,
    remoteId: string,
    since: string | undefined,
    syncedAt: string,
    unitFailures: UnitFailure[],
  ): Promise<ParticipantSyncOutcome | null> {
    const { source, storage } = this.deps;
    const label = participantLabel(participant);

    let conversations: RemoteConversationRecord[];
    let current = participant;
    try {
      const user = await source.fetchUser(remoteId);
      if (user) {
        await storage.updateParticipantProfile(participant.id, {
          identifier: user.identifier,
          currentConversationId: user.currentConversationId,
        });
        current = {
          ...participant,
          identifier: user.identifier ?? participant.identifier,
          currentConversationId: user.currentConversationId ?? participant.currentConversationId,
        };
      } else {
        console.warn(`[SyncOrchestrator] No remote user record for ${label}`);
      }
      conversations = await source.fetchConversations(remoteId);
    } catch (error) {
      console.warn(`[SyncOrchestrator] Skipping participant ${label}:`, errorMessage(error));
      unitFailures.push({ scope: "participant", participant: label, error: errorMessage(error) });
      return null;
    }

    // The watermark only bounds conversations already stored; new ones are read in full.
    const known = await storage.listKnownRemoteIds(participant.id);
    const fetched: RemoteMessageRecord[] = [];
    for (const conversation of conversations) {
      const conversationSince = known.conversations.has(conversation.remoteId) ? since : undefined;
      try {
        fetched.push(...(await source.fetchMessages(remoteId, conversation.remoteId, conversationSince)));
      } catch (error) {
        console.warn(
          `[SyncOrchestrator] Skipping conversation ${conversation.remoteId} of ${label}:`,
          errorMessage(error),
        );
        unitFailures.push({
          scope: "conversation",
          participant: label,
          conversationId: conversation.remoteId,
          error: errorMessage(error),
        });
      }
    }

    const batch = await storage.persistParticipantBatch(participant.id, conversations, fetched, syncedAt);
    if (batch.orphanedMessages > 0) {
      console.warn(
        `[SyncOrchestrator] ${batch.orphanedMessages} messages of ${label} reference unknown conversations, skipped`,
      );
    }

    return {
      participant: current,
      conversationsInserted: batch.conversationsInserted,
      insertedMessageIds: batch.messagesInserted.map((message) => message.id),
      fetched,
    };
  }
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
