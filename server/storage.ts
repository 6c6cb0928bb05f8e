import { v4 as uuidv4 } from "uuid";
import { and, desc, eq, gt, inArray, isNull, lt, ne, notInArray, or, sql, type SQL } from "drizzle-orm";
import {
  conversations,
  messages,
  participants,
  syncCheckpoints,
  insertSyncCheckpointSchema,
  type Message,
  type Participant,
  type SyncCheckpoint,
} from "@shared/schema";
import type { Executor } from "./db";
import type { ParticipantDescriptor } from "./services/participantResolver";
import { describeDescriptor } from "./services/participantResolver";
import { mergeParticipantFields, type ParticipantFields } from "./services/participantMerge";
import type { RemoteConversationRecord, RemoteMessageRecord } from "./services/conversationSource";
import { laterTimestamp } from "./services/watermark";

export type CheckpointInput = Omit<SyncCheckpoint, "id" | "completedAt">;

export interface ParticipantProfileUpdate {
  identifier?: string;
  currentConversationId?: string;
}

export interface PersistBatchResult {
  conversationsInserted: number;
  messagesInserted: Message[];
  /** Messages whose conversation header was neither fetched nor stored. */
  orphanedMessages: number;
}

export interface ClaimAlertsInput {
  participantId: string;
  threshold: number;
  /** Claim time written to the rows. */
  now: string;
  /** Claims older than this are considered abandoned and may be taken over. */
  claimedBefore: string;
  /** Restricts the claim to these message ids when given. */
  messageIds?: string[];
}

export interface KnownRemoteIds {
  conversations: Set<string>;
  messages: Set<string>;
}

/**
 * Local store used by the sync core. Uniqueness of remote ids is enforced by
 * the store itself, so concurrent writers collapse onto one row.
 */
export interface IStorage {
  getLatestCheckpoint(): Promise<SyncCheckpoint | undefined>;
  appendCheckpoint(input: CheckpointInput): Promise<SyncCheckpoint>;

  upsertParticipant(descriptor: ParticipantDescriptor, syncedAt: string): Promise<Participant>;
  deactivateParticipantsExcept(participantIds: string[]): Promise<number>;
  updateParticipantProfile(participantId: string, update: ParticipantProfileUpdate): Promise<void>;
  listActiveParticipants(): Promise<Participant[]>;

  persistParticipantBatch(
    participantId: string,
    conversations: RemoteConversationRecord[],
    messages: RemoteMessageRecord[],
    syncedAt: string,
  ): Promise<PersistBatchResult>;
  listKnownRemoteIds(participantId: string): Promise<KnownRemoteIds>;

  claimPendingAlerts(input: ClaimAlertsInput): Promise<Message[]>;
  markAlertDispatched(messageId: string): Promise<void>;
  releaseAlertClaim(messageId: string): Promise<void>;
}

// Serializes checkpoint appends across processes.
const CHECKPOINT_LOCK_KEY = 7_310_042;
const INSERT_CHUNK_SIZE = 500;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class DatabaseStorage implements IStorage {
  constructor(
    private readonly db: Executor,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** The checkpoint appended last, which also holds the highest watermark. */
  async getLatestCheckpoint(): Promise<SyncCheckpoint | undefined> {
    const [checkpoint] = await this.db
      .select()
      .from(syncCheckpoints)
      .orderBy(desc(syncCheckpoints.completedAt), sql`${syncCheckpoints.watermark} DESC NULLS LAST`)
      .limit(1);
    return checkpoint;
  }

  async appendCheckpoint(input: CheckpointInput): Promise<SyncCheckpoint> {
    const values = insertSyncCheckpointSchema.parse(input);
    return this.db.transaction(async (tx) => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(${CHECKPOINT_LOCK_KEY})`);

      const [stored] = await tx
        .select({ watermark: sql<string | null>`max(${syncCheckpoints.watermark})` })
        .from(syncCheckpoints);

      const [checkpoint] = await tx
        .insert(syncCheckpoints)
        .values({
          ...values,
          id: uuidv4(),
          watermark: laterTimestamp(stored?.watermark, values.watermark),
          completedAt: this.now().toISOString(),
        })
        .returning();
      return checkpoint;
    });
  }

  async upsertParticipant(descriptor: ParticipantDescriptor, syncedAt: string): Promise<Participant> {
    return this.db.transaction(async (tx) => {
      const existing = await this.findParticipant(tx, descriptor);

      if (!existing) {
        const fields = mergeParticipantFields(undefined, descriptor);
        const [created] = await tx
          .insert(participants)
          .values({
            id: uuidv4(),
            ...fields,
            isActive: true,
            lastSyncedAt: syncedAt,
            createdAt: syncedAt,
            updatedAt: syncedAt,
          })
          .onConflictDoNothing()
          .returning();
        if (created) return created;
      }

      // Either an existing row, or a concurrent run inserted it first.
      const target = existing ?? (await this.findParticipant(tx, descriptor));
      if (!target) {
        throw new Error(`Participant ${describeDescriptor(descriptor)} could not be inserted or found`);
      }

      const fields = await this.withoutIdentityConflicts(tx, target, mergeParticipantFields(target, descriptor));
      const [updated] = await tx
        .update(participants)
        .set({ ...fields, isActive: true, lastSyncedAt: syncedAt, updatedAt: syncedAt })
        .where(eq(participants.id, target.id))
        .returning();
      return updated;
    });
  }

  async deactivateParticipantsExcept(participantIds: string[]): Promise<number> {
    const condition =
      participantIds.length > 0
        ? and(eq(participants.isActive, true), notInArray(participants.id, participantIds))
        : eq(participants.isActive, true);

    const deactivated = await this.db
      .update(participants)
      .set({ isActive: false, updatedAt: this.now().toISOString() })
      .where(condition)
      .returning({ id: participants.id });
    return deactivated.length;
  }

  async updateParticipantProfile(participantId: string, update: ParticipantProfileUpdate): Promise<void> {
    const changes: Partial<Pick<Participant, "identifier" | "currentConversationId">> = {};
    if (update.identifier !== undefined) changes.identifier = update.identifier;
    if (update.currentConversationId !== undefined) changes.currentConversationId = update.currentConversationId;
    if (Object.keys(changes).length === 0) return;

    await this.db
      .update(participants)
      .set({ ...changes, updatedAt: this.now().toISOString() })
      .where(eq(participants.id, participantId));
  }

  async listActiveParticipants(): Promise<Participant[]> {
    return this.db.select().from(participants).where(eq(participants.isActive, true));
  }

  async persistParticipantBatch(
    participantId: string,
    remoteConversations: RemoteConversationRecord[],
    remoteMessages: RemoteMessageRecord[],
    syncedAt: string,
  ): Promise<PersistBatchResult> {
    return this.db.transaction(async (tx) => {
      let conversationsInserted = 0;
      for (const batch of chunk(remoteConversations, INSERT_CHUNK_SIZE)) {
        const inserted = await tx
          .insert(conversations)
          .values(
            batch.map((conversation) => ({
              id: uuidv4(),
              remoteId: conversation.remoteId,
              participantId,
              prompt: conversation.prompt,
              createdAt: conversation.createdAt,
              syncedAt,
            })),
          )
          .onConflictDoNothing({ target: conversations.remoteId })
          .returning({ id: conversations.id });
        conversationsInserted += inserted.length;
      }

      const conversationRemoteIds = Array.from(new Set(remoteMessages.map((message) => message.conversationId)));
      const localIds = new Map<string, string>();
      for (const batch of chunk(conversationRemoteIds, INSERT_CHUNK_SIZE)) {
        const rows = await tx
          .select({ id: conversations.id, remoteId: conversations.remoteId })
          .from(conversations)
          .where(inArray(conversations.remoteId, batch));
        for (const row of rows) localIds.set(row.remoteId, row.id);
      }

      let orphanedMessages = 0;
      const rows = [];
      for (const message of remoteMessages) {
        const conversationId = localIds.get(message.conversationId);
        if (!conversationId) {
          orphanedMessages++;
          continue;
        }
        rows.push({
          id: uuidv4(),
          remoteId: message.remoteId,
          conversationId,
          participantId,
          text: message.text,
          riskScore: message.riskScore,
          occurredAt: message.occurredAt,
          createdAt: syncedAt,
        });
      }

      const messagesInserted: Message[] = [];
      for (const batch of chunk(rows, INSERT_CHUNK_SIZE)) {
        const inserted = await tx
          .insert(messages)
          .values(batch)
          .onConflictDoNothing({ target: messages.remoteId })
          .returning();
        messagesInserted.push(...inserted);
      }

      return { conversationsInserted, messagesInserted, orphanedMessages };
    });
  }

  async listKnownRemoteIds(participantId: string): Promise<KnownRemoteIds> {
    const [conversationRows, messageRows] = await Promise.all([
      this.db
        .select({ remoteId: conversations.remoteId })
        .from(conversations)
        .where(eq(conversations.participantId, participantId)),
      this.db
        .select({ remoteId: messages.remoteId })
        .from(messages)
        .where(eq(messages.participantId, participantId)),
    ]);
    return {
      conversations: new Set(conversationRows.map((row) => row.remoteId)),
      messages: new Set(messageRows.map((row) => row.remoteId)),
    };
  }

  async claimPendingAlerts(input: ClaimAlertsInput): Promise<Message[]> {
    const conditions: SQL[] = [
      eq(messages.participantId, input.participantId),
      eq(messages.alertDispatched, false),
      gt(messages.riskScore, input.threshold),
    ];
    const unclaimed = or(isNull(messages.alertClaimedAt), lt(messages.alertClaimedAt, input.claimedBefore));
    if (unclaimed) conditions.push(unclaimed);

    if (input.messageIds) {
      if (input.messageIds.length === 0) return [];
      conditions.push(inArray(messages.id, input.messageIds));
    }

    // A single UPDATE ... RETURNING: concurrent claimers re-check the
    // predicate on the locked row, so each message is claimed once.
    const claimed = await this.db
      .update(messages)
      .set({ alertClaimedAt: input.now })
      .where(and(...conditions))
      .returning();
    return claimed.sort((a, b) => a.occurredAt.localeCompare(b.occurredAt));
  }

  async markAlertDispatched(messageId: string): Promise<void> {
    await this.db
      .update(messages)
      .set({ alertDispatched: true, alertClaimedAt: null })
      .where(eq(messages.id, messageId));
  }

  async releaseAlertClaim(messageId: string): Promise<void> {
    await this.db
      .update(messages)
      .set({ alertClaimedAt: null })
      .where(and(eq(messages.id, messageId), eq(messages.alertDispatched, false)));
  }

  private async findParticipant(tx: Executor, descriptor: ParticipantDescriptor): Promise<Participant | undefined> {
    if (descriptor.remoteId) {
      const [byRemoteId] = await tx
        .select()
        .from(participants)
        .where(eq(participants.remoteId, descriptor.remoteId))
        .limit(1);
      if (byRemoteId) return byRemoteId;
    }
    if (descriptor.directoryId) {
      const [byDirectoryId] = await tx
        .select()
        .from(participants)
        .where(eq(participants.directoryId, descriptor.directoryId))
        .limit(1);
      if (byDirectoryId) return byDirectoryId;
    }
    return undefined;
  }

  // An id already held by another row stays where it is; moving it would
  // orphan that row's history.
  private async withoutIdentityConflicts(
    tx: Executor,
    target: Participant,
    fields: ParticipantFields,
  ): Promise<ParticipantFields> {
    const resolved = { ...fields };

    if (resolved.directoryId && resolved.directoryId !== target.directoryId) {
      const [holder] = await tx
        .select({ id: participants.id })
        .from(participants)
        .where(and(eq(participants.directoryId, resolved.directoryId), ne(participants.id, target.id)))
        .limit(1);
      if (holder) {
        console.warn(
          `[Storage] Directory id ${resolved.directoryId} already belongs to participant ${holder.id}; not reassigning it`,
        );
        resolved.directoryId = target.directoryId;
      }
    }

    if (resolved.remoteId && resolved.remoteId !== target.remoteId) {
      const [holder] = await tx
        .select({ id: participants.id })
        .from(participants)
        .where(and(eq(participants.remoteId, resolved.remoteId), ne(participants.id, target.id)))
        .limit(1);
      if (holder) {
        console.warn(
          `[Storage] Remote id ${resolved.remoteId} already belongs to participant ${holder.id}; not reassigning it`,
        );
        resolved.remoteId = target.remoteId;
      }
    }

    return resolved;
  }
}
