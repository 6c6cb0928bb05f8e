import { pgTable, text, integer, boolean, doublePrecision, index, uniqueIndex, check } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Participants table - one row per monitored study participant.
// Rows are never deleted; leaving the roster only clears isActive.
export const participants = pgTable("participants", {
  id: text("id").primaryKey(),
  directoryId: text("directory_id").unique(),
  remoteId: text("remote_id").unique(),
  handlerLabel: text("handler_label"),
  identifier: text("identifier"),
  currentConversationId: text("current_conversation_id"),
  // Study window as calendar dates (YYYY-MM-DD), from the directory.
  studyStartDate: text("study_start_date"),
  studyEndDate: text("study_end_date"),
  dropped: boolean("dropped").notNull().default(false),
  droppedSurveys: boolean("dropped_surveys").notNull().default(false),
  isActive: boolean("is_active").notNull().default(true),
  lastSyncedAt: text("last_synced_at"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (t) => [
  index("participants_active_idx").on(t.isActive),
  check("participants_identity_check", sql`${t.directoryId} IS NOT NULL OR ${t.remoteId} IS NOT NULL`),
]);

export type Participant = typeof participants.$inferSelect;

// Conversations table - immutable once inserted
export const conversations = pgTable("conversations", {
  id: text("id").primaryKey(),
  remoteId: text("remote_id").notNull(),
  participantId: text("participant_id").notNull().references(() => participants.id),
  prompt: text("prompt").notNull().default(""),
  createdAt: text("created_at").notNull(),
  syncedAt: text("synced_at").notNull(),
}, (t) => [
  uniqueIndex("conversations_remote_id_idx").on(t.remoteId),
  index("conversations_participant_idx").on(t.participantId),
]);

export type Conversation = typeof conversations.$inferSelect;

// Messages table
export const messages = pgTable("messages", {
  id: text("id").primaryKey(),
  remoteId: text("remote_id").notNull(),
  conversationId: text("conversation_id").notNull().references(() => conversations.id),
  participantId: text("participant_id").notNull().references(() => participants.id),
  text: text("text").notNull(),
  riskScore: doublePrecision("risk_score"),
  alertDispatched: boolean("alert_dispatched").notNull().default(false),
  alertClaimedAt: text("alert_claimed_at"),
  isReviewed: boolean("is_reviewed").notNull().default(false),
  reviewedBy: text("reviewed_by"),
  reviewedAt: text("reviewed_at"),
  occurredAt: text("occurred_at").notNull(),
  createdAt: text("created_at").notNull(),
}, (t) => [
  uniqueIndex("messages_remote_id_idx").on(t.remoteId),
  index("messages_conversation_idx").on(t.conversationId),
  index("messages_participant_occurred_idx").on(t.participantId, t.occurredAt),
  index("messages_pending_alert_idx").on(t.participantId, t.alertDispatched),
]);

export type Message = typeof messages.$inferSelect;

// Sync checkpoints - append-only ledger, one row per completed run
export const syncCheckpoints = pgTable("sync_checkpoints", {
  id: text("id").primaryKey(),
  runAt: text("run_at").notNull(),
  participantsSynced: integer("participants_synced").notNull().default(0),
  conversationsSynced: integer("conversations_synced").notNull().default(0),
  messagesSynced: integer("messages_synced").notNull().default(0),
  alertsSent: integer("alerts_sent").notNull().default(0),
  unitFailures: integer("unit_failures").notNull().default(0),
  durationMs: integer("duration_ms").notNull(),
  watermark: text("watermark"),
  // Written under the append lock, so it orders checkpoints by completion.
  completedAt: text("completed_at").notNull(),
}, (t) => [
  index("sync_checkpoints_run_at_idx").on(t.runAt),
  index("sync_checkpoints_completed_at_idx").on(t.completedAt),
]);

export const insertSyncCheckpointSchema = createInsertSchema(syncCheckpoints, {
  participantsSynced: z.number().int().min(0),
  conversationsSynced: z.number().int().min(0),
  messagesSynced: z.number().int().min(0),
  alertsSent: z.number().int().min(0),
  unitFailures: z.number().int().min(0),
  durationMs: z.number().int().min(0),
}).omit({
  id: true,
  completedAt: true,
});

export type InsertSyncCheckpoint = z.infer<typeof insertSyncCheckpointSchema>;
export type SyncCheckpoint = typeof syncCheckpoints.$inferSelect;

// Roster modes
export const rosterModes = ["directory", "explicit", "combined"] as const;
export type RosterMode = typeof rosterModes[number];
