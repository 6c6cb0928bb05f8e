import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MissingDataReconciler } from "../../server/services/missingDataReconciler";
import { AlertDispatcher } from "../../server/services/alertDispatcher";
import { RiskNotifier } from "../../server/services/riskNotifier";
import { MemStorage } from "../support/memStorage";
import { FakeConversationSource, FakeSmsTransport } from "../support/fakes";

const NOW = "2026-03-01T12:00:00.000Z";
const T1 = "2026-03-01T10:00:00.000Z";
const T2 = "2026-03-01T10:05:00.000Z";
const T3 = "2026-03-01T10:10:00.000Z";

function createHarness() {
  const storage = new MemStorage();
  const source = new FakeConversationSource();
  const transport = new FakeSmsTransport();
  const clock = () => new Date(NOW);
  const notifier = new RiskNotifier(transport, { recipients: ["+15550000001"], timezone: "UTC", now: clock });
  const dispatcher = new AlertDispatcher(storage, notifier, { threshold: 0.7, claimLeaseMs: 10 * 60 * 1000 }, clock);
  const reconciler = new MissingDataReconciler(storage, source, dispatcher, clock);
  return { storage, source, transport, reconciler };
}

/** U1 has C1 and M1 stored locally; the remote side also has M2 in C1 and C2 with M3. */
async function seedGap(storage: MemStorage, source: FakeConversationSource) {
  const participant = await storage.upsertParticipant({ origin: "directory", directoryId: "R1", remoteId: "U1" }, NOW);
  await storage.persistParticipantBatch(
    participant.id,
    [{ remoteId: "C1", prompt: "", createdAt: T1 }],
    [{ remoteId: "M1", conversationId: "C1", text: "hi", riskScore: 0.1, occurredAt: T1 }],
    NOW,
  );
  source
    .addUser("U1")
    .addConversation("U1", "C1", T1)
    .addMessage("U1", "C1", "M1", T1, 0.1)
    .addMessage("U1", "C1", "M2", T2, 0.9)
    .addConversation("U1", "C2", T2)
    .addMessage("U1", "C2", "M3", T3, 0.3);
  return participant;
}

describe("MissingDataReconciler", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports missing records on a dry run without writing", async () => {
    const { storage, source, transport, reconciler } = createHarness();
    const participant = await seedGap(storage, source);

    const report = await reconciler.reconcile({ dryRun: true });

    expect(report).toEqual({
      dryRun: true,
      participantsChecked: 1,
      conversationsRestored: 0,
      messagesRestored: 0,
      alertsSent: 0,
      gaps: [
        {
          participantId: participant.id,
          label: "U1",
          missingConversations: ["C2"],
          missingMessages: ["M2", "M3"],
        },
      ],
    });
    expect(storage.conversations.size).toBe(1);
    expect(storage.messages.size).toBe(1);
    expect(transport.sent).toHaveLength(0);
  });

  it("ignores the watermark and fetches full history", async () => {
    const { storage, source, reconciler } = createHarness();
    await seedGap(storage, source);

    await reconciler.reconcile({ dryRun: true });

    expect(source.messageFetches.map((fetch) => fetch.since)).toEqual([undefined, undefined]);
  });

  it("restores missing records, alerts for restored high-risk messages and writes no checkpoint", async () => {
    const { storage, source, transport, reconciler } = createHarness();
    await seedGap(storage, source);

    const report = await reconciler.reconcile({ dryRun: false });

    expect(report.conversationsRestored).toBe(1);
    expect(report.messagesRestored).toBe(2);
    expect(report.alertsSent).toBe(1);
    expect(storage.conversations.size).toBe(2);
    expect(storage.messages.size).toBe(3);
    expect(storage.messageByRemoteId("M2")?.alertDispatched).toBe(true);
    expect(transport.sent).toHaveLength(1);
    expect(storage.checkpoints).toHaveLength(0);
  });

  it("finds nothing to do once the store is complete", async () => {
    const { storage, source, reconciler } = createHarness();
    await seedGap(storage, source);
    await reconciler.reconcile({ dryRun: false });

    const report = await reconciler.reconcile({ dryRun: false });

    expect(report.gaps).toEqual([]);
    expect(report.messagesRestored).toBe(0);
  });

  it("skips inactive participants and those without a remote id", async () => {
    const { storage, source, reconciler } = createHarness();
    await seedGap(storage, source);
    await storage.upsertParticipant({ origin: "directory", directoryId: "R2" }, NOW);
    const gone = await storage.upsertParticipant({ origin: "explicit", remoteId: "U3" }, NOW);
    const keep = Array.from(storage.participants.values())
      .filter((participant) => participant.id !== gone.id)
      .map((participant) => participant.id);
    await storage.deactivateParticipantsExcept(keep);

    const report = await reconciler.reconcile({ dryRun: true });

    expect(report.participantsChecked).toBe(1);
    expect(source.messageFetches.every((fetch) => fetch.remoteId === "U1")).toBe(true);
  });

  it("records a participant whose rescan failed and keeps going", async () => {
    const { storage, source, reconciler } = createHarness();
    const failing = await storage.upsertParticipant({ origin: "explicit", remoteId: "U2" }, NOW);
    source.addUser("U2");
    source.failingUsers.add("U2");
    await seedGap(storage, source);

    const report = await reconciler.reconcile({ dryRun: true });

    expect(report.participantsChecked).toBe(2);
    expect(report.gaps[0]).toEqual({
      participantId: failing.id,
      label: "U2",
      missingConversations: [],
      missingMessages: [],
      error: "conversation lookup failed for U2",
    });
    expect(report.gaps[1].missingMessages).toEqual(["M2", "M3"]);
  });
});
