import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { Participant } from "@shared/schema";
import { AlertDispatcher } from "../../server/services/alertDispatcher";
import type { RiskNotifier } from "../../server/services/riskNotifier";
import { MemStorage } from "../support/memStorage";

const NOW = "2026-03-01T12:00:00.000Z";
const clock = () => new Date(NOW);

async function seed(storage: MemStorage, scores: Array<number | null>): Promise<Participant> {
  const participant = await storage.upsertParticipant({ origin: "explicit", remoteId: "U1" }, NOW);
  await storage.persistParticipantBatch(
    participant.id,
    [{ remoteId: "C1", prompt: "", createdAt: "2026-03-01T09:00:00.000Z" }],
    scores.map((riskScore, index) => ({
      remoteId: `M${index + 1}`,
      conversationId: "C1",
      text: `message ${index + 1}`,
      riskScore,
      occurredAt: `2026-03-01T10:0${index}:00.000Z`,
    })),
    NOW,
  );
  return participant;
}

describe("AlertDispatcher", () => {
  let storage: MemStorage;
  let notify: Mock<RiskNotifier["notify"]>;
  let dispatcher: AlertDispatcher;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    storage = new MemStorage();
    notify = vi.fn<RiskNotifier["notify"]>().mockResolvedValue(true);
    dispatcher = new AlertDispatcher(storage, { notify }, { threshold: 0.7, claimLeaseMs: 10 * 60 * 1000 }, clock);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("notifies for each message above the threshold in occurrence order and flags it", async () => {
    const participant = await seed(storage, [0.95, 0.2, 0.7, 0.8, null]);

    const result = await dispatcher.dispatchFor(participant);

    expect(result).toEqual({ sent: 2, failed: 0 });
    expect(notify.mock.calls.map(([, text, score]) => [text, score])).toEqual([
      ["message 1", 0.95],
      ["message 4", 0.8],
    ]);
    expect(storage.messageByRemoteId("M1")?.alertDispatched).toBe(true);
    expect(storage.messageByRemoteId("M3")?.alertDispatched).toBe(false);
    expect(storage.messageByRemoteId("M4")?.alertDispatched).toBe(true);
  });

  it("does not notify twice for a flagged message", async () => {
    const participant = await seed(storage, [0.9]);

    await dispatcher.dispatchFor(participant);
    const second = await dispatcher.dispatchFor(participant);

    expect(second).toEqual({ sent: 0, failed: 0 });
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it("releases the claim when the notifier fails", async () => {
    const participant = await seed(storage, [0.9]);
    notify.mockResolvedValueOnce(false);

    const result = await dispatcher.dispatchFor(participant);

    expect(result).toEqual({ sent: 0, failed: 1 });
    expect(storage.messageByRemoteId("M1")).toMatchObject({ alertDispatched: false, alertClaimedAt: null });
  });

  it("skips a message another run is still dispatching", async () => {
    const participant = await seed(storage, [0.9]);
    const message = storage.messageByRemoteId("M1");
    if (message) message.alertClaimedAt = "2026-03-01T11:55:00.000Z";

    const result = await dispatcher.dispatchFor(participant);

    expect(result).toEqual({ sent: 0, failed: 0 });
    expect(notify).not.toHaveBeenCalled();
  });

  it("takes over a claim older than the lease", async () => {
    const participant = await seed(storage, [0.9]);
    const message = storage.messageByRemoteId("M1");
    if (message) message.alertClaimedAt = "2026-03-01T11:40:00.000Z";

    const result = await dispatcher.dispatchFor(participant);

    expect(result).toEqual({ sent: 1, failed: 0 });
    expect(storage.messageByRemoteId("M1")?.alertDispatched).toBe(true);
  });

  it("limits the claim to the given message ids", async () => {
    const participant = await seed(storage, [0.9, 0.95]);
    const second = storage.messageByRemoteId("M2");

    const result = await dispatcher.dispatchFor(participant, { messageIds: second ? [second.id] : [] });

    expect(result).toEqual({ sent: 1, failed: 0 });
    expect(notify).toHaveBeenCalledWith(expect.objectContaining({ remoteId: "U1" }), "message 2", 0.95);
    expect(storage.messageByRemoteId("M1")?.alertDispatched).toBe(false);
  });

  it("claims nothing for an empty id list", async () => {
    const participant = await seed(storage, [0.9]);

    const result = await dispatcher.dispatchFor(participant, { messageIds: [] });

    expect(result).toEqual({ sent: 0, failed: 0 });
    expect(notify).not.toHaveBeenCalled();
  });
});
