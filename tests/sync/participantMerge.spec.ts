import { describe, it, expect } from "vitest";
import {
  mergeParticipantFields,
  participantLabel,
  type ParticipantFields,
} from "../../server/services/participantMerge";

const stored: ParticipantFields = {
  directoryId: "R1",
  remoteId: "U1",
  handlerLabel: "ra-1",
  identifier: "p1@example.org",
  studyStartDate: "2026-01-05",
  studyEndDate: "2026-04-05",
  dropped: false,
  droppedSurveys: false,
};

const directoryOnly = { studyStartDate: null, studyEndDate: null, dropped: false, droppedSurveys: false };

describe("mergeParticipantFields", () => {
  it("builds a new participant from a descriptor", () => {
    expect(
      mergeParticipantFields(undefined, {
        origin: "directory",
        directoryId: "R1",
        remoteId: "U1",
        handlerLabel: "ra-1",
        identifier: "p1",
      }),
    ).toEqual({ directoryId: "R1", remoteId: "U1", handlerLabel: "ra-1", identifier: "p1", ...directoryOnly });
  });

  it("fills absent fields with null for a new participant", () => {
    expect(mergeParticipantFields(undefined, { origin: "explicit", remoteId: "U9" })).toEqual({
      directoryId: null,
      remoteId: "U9",
      handlerLabel: null,
      identifier: null,
      ...directoryOnly,
    });
  });

  it("never clears a stored value with an absent one", () => {
    expect(mergeParticipantFields(stored, { origin: "directory", directoryId: "R1" })).toEqual(stored);
  });

  it("takes a new handler label from the directory", () => {
    const merged = mergeParticipantFields(stored, { origin: "directory", directoryId: "R1", handlerLabel: "ra-2" });
    expect(merged.handlerLabel).toBe("ra-2");
  });

  it("keeps the directory's handler label when an explicit id descriptor carries another", () => {
    const merged = mergeParticipantFields(stored, { origin: "explicit", remoteId: "U1", handlerLabel: "night-shift" });
    expect(merged.handlerLabel).toBe("ra-1");
  });

  it("lets an explicit id descriptor label a participant the directory does not know", () => {
    const merged = mergeParticipantFields(
      { directoryId: null, remoteId: "U9", handlerLabel: null, identifier: null, ...directoryOnly },
      { origin: "explicit", remoteId: "U9", handlerLabel: "night-shift" },
    );
    expect(merged.handlerLabel).toBe("night-shift");
  });

  it("takes the handler label from a combined descriptor", () => {
    const merged = mergeParticipantFields(stored, {
      origin: "combined",
      directoryId: "R1",
      remoteId: "U1",
      handlerLabel: "ra-3",
    });
    expect(merged.handlerLabel).toBe("ra-3");
  });

  it("attaches a remote id to a directory-only participant", () => {
    const merged = mergeParticipantFields(
      { directoryId: "R2", remoteId: null, handlerLabel: "ra-2", identifier: null, ...directoryOnly },
      { origin: "directory", directoryId: "R2", remoteId: "U2" },
    );
    expect(merged).toEqual({ directoryId: "R2", remoteId: "U2", handlerLabel: "ra-2", identifier: null, ...directoryOnly });
  });

  it("only fills the identifier in", () => {
    expect(mergeParticipantFields(stored, { origin: "directory", directoryId: "R1", identifier: "p1" }).identifier).toBe(
      "p1@example.org",
    );
    expect(
      mergeParticipantFields({ ...stored, identifier: null }, { origin: "directory", directoryId: "R1", identifier: "p1" })
        .identifier,
    ).toBe("p1");
  });

  it("takes the study window and dropped flags from the directory", () => {
    const merged = mergeParticipantFields(stored, {
      origin: "directory",
      directoryId: "R1",
      studyEndDate: "2026-05-01",
      dropped: true,
    });
    expect(merged).toMatchObject({
      studyStartDate: "2026-01-05",
      studyEndDate: "2026-05-01",
      dropped: true,
      droppedSurveys: false,
    });
  });

  it("keeps a dropped flag the descriptor does not report", () => {
    const merged = mergeParticipantFields({ ...stored, dropped: true }, { origin: "explicit", remoteId: "U1" });
    expect(merged.dropped).toBe(true);
  });
});

describe("participantLabel", () => {
  it("prefers identifier, then remote id, then directory id", () => {
    expect(participantLabel({ identifier: "p1@example.org", remoteId: "U1", directoryId: "R1" })).toBe("p1@example.org");
    expect(participantLabel({ identifier: null, remoteId: "U1", directoryId: "R1" })).toBe("U1");
    expect(participantLabel({ identifier: null, remoteId: null, directoryId: "R1" })).toBe("R1");
    expect(participantLabel({ identifier: null, remoteId: null, directoryId: null })).toBe("unknown participant");
  });
});
