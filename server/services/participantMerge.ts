import type { Participant } from "@shared/schema";
import type { ParticipantDescriptor } from "./participantResolver";

export type ParticipantFields = Pick<
  Participant,
  | "directoryId"
  | "remoteId"
  | "handlerLabel"
  | "identifier"
  | "studyStartDate"
  | "studyEndDate"
  | "dropped"
  | "droppedSurveys"
>;

/**
 * Folds a roster descriptor into the stored participant fields.
 *
 * - A present descriptor value replaces the stored one; an absent one never
 *   clears it.
 * - An explicit-id descriptor does not relabel a participant the directory
 *   already knows: the directory owns the handler label.
 * - The identifier is only filled in, never replaced; the remote user profile
 *   refresh owns it once set.
 * - Study dates and dropped flags come from the directory only.
 */
export function mergeParticipantFields(
  existing: ParticipantFields | undefined,
  descriptor: ParticipantDescriptor,
): ParticipantFields {
  const directoryOwnsLabel = descriptor.origin === "explicit" && existing?.directoryId != null;

  return {
    directoryId: descriptor.directoryId ?? existing?.directoryId ?? null,
    remoteId: descriptor.remoteId ?? existing?.remoteId ?? null,
    handlerLabel: directoryOwnsLabel
      ? existing?.handlerLabel ?? null
      : descriptor.handlerLabel ?? existing?.handlerLabel ?? null,
    identifier: existing?.identifier ?? descriptor.identifier ?? null,
    studyStartDate: descriptor.studyStartDate ?? existing?.studyStartDate ?? null,
    studyEndDate: descriptor.studyEndDate ?? existing?.studyEndDate ?? null,
    dropped: descriptor.dropped ?? existing?.dropped ?? false,
    droppedSurveys: descriptor.droppedSurveys ?? existing?.droppedSurveys ?? false,
  };
}

export function participantLabel(participant: Pick<Participant, "identifier" | "remoteId" | "directoryId">): string {
  return participant.identifier ?? participant.remoteId ?? participant.directoryId ?? "unknown participant";
}
