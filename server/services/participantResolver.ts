import type { RosterConfig } from "../config";
import { ConfigurationError } from "../errors";
import type { DirectoryClient, DirectoryRecord } from "./redcap";

export type DescriptorOrigin = "directory" | "explicit" | "combined";

/**
 * A participant identity as reported by the roster sources, before it is
 * matched against stored rows.
 */
export interface ParticipantDescriptor {
  origin: DescriptorOrigin;
  directoryId?: string;
  remoteId?: string;
  handlerLabel?: string;
  identifier?: string;
  /** YYYY-MM-DD */
  studyStartDate?: string;
  studyEndDate?: string;
  dropped?: boolean;
  droppedSurveys?: boolean;
}

export function descriptorFromDirectory(record: DirectoryRecord): ParticipantDescriptor {
  return {
    origin: "directory",
    directoryId: record.directoryId,
    remoteId: record.remoteId,
    handlerLabel: record.handlerLabel,
    identifier: record.username,
    studyStartDate: record.studyStartDate,
    studyEndDate: record.studyEndDate,
    dropped: record.dropped,
    droppedSurveys: record.droppedSurveys,
  };
}

export function descriptorFromRemoteId(remoteId: string, handlerLabel?: string): ParticipantDescriptor {
  return { origin: "explicit", remoteId, handlerLabel };
}

/**
 * Merges a directory descriptor with an explicit-id descriptor for the same
 * remote id. Directory fields take precedence; explicit ones only fill gaps.
 */
export function mergeDescriptors(
  directory: ParticipantDescriptor,
  explicit: ParticipantDescriptor,
): ParticipantDescriptor {
  return {
    origin: "combined",
    directoryId: directory.directoryId ?? explicit.directoryId,
    remoteId: directory.remoteId ?? explicit.remoteId,
    handlerLabel: directory.handlerLabel ?? explicit.handlerLabel,
    identifier: directory.identifier ?? explicit.identifier,
    studyStartDate: directory.studyStartDate,
    studyEndDate: directory.studyEndDate,
    dropped: directory.dropped,
    droppedSurveys: directory.droppedSurveys,
  };
}

export function describeDescriptor(descriptor: ParticipantDescriptor): string {
  return descriptor.remoteId ?? `directory:${descriptor.directoryId ?? "?"}`;
}

export interface RosterSource {
  resolve(): Promise<ParticipantDescriptor[]>;
}

/**
 * Builds the roster for a sync run from the directory, the static id list,
 * or both. Directory errors propagate: a partial roster would silently stop
 * monitoring real participants.
 */
export class ParticipantResolver implements RosterSource {
  constructor(
    private readonly config: RosterConfig,
    private readonly directory: DirectoryClient | null,
  ) {
    if (config.mode !== "explicit" && !directory) {
      throw new ConfigurationError(`Roster mode "${config.mode}" needs a directory client`);
    }
  }

  async resolve(): Promise<ParticipantDescriptor[]> {
    switch (this.config.mode) {
      case "directory":
        return this.fromDirectory();
      case "explicit":
        return this.fromExplicitIds();
      case "combined":
        return this.combine(await this.fromDirectory(), this.fromExplicitIds());
    }
  }

  private async fromDirectory(): Promise<ParticipantDescriptor[]> {
    if (!this.directory) return [];

    const records = await this.directory.listRecords();
    const byRemoteId = new Set<string>();
    const byDirectoryId = new Set<string>();
    const descriptors: ParticipantDescriptor[] = [];

    for (const record of records) {
      if (byDirectoryId.has(record.directoryId)) {
        console.warn(`[ParticipantResolver] Duplicate directory record ${record.directoryId}, keeping the first`);
        continue;
      }
      if (record.remoteId && byRemoteId.has(record.remoteId)) {
        console.warn(
          `[ParticipantResolver] Remote id ${record.remoteId} appears on several directory records, keeping the first`,
        );
        continue;
      }
      byDirectoryId.add(record.directoryId);
      if (record.remoteId) byRemoteId.add(record.remoteId);
      descriptors.push(descriptorFromDirectory(record));
    }

    return descriptors;
  }

  private fromExplicitIds(): ParticipantDescriptor[] {
    const unique = Array.from(new Set(this.config.remoteIds));
    return unique.map((remoteId) => descriptorFromRemoteId(remoteId, this.config.explicitHandlerLabel));
  }

  private combine(
    directory: ParticipantDescriptor[],
    explicit: ParticipantDescriptor[],
  ): ParticipantDescriptor[] {
    const roster = [...directory];
    const indexByRemoteId = new Map<string, number>();
    roster.forEach((descriptor, index) => {
      if (descriptor.remoteId) indexByRemoteId.set(descriptor.remoteId, index);
    });

    for (const descriptor of explicit) {
      const index = descriptor.remoteId === undefined ? undefined : indexByRemoteId.get(descriptor.remoteId);
      if (index === undefined) {
        roster.push(descriptor);
      } else {
        roster[index] = mergeDescriptors(roster[index], descriptor);
      }
    }

    console.log(
      `[ParticipantResolver] Combined roster: ${directory.length} directory + ${explicit.length} explicit -> ${roster.length}`,
    );
    return roster;
  }
}
