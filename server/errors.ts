/**
 * Error types shared by the sync core.
 *
 * DirectoryUnavailableError aborts a whole run. MalformedRecordError only
 * skips the unit (participant or conversation) it was raised for.
 */

export class MonitorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MonitorError";
  }
}

/**
 * The participant directory could not be queried or returned an unusable
 * response. The roster cannot be trusted, so the run stops.
 */
export class DirectoryUnavailableError extends MonitorError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "DirectoryUnavailableError";
  }
}

/**
 * A remote document is missing a field the sync needs, or carries it in an
 * unrecognized shape.
 */
export class MalformedRecordError extends MonitorError {
  constructor(
    public readonly collection: string,
    public readonly documentId: string,
    detail: string,
  ) {
    super(`Malformed ${collection} document ${documentId}: ${detail}`);
    this.name = "MalformedRecordError";
  }
}

export class ConfigurationError extends MonitorError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
