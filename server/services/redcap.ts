import { z } from "zod";
import type { DirectoryConfig } from "../config";
import { DirectoryUnavailableError, errorMessage } from "../errors";
import { wrapRedcap, type CallWrapper } from "../../lib/reliability";

/** One participant row from the directory, already mapped to our field names. */
export interface DirectoryRecord {
  directoryId: string;
  remoteId?: string;
  handlerLabel?: string;
  username?: string;
  /** YYYY-MM-DD */
  studyStartDate?: string;
  studyEndDate?: string;
  dropped?: boolean;
  droppedSurveys?: boolean;
}

export interface DirectoryClient {
  listRecords(): Promise<DirectoryRecord[]>;
}

export interface RedcapClientOptions {
  fetchImpl?: typeof fetch;
  call?: CallWrapper;
}

// REDCap returns every field as a string; empty means "not filled in".
const RecordListSchema = z.array(z.record(z.string(), z.unknown()));

function readField(record: Record<string, unknown>, field: string | undefined): string | undefined {
  if (!field) return undefined;
  const value = record[field];
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

type DatePart = "year" | "month" | "day";

const DATE_PATTERNS: Array<{ pattern: RegExp; order: [DatePart, DatePart, DatePart] }> = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ["year", "month", "day"] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ["month", "day", "year"] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ["day", "month", "year"] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: ["month", "day", "year"] },
];

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Reads a study date as entered in the directory. Accepts YYYY-MM-DD,
 * MM/DD/YYYY, DD-MM-YYYY and MM-DD-YYYY, tried in that order, and returns
 * the first reading that is a real calendar date as YYYY-MM-DD.
 */
export function parseStudyDate(value: string | undefined): string | undefined {
  if (!value) return undefined;

  for (const { pattern, order } of DATE_PATTERNS) {
    const match = pattern.exec(value);
    if (!match) continue;

    const parts: Record<DatePart, number> = { year: 0, month: 0, day: 0 };
    order.forEach((part, index) => {
      parts[part] = Number(match[index + 1]);
    });

    const date = new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
    if (
      date.getUTCFullYear() === parts.year &&
      date.getUTCMonth() === parts.month - 1 &&
      date.getUTCDate() === parts.day
    ) {
      return `${pad(parts.year, 4)}-${pad(parts.month, 2)}-${pad(parts.day, 2)}`;
    }
  }
  return undefined;
}

/** Checkbox and yes/no fields: "1", "yes" or "true" mean set. */
export function parseFlag(record: Record<string, unknown>, field: string | undefined): boolean | undefined {
  if (!field || !(field in record)) return undefined;
  const value = readField(record, field);
  return value !== undefined && ["1", "yes", "true"].includes(value.toLowerCase());
}

/**
 * REDCap record export client. Lists the records matching the configured
 * filter logic and maps the externally defined field names onto
 * DirectoryRecord. Any failure surfaces as DirectoryUnavailableError.
 */
export class RedcapDirectoryClient implements DirectoryClient {
  private readonly fetchImpl: typeof fetch;
  private readonly call: CallWrapper;

  constructor(
    private readonly config: DirectoryConfig,
    options: RedcapClientOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.call = options.call ?? wrapRedcap;
  }

  buildRequestBody(): URLSearchParams {
    const { config } = this;
    const fields = [config.recordIdField, config.remoteIdField, config.handlerField];
    for (const optional of [
      config.usernameField,
      config.studyStartField,
      config.studyEndField,
      config.droppedField,
      config.droppedSurveysField,
    ]) {
      if (optional) fields.push(optional);
    }

    const body = new URLSearchParams({
      token: config.apiToken,
      content: "record",
      format: "json",
      type: "flat",
      fields: fields.join(","),
      filterLogic: config.filterLogic,
      returnFormat: "json",
    });
    if (config.formName) body.set("forms", config.formName);
    if (config.eventName) body.set("events", config.eventName);
    return body;
  }

  async listRecords(): Promise<DirectoryRecord[]> {
    let payload: unknown;
    try {
      payload = await this.call(() => this.request());
    } catch (error) {
      if (error instanceof DirectoryUnavailableError) throw error;
      throw new DirectoryUnavailableError(
        `Directory request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }

    const parsed = RecordListSchema.safeParse(payload);
    if (!parsed.success) {
      const detail =
        typeof payload === "object" && payload !== null && "error" in payload
          ? String(payload.error)
          : "expected an array of records";
      throw new DirectoryUnavailableError(`Directory returned an unusable response: ${detail}`);
    }

    const records: DirectoryRecord[] = [];
    for (const row of parsed.data) {
      const directoryId = readField(row, this.config.recordIdField);
      if (!directoryId) {
        console.warn("[Directory] Skipping record without a record id");
        continue;
      }
      records.push({
        directoryId,
        remoteId: readField(row, this.config.remoteIdField),
        handlerLabel: readField(row, this.config.handlerField),
        username: readField(row, this.config.usernameField),
        studyStartDate: parseStudyDate(readField(row, this.config.studyStartField)),
        studyEndDate: parseStudyDate(readField(row, this.config.studyEndField)),
        dropped: parseFlag(row, this.config.droppedField),
        droppedSurveys: parseFlag(row, this.config.droppedSurveysField),
      });
    }

    console.log(`[Directory] Fetched ${records.length} records (filter: ${this.config.filterLogic || "none"})`);
    return records;
  }

  private async request(): Promise<unknown> {
    const response = await this.fetchImpl(this.config.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: this.buildRequestBody(),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw new DirectoryUnavailableError(
        `Directory responded with HTTP ${response.status}`,
        response.status,
      );
    }

    return response.json();
  }
}
