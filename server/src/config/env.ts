/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for every environment variable the monitor reads.
 * `parseEnv` is pure and throws; `getEnv` reports and exits, for startup.
 */

import { z } from "zod";
import { rosterModes } from "@shared/schema";

const AppEnvSchema = z.enum(["development", "staging", "production"]);

const commaList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((value) => value === "true");

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const timeZone = z
  .string()
  .default("America/New_York")
  .refine(isTimeZone, (value) => ({ message: `"${value}" is not an IANA time zone` }));

const EnvSchema = z
  .object({
    APP_ENV: AppEnvSchema.default("development"),
    NODE_ENV: z.string().default("development"),

    DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),

    ROSTER_MODE: z.enum(rosterModes).default("directory"),
    REMOTE_IDS: commaList,
    EXPLICIT_HANDLER_LABEL: z.string().optional(),

    REDCAP_API_URL: z.string().url().optional(),
    REDCAP_API_TOKEN: z.string().optional(),
    REDCAP_FILTER_LOGIC: z.string().default(""),
    REDCAP_FORM_NAME: z.string().optional(),
    REDCAP_EVENT_NAME: z.string().optional(),
    REDCAP_RECORD_ID_FIELD: z.string().min(1).default("record_id"),
    REDCAP_REMOTE_ID_FIELD: z.string().min(1).default("firebase_id"),
    REDCAP_HANDLER_FIELD: z.string().min(1).default("ra"),
    REDCAP_USERNAME_FIELD: z.string().optional(),
    REDCAP_STUDY_START_FIELD: z.string().optional(),
    REDCAP_STUDY_END_FIELD: z.string().optional(),
    REDCAP_DROPPED_FIELD: z.string().optional(),
    REDCAP_DROPPED_SURVEYS_FIELD: z.string().optional(),
    REDCAP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    FIREBASE_CREDENTIALS_PATH: z.string().optional(),

    TWILIO_ACCOUNT_SID: z.string().optional(),
    TWILIO_AUTH_TOKEN: z.string().optional(),
    TWILIO_FROM_NUMBER: z.string().optional(),
    ALERT_RECIPIENTS: commaList,

    RISK_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    ALERT_TIMEZONE: timeZone,
    ALERT_RETRY_PENDING: booleanFlag("true"),
    ALERT_CLAIM_LEASE_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),

    SYNC_CRON: z.string().default("*/2 * * * *"),
    SYNC_TIMEZONE: timeZone,
  })
  .superRefine((env, ctx) => {
    if (env.ROSTER_MODE !== "explicit") {
      if (!env.REDCAP_API_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["REDCAP_API_URL"],
          message: `required when ROSTER_MODE is "${env.ROSTER_MODE}"`,
        });
      }
      if (!env.REDCAP_API_TOKEN) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["REDCAP_API_TOKEN"],
          message: `required when ROSTER_MODE is "${env.ROSTER_MODE}"`,
        });
      }
    }
    if (env.ROSTER_MODE === "explicit" && env.REMOTE_IDS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REMOTE_IDS"],
        message: 'must list at least one id when ROSTER_MODE is "explicit"',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;
export type AppEnv = z.infer<typeof AppEnvSchema>;

export class EnvValidationError extends Error {
  constructor(
    public readonly missingVars: string[],
    public readonly invalidVars: string[],
  ) {
    const errorMessages: string[] = [];
    if (missingVars.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${missingVars.join("\n  - ")}`);
    }
    if (invalidVars.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${invalidVars.join("\n  - ")}`);
    }
    super(errorMessages.join("\n\n"));
    this.name = "EnvValidationError";
  }
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const missingVars: string[] = [];
    const invalidVars: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missingVars.push(path);
      } else {
        invalidVars.push(`${path}: ${issue.message}`);
      }
    }

    throw new EnvValidationError(missingVars, invalidVars);
  }

  return result.data;
}

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    try {
      _env = parseEnv(process.env);
    } catch (error) {
      if (!(error instanceof EnvValidationError)) throw error;
      console.error(
        `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\n${error.message}\n\nRefer to .env.example for the recognized variables.\n${"=".repeat(60)}\n`
      );
      process.exit(1);
    }
  }
  return _env;
}

export function isProduction(env: Env): boolean {
  return env.APP_ENV === "production" || env.NODE_ENV === "production";
}
