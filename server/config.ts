import type { Env } from "./src/config/env";
import type { RosterMode } from "@shared/schema";

export interface DirectoryConfig {
  apiUrl: string;
  apiToken: string;
  filterLogic: string;
  formName?: string;
  eventName?: string;
  recordIdField: string;
  remoteIdField: string;
  handlerField: string;
  usernameField?: string;
  studyStartField?: string;
  studyEndField?: string;
  droppedField?: string;
  droppedSurveysField?: string;
  timeoutMs: number;
}

export interface RosterConfig {
  mode: RosterMode;
  remoteIds: string[];
  explicitHandlerLabel?: string;
}

export interface AlertConfig {
  threshold: number;
  recipients: string[];
  timezone: string;
  retryPending: boolean;
  claimLeaseMs: number;
}

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export interface ScheduleConfig {
  cronExpression: string;
  timezone: string;
}

/**
 * Everything the sync core reads, resolved once at startup and handed to
 * constructors. `directory` is null only in explicit-id mode.
 */
export interface MonitorConfig {
  databaseUrl: string;
  roster: RosterConfig;
  directory: DirectoryConfig | null;
  alerts: AlertConfig;
  twilio: TwilioConfig | null;
  firebaseCredentialsPath?: string;
  schedule: ScheduleConfig;
}

export function buildMonitorConfig(env: Env): MonitorConfig {
  const directory: DirectoryConfig | null =
    env.REDCAP_API_URL && env.REDCAP_API_TOKEN
      ? {
          apiUrl: env.REDCAP_API_URL,
          apiToken: env.REDCAP_API_TOKEN,
          filterLogic: env.REDCAP_FILTER_LOGIC,
          formName: env.REDCAP_FORM_NAME,
          eventName: env.REDCAP_EVENT_NAME,
          recordIdField: env.REDCAP_RECORD_ID_FIELD,
          remoteIdField: env.REDCAP_REMOTE_ID_FIELD,
          handlerField: env.REDCAP_HANDLER_FIELD,
          usernameField: env.REDCAP_USERNAME_FIELD,
          studyStartField: env.REDCAP_STUDY_START_FIELD,
          studyEndField: env.REDCAP_STUDY_END_FIELD,
          droppedField: env.REDCAP_DROPPED_FIELD,
          droppedSurveysField: env.REDCAP_DROPPED_SURVEYS_FIELD,
          timeoutMs: env.REDCAP_TIMEOUT_MS,
        }
      : null;

  const twilio: TwilioConfig | null =
    env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_FROM_NUMBER
      ? {
          accountSid: env.TWILIO_ACCOUNT_SID,
          authToken: env.TWILIO_AUTH_TOKEN,
          fromNumber: env.TWILIO_FROM_NUMBER,
        }
      : null;

  return {
    databaseUrl: env.DATABASE_URL,
    roster: {
      mode: env.ROSTER_MODE,
      remoteIds: env.REMOTE_IDS,
      explicitHandlerLabel: env.EXPLICIT_HANDLER_LABEL,
    },
    directory: env.ROSTER_MODE === "explicit" ? null : directory,
    alerts: {
      threshold: env.RISK_SCORE_THRESHOLD,
      recipients: env.ALERT_RECIPIENTS,
      timezone: env.ALERT_TIMEZONE,
      retryPending: env.ALERT_RETRY_PENDING,
      claimLeaseMs: env.ALERT_CLAIM_LEASE_MS,
    },
    twilio,
    firebaseCredentialsPath: env.FIREBASE_CREDENTIALS_PATH,
    schedule: {
      cronExpression: env.SYNC_CRON,
      timezone: env.SYNC_TIMEZONE,
    },
  };
}
