import { initializeApp, cert, applicationDefault, type App } from "firebase-admin/app";
import { getFirestore, Timestamp, type DocumentData, type WhereFilterOp } from "firebase-admin/firestore";
import { getAuth, type Auth } from "firebase-admin/auth";
import { MalformedRecordError } from "../errors";
import { wrapFirestore, type CallWrapper } from "../../lib/reliability";
import { normalizeRiskScore } from "./riskScore";

export interface RemoteUserRecord {
  remoteId: string;
  currentConversationId?: string;
  identifier?: string;
}

export interface RemoteConversationRecord {
  remoteId: string;
  prompt: string;
  createdAt: string;
}

export interface RemoteMessageRecord {
  remoteId: string;
  conversationId: string;
  text: string;
  riskScore: number | null;
  occurredAt: string;
}

/**
 * Read-only view of the chat-log store. Every call is idempotent and leaves
 * the remote side untouched.
 */
export interface ConversationSource {
  fetchUser(remoteId: string): Promise<RemoteUserRecord | null>;
  fetchConversations(remoteId: string): Promise<RemoteConversationRecord[]>;
  /**
   * Messages of one conversation in ascending occurrence order. With `since`,
   * only messages strictly newer than it are returned; this is what keeps the
   * metered per-document reads down.
   */
  fetchMessages(remoteId: string, conversationId: string, since?: string): Promise<RemoteMessageRecord[]>;
}

export const COLLECTIONS = {
  users: "users",
  conversations: "convos",
  messages: "messages",
} as const;

/**
 * Converts the timestamp shapes found in the store (Firestore Timestamp,
 * Date, ISO string, epoch millis) to an ISO-8601 UTC string. Sub-millisecond
 * precision is dropped, so a `since` built from it can only re-read, never
 * skip, a boundary message.
 */
export function toIsoTimestamp(value: unknown): string | null {
  let date: Date | null = null;

  if (value instanceof Timestamp) {
    date = value.toDate();
  } else if (value instanceof Date) {
    date = value;
  } else if (typeof value === "string" && value.trim().length > 0) {
    date = new Date(value);
  } else if (typeof value === "number") {
    date = new Date(value);
  }

  if (!date || Number.isNaN(date.getTime())) return null;
  return date.toISOString();
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function toConversationRecord(id: string, data: DocumentData): RemoteConversationRecord {
  const createdAt = toIsoTimestamp(data.timestamp);
  if (!createdAt) {
    throw new MalformedRecordError(COLLECTIONS.conversations, id, "missing or invalid timestamp");
  }
  return {
    remoteId: id,
    prompt: typeof data.prompt === "string" ? data.prompt : "",
    createdAt,
  };
}

export function toMessageRecord(id: string, data: DocumentData, conversationId: string): RemoteMessageRecord {
  const occurredAt = toIsoTimestamp(data.timestamp);
  if (!occurredAt) {
    throw new MalformedRecordError(COLLECTIONS.messages, id, "missing or invalid timestamp");
  }
  return {
    remoteId: id,
    conversationId,
    text: typeof data.text === "string" ? data.text : "",
    riskScore: normalizeRiskScore(data.riskScore),
    occurredAt,
  };
}

function isUserNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "auth/user-not-found"
  );
}

/**
 * The slice of the Firestore API the source reads through. A Firestore
 * instance satisfies it as is.
 */
export interface DocumentQuery {
  where(field: string, op: WhereFilterOp, value: unknown): DocumentQuery;
  orderBy(field: string, direction: "asc" | "desc"): DocumentQuery;
  get(): Promise<{ docs: Array<{ id: string; data(): DocumentData }> }>;
}

export interface DocumentCollection extends DocumentQuery {
  doc(id: string): { get(): Promise<{ exists: boolean; data(): DocumentData | undefined }> };
}

export interface DocumentStore {
  collection(path: string): DocumentCollection;
}

export interface FirestoreSourceOptions {
  credentialsPath?: string;
  appName?: string;
  call?: CallWrapper;
}

/**
 * Firestore-backed ConversationSource. Conversation headers live in `convos`
 * keyed by `userID`; messages live in `messages` keyed by `convoID`.
 */
export class FirestoreConversationSource implements ConversationSource {
  private readonly call: CallWrapper;

  constructor(
    private readonly firestore: DocumentStore,
    private readonly auth: Pick<Auth, "getUser">,
    options: Pick<FirestoreSourceOptions, "call"> = {},
  ) {
    this.call = options.call ?? wrapFirestore;
  }

  static fromCredentials(options: FirestoreSourceOptions = {}): FirestoreConversationSource {
    const app: App = initializeApp(
      {
        credential: options.credentialsPath ? cert(options.credentialsPath) : applicationDefault(),
      },
      options.appName ?? "participant-monitor",
    );
    console.log("[Firestore] Initialized");
    return new FirestoreConversationSource(getFirestore(app), getAuth(app), options);
  }

  async fetchUser(remoteId: string): Promise<RemoteUserRecord | null> {
    const snapshot = await this.call(() => this.firestore.collection(COLLECTIONS.users).doc(remoteId).get());
    if (!snapshot.exists) return null;

    const data = snapshot.data() ?? {};
    return {
      remoteId,
      currentConversationId: optionalString(data.convoID),
      identifier: await this.fetchAuthIdentifier(remoteId),
    };
  }

  async fetchConversations(remoteId: string): Promise<RemoteConversationRecord[]> {
    const snapshot = await this.call(() =>
      this.firestore
        .collection(COLLECTIONS.conversations)
        .where("userID", "==", remoteId)
        .get(),
    );
    return snapshot.docs.map((doc) => toConversationRecord(doc.id, doc.data()));
  }

  async fetchMessages(remoteId: string, conversationId: string, since?: string): Promise<RemoteMessageRecord[]> {
    let query: DocumentQuery = this.firestore
      .collection(COLLECTIONS.messages)
      .where("convoID", "==", conversationId)
      .where("userID", "==", remoteId);

    if (since) {
      query = query.where("timestamp", ">", Timestamp.fromDate(new Date(since)));
    }

    const ordered = query.orderBy("timestamp", "asc");
    const snapshot = await this.call(() => ordered.get());
    return snapshot.docs.map((doc) => toMessageRecord(doc.id, doc.data(), conversationId));
  }

  // Login e-mail, else phone, else display name. Only cosmetic, so an Auth
  // failure leaves the identifier unset instead of failing the unit.
  private async fetchAuthIdentifier(remoteId: string): Promise<string | undefined> {
    try {
      const user = await this.auth.getUser(remoteId);
      return user.email ?? user.phoneNumber ?? user.displayName ?? undefined;
    } catch (error) {
      if (!isUserNotFound(error)) {
        console.warn(`[Firestore] Auth lookup failed for ${remoteId}:`, error);
      }
      return undefined;
    }
  }
}
