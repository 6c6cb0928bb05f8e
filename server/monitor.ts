import type { MonitorConfig } from "./config";
import { closeDatabase, createDatabase, type DatabaseConnection } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { createSmsTransport } from "./twilioClient";
import { RedcapDirectoryClient } from "./services/redcap";
import { ParticipantResolver } from "./services/participantResolver";
import { FirestoreConversationSource } from "./services/conversationSource";
import { RiskNotifier } from "./services/riskNotifier";
import { AlertDispatcher } from "./services/alertDispatcher";
import { SyncOrchestrator } from "./services/syncOrchestrator";
import { MissingDataReconciler } from "./services/missingDataReconciler";
import { SyncScheduler } from "./jobs/syncScheduler";

export interface Monitor {
  storage: IStorage;
  notifier: RiskNotifier;
  orchestrator: SyncOrchestrator;
  reconciler: MissingDataReconciler;
  scheduler: SyncScheduler;
  close(): Promise<void>;
}

/** Wires the sync core from a validated config. */
export function createMonitor(config: MonitorConfig): Monitor {
  const connection: DatabaseConnection = createDatabase(config.databaseUrl);
  const storage = new DatabaseStorage(connection.db);

  const directory = config.directory ? new RedcapDirectoryClient(config.directory) : null;
  const roster = new ParticipantResolver(config.roster, directory);
  const source = FirestoreConversationSource.fromCredentials({
    credentialsPath: config.firebaseCredentialsPath,
  });

  const notifier = new RiskNotifier(createSmsTransport(config.twilio), {
    recipients: config.alerts.recipients,
    timezone: config.alerts.timezone,
  });
  const dispatcher = new AlertDispatcher(storage, notifier, config.alerts);

  const orchestrator = new SyncOrchestrator({
    storage,
    roster,
    source,
    dispatcher,
    alerts: config.alerts,
  });
  const reconciler = new MissingDataReconciler(storage, source, dispatcher);
  const scheduler = new SyncScheduler(orchestrator, storage, config.schedule);

  return {
    storage,
    notifier,
    orchestrator,
    reconciler,
    scheduler,
    async close() {
      scheduler.stop();
      await scheduler.drain();
      await closeDatabase(connection);
    },
  };
}
