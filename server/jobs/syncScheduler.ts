import * as cron from "node-cron";
import type { ScheduleConfig } from "../config";
import type { IStorage } from "../storage";
import type { SyncOrchestrator, SyncRunResult, SyncTrigger } from "../services/syncOrchestrator";

export interface SyncSchedulerStatus {
  isRunning: boolean;
  isScheduled: boolean;
  lastRunAt: string | null;
  lastWatermark: string | null;
}

/**
 * Timer trigger for the orchestrator. A trigger that fires while this
 * process already has a run in flight is skipped; overlap with other
 * processes is left to the store.
 */
export class SyncScheduler {
  private scheduledTask: cron.ScheduledTask | null = null;
  private inFlight: Promise<SyncRunResult> | null = null;

  constructor(
    private readonly orchestrator: Pick<SyncOrchestrator, "run">,
    private readonly storage: Pick<IStorage, "getLatestCheckpoint">,
    private readonly config: ScheduleConfig,
  ) {}

  start(): void {
    if (this.scheduledTask) {
      console.log("[SyncScheduler] Already running, stopping existing task");
      this.stop();
    }

    this.scheduledTask = cron.schedule(
      this.config.cronExpression,
      async () => {
        try {
          await this.runNow("scheduled");
        } catch (error) {
          console.error("[SyncScheduler] Scheduled sync failed:", error);
        }
      },
      { timezone: this.config.timezone },
    );

    console.log(`[SyncScheduler] Scheduled sync job at "${this.config.cronExpression}" (${this.config.timezone})`);
  }

  stop(): void {
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
      console.log("[SyncScheduler] Sync job stopped");
    }
  }

  /** Resolves to null when a run was already in progress. */
  async runNow(trigger: SyncTrigger = "manual"): Promise<SyncRunResult | null> {
    if (this.inFlight) {
      console.log("[SyncScheduler] Previous sync still running, skipping");
      return null;
    }

    const run = this.orchestrator.run(trigger);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /** Resolves once the run in flight, if any, has settled. Its failure is reported by its own caller. */
  async drain(): Promise<void> {
    const run = this.inFlight;
    if (!run) return;
    console.log("[SyncScheduler] Waiting for the sync in progress to finish");
    await run.then(
      () => undefined,
      () => undefined,
    );
  }

  async getStatus(): Promise<SyncSchedulerStatus> {
    const checkpoint = await this.storage.getLatestCheckpoint();
    return {
      isRunning: this.inFlight !== null,
      isScheduled: this.scheduledTask !== null,
      lastRunAt: checkpoint?.runAt ?? null,
      lastWatermark: checkpoint?.watermark ?? null,
    };
  }
}
