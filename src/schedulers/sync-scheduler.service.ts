import cron, { ScheduledTask } from "node-cron";
import type { Logger } from "winston";
import { SyncDefaults } from "../constants/SyncConstant";
import type { SyncEngine } from "../services/sync/sync-engine.service";
import { Debouncer } from "./debounce";

export type SchedulableEngine = Pick<
  SyncEngine,
  "incrementalSync" | "createBackup" | "flushOfflineQueue"
>;

export interface SyncSchedulerOptions {
  /** Cron expression for periodic incremental sync; empty disables it */
  cron?: string;
  autoSaveDebounceMs?: number;
}

export class SyncScheduler {
  private jobs: Map<string, ScheduledTask> = new Map();
  private readonly debouncer: Debouncer;
  private readonly cronExpression: string;
  private running = false;

  constructor(
    private readonly engine: SchedulableEngine,
    private readonly logger: Logger,
    options: SyncSchedulerOptions = {},
  ) {
    this.cronExpression = options.cron ?? SyncDefaults.SYNC_CRON;
    this.debouncer = new Debouncer(
      options.autoSaveDebounceMs ?? SyncDefaults.AUTO_SAVE_DEBOUNCE_MS,
      () => this.autoSave(),
      (error) => {
        this.logger.error("Auto-save failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      },
    );
  }

  // ----------------------
  // Job Scheduling
  // ----------------------
  public scheduleJob(name: string, schedule: string, task: () => Promise<void>): void {
    if (this.jobs.has(name)) throw new Error(`Job '${name}' already exists`);
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for '${name}': ${schedule}`);
    }

    const job = cron.schedule(
      schedule,
      async () => {
        const startedAt = Date.now();
        this.logger.info(`${name} started`);
        try {
          await task();
          this.logger.info(`${name} finished`, { durationMs: Date.now() - startedAt });
        } catch (err) {
          this.logger.error(`${name} failed`, {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      },
      { scheduled: false, timezone: "UTC" },
    );

    this.jobs.set(name, job);
    this.logger.info(`Scheduled '${name}'`, { schedule });
  }

  /**
   * Replay queued operations, then sync changes since the last sync.
   * A tick that starts while the previous one is running is skipped.
   */
  public async runPeriodicSync(): Promise<void> {
    if (this.running) {
      this.logger.warn("Periodic sync still running, skipping tick");
      return;
    }
    this.running = true;
    try {
      await this.engine.flushOfflineQueue();
      const result = await this.engine.incrementalSync();
      if (result.status === "failure") {
        this.logger.warn("Periodic sync failed", {
          errorCode: result.errorCode,
          errorMessage: result.errorMessage,
        });
      }
    } finally {
      this.running = false;
    }
  }

  /**
   * Schedule an auto-save backup after local changes settle
   */
  public notifyLocalChange(): void {
    this.debouncer.trigger();
  }

  // ----------------------
  // Lifecycle
  // ----------------------
  public start(): void {
    if (this.cronExpression && !this.jobs.has("periodic-sync")) {
      this.scheduleJob("periodic-sync", this.cronExpression, () => this.runPeriodicSync());
    }
    this.jobs.forEach((job) => job.start());
    this.logger.info("Scheduler started", { jobs: [...this.jobs.keys()] });
  }

  public stop(): void {
    this.logger.info("Stopping scheduler...");
    this.debouncer.cancel();
    this.jobs.forEach((job) => job.stop());
  }

  public get hasPendingAutoSave(): boolean {
    return this.debouncer.pending;
  }

  private async autoSave(): Promise<void> {
    const result = await this.engine.createBackup({ kind: "full" });
    if (result.status !== "success") {
      this.logger.warn("Auto-save backup did not complete", {
        status: result.status,
        errorCode: result.errorCode,
      });
    }
  }
}
