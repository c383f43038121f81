import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SyncResult, SyncResultStatus } from "../../src/models/sync.model";
import { SchedulableEngine, SyncScheduler } from "../../src/schedulers/sync-scheduler.service";
import { FlushSummary } from "../../src/services/offline/offline-queue.service";
import { createSilentLogger } from "../../src/utils/logger";

const cronMock = vi.hoisted(() => {
  const task = { start: vi.fn(), stop: vi.fn() };
  return {
    task,
    validate: vi.fn((expression: string) => expression !== "every now and then"),
    schedule: vi.fn(() => task),
  };
});

vi.mock("node-cron", () => ({
  default: { validate: cronMock.validate, schedule: cronMock.schedule },
}));

const result = (status: SyncResultStatus): SyncResult => ({
  operation: "incrementalSync",
  status,
  startedAt: "2024-03-01T10:00:00.000Z",
  durationMs: 0,
  counts: { uploaded: 0, downloaded: 0, inserted: 0, updated: 0, conflicts: 0 },
  conflictIds: [],
  requiresReauth: false,
  metadata: {},
});

const createEngine = () => {
  const calls: string[] = [];
  const engine: SchedulableEngine = {
    flushOfflineQueue: vi.fn(async () => {
      calls.push("flush");
      return { processed: 0, requeued: 0, dropped: 0 };
    }),
    incrementalSync: vi.fn(async () => {
      calls.push("sync");
      return result("success");
    }),
    createBackup: vi.fn(async () => result("success")),
  };
  return { engine, calls };
};

describe("SyncScheduler", () => {
  beforeEach(() => {
    cronMock.validate.mockClear();
    cronMock.schedule.mockClear();
    cronMock.task.start.mockClear();
    cronMock.task.stop.mockClear();
  });

  describe("periodic sync", () => {
    it("replays queued operations before syncing", async () => {
      const { engine, calls } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger());

      await scheduler.runPeriodicSync();

      expect(calls).toEqual(["flush", "sync"]);
    });

    it("skips a tick while the previous one is still running", async () => {
      const { engine } = createEngine();
      let release: () => void = () => undefined;
      engine.flushOfflineQueue = vi.fn(
        () =>
          new Promise<FlushSummary>((resolve) => {
            release = () => resolve({ processed: 0, requeued: 0, dropped: 0 });
          }),
      );
      const scheduler = new SyncScheduler(engine, createSilentLogger());

      const first = scheduler.runPeriodicSync();
      await scheduler.runPeriodicSync();
      release();
      await first;

      expect(engine.flushOfflineQueue).toHaveBeenCalledTimes(1);
      expect(engine.incrementalSync).toHaveBeenCalledTimes(1);
    });

    it("runs again after a failed sync", async () => {
      const { engine } = createEngine();
      engine.incrementalSync = vi.fn(async () => result("failure"));
      const scheduler = new SyncScheduler(engine, createSilentLogger());

      await scheduler.runPeriodicSync();
      await scheduler.runPeriodicSync();

      expect(engine.incrementalSync).toHaveBeenCalledTimes(2);
    });
  });

  describe("lifecycle", () => {
    it("schedules the periodic job in UTC on start", () => {
      const { engine } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger(), { cron: "*/15 * * * *" });

      scheduler.start();
      scheduler.start();

      expect(cronMock.schedule).toHaveBeenCalledTimes(1);
      expect(cronMock.schedule).toHaveBeenCalledWith("*/15 * * * *", expect.any(Function), {
        scheduled: false,
        timezone: "UTC",
      });
      expect(cronMock.task.start).toHaveBeenCalledTimes(2);

      scheduler.stop();
      expect(cronMock.task.stop).toHaveBeenCalledTimes(1);
    });

    it("does not schedule anything for an empty expression", () => {
      const { engine } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger(), { cron: "" });

      scheduler.start();

      expect(cronMock.schedule).not.toHaveBeenCalled();
    });

    it("rejects invalid and duplicate jobs", () => {
      const { engine } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger());
      const task = async () => undefined;

      expect(() => scheduler.scheduleJob("nightly", "every now and then", task)).toThrow(
        "Invalid cron expression for 'nightly': every now and then",
      );
      scheduler.scheduleJob("nightly", "0 2 * * *", task);
      expect(() => scheduler.scheduleJob("nightly", "0 3 * * *", task)).toThrow(
        "Job 'nightly' already exists",
      );
    });
  });

  describe("auto-save", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("backs up once local changes settle", async () => {
      const { engine } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger(), {
        autoSaveDebounceMs: 500,
      });

      scheduler.notifyLocalChange();
      scheduler.notifyLocalChange();
      expect(scheduler.hasPendingAutoSave).toBe(true);

      await vi.advanceTimersByTimeAsync(500);

      expect(engine.createBackup).toHaveBeenCalledTimes(1);
      expect(engine.createBackup).toHaveBeenCalledWith({ kind: "full" });
      expect(scheduler.hasPendingAutoSave).toBe(false);
    });

    it("drops a pending auto-save on stop", async () => {
      const { engine } = createEngine();
      const scheduler = new SyncScheduler(engine, createSilentLogger(), {
        autoSaveDebounceMs: 500,
      });

      scheduler.notifyLocalChange();
      scheduler.stop();
      await vi.advanceTimersByTimeAsync(1000);

      expect(engine.createBackup).not.toHaveBeenCalled();
    });
  });
});
