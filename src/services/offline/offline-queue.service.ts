import { v4 as uuidv4 } from "uuid";
import type { Logger } from "winston";
import { classifyError, isRetryable } from "../../errors/sync.errors";

export interface PendingOperation {
  id: string;
  label: string;
  enqueuedAt: Date;
  attempts: number;
}

interface QueuedOperation extends PendingOperation {
  run: () => Promise<void>;
}

export interface FlushSummary {
  processed: number;
  requeued: number;
  dropped: number;
}

/**
 * Remote operations that failed while offline, replayed in order on flush.
 * Operations failing with a retryable error go back on the queue; any
 * other failure drops them.
 */
export class OfflineQueue {
  private items: QueuedOperation[] = [];
  private flushing?: Promise<FlushSummary>;

  constructor(
    private readonly logger: Logger,
    private readonly maxSize: number = 100,
    private readonly now: () => Date = () => new Date(),
  ) {}

  enqueue(label: string, run: () => Promise<void>): PendingOperation {
    if (this.items.length >= this.maxSize) {
      const evicted = this.items.shift();
      this.logger.warn("Offline queue full, dropping oldest operation", {
        id: evicted?.id,
        label: evicted?.label,
      });
    }

    const operation: QueuedOperation = {
      id: uuidv4(),
      label,
      enqueuedAt: this.now(),
      attempts: 0,
      run,
    };
    this.items.push(operation);
    this.logger.info("Operation queued for when connectivity returns", {
      id: operation.id,
      label,
      pending: this.items.length,
    });
    return this.describe(operation);
  }

  /**
   * Run every queued operation once. Concurrent callers share one flush.
   */
  async flush(): Promise<FlushSummary> {
    if (!this.flushing) {
      this.flushing = this.drain().finally(() => {
        this.flushing = undefined;
      });
    }
    return this.flushing;
  }

  get size(): number {
    return this.items.length;
  }

  oldestPending(): Date | undefined {
    return this.items[0]?.enqueuedAt;
  }

  list(): PendingOperation[] {
    return this.items.map((item) => this.describe(item));
  }

  clear(): number {
    const cleared = this.items.length;
    this.items = [];
    return cleared;
  }

  private async drain(): Promise<FlushSummary> {
    const batch = this.items;
    this.items = [];
    const summary: FlushSummary = { processed: 0, requeued: 0, dropped: 0 };
    const retained: QueuedOperation[] = [];

    for (const operation of batch) {
      operation.attempts++;
      try {
        await operation.run();
        summary.processed++;
      } catch (error) {
        const classified = classifyError(error);
        if (isRetryable(classified)) {
          retained.push(operation);
          summary.requeued++;
          this.logger.warn("Queued operation failed, keeping it queued", {
            id: operation.id,
            label: operation.label,
            attempts: operation.attempts,
            code: classified.code,
          });
        } else {
          summary.dropped++;
          this.logger.error("Queued operation failed permanently", {
            id: operation.id,
            label: operation.label,
            code: classified.code,
            error: classified.message,
          });
        }
      }
    }

    // Operations enqueued during the flush stay behind the retained ones
    this.items = [...retained, ...this.items];
    if (batch.length > 0) {
      this.logger.info("Offline queue flushed", { ...summary, pending: this.items.length });
    }
    return summary;
  }

  private describe(operation: QueuedOperation): PendingOperation {
    return {
      id: operation.id,
      label: operation.label,
      enqueuedAt: operation.enqueuedAt,
      attempts: operation.attempts,
    };
  }
}
