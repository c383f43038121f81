import type { Logger } from "winston";
import {
  CircuitBreakerConfig,
  CircuitBreakerState,
  CircuitState,
  ResilienceDefaults,
} from "../constants/SyncConstant";
import {
  CircuitBreakerOpenError,
  ErrorCategory,
  NetworkError,
  SyncError,
} from "../errors/sync.errors";

/**
 * Consecutive-failure circuit breaker. While OPEN, calls fail fast until
 * `resetTimeout` has elapsed; then exactly one trial call is let through.
 */
export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly resetTimeout: number;
  readonly timeout: number;
  private state: CircuitState = "CLOSED";
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private trialInFlight = false;

  constructor(
    private readonly name: string,
    private readonly logger: Logger,
    config: CircuitBreakerConfig = {},
    private readonly now: () => number = Date.now,
  ) {
    this.failureThreshold =
      config.failureThreshold ?? ResilienceDefaults.CIRCUIT_BREAKER_THRESHOLD;
    this.resetTimeout =
      config.resetTimeout ?? ResilienceDefaults.CIRCUIT_BREAKER_RESET_TIMEOUT;
    this.timeout = config.timeout ?? ResilienceDefaults.OPERATION_TIMEOUT;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      const result = await this.withTimeout(fn());
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  /**
   * Throw if the breaker refuses calls; otherwise admit one call, moving
   * OPEN to HALF_OPEN once the reset timeout has passed.
   */
  acquire(): void {
    if (this.state === "OPEN") {
      const elapsed = this.now() - (this.lastFailureTime ?? 0);
      if (elapsed < this.resetTimeout) {
        throw new CircuitBreakerOpenError(this.name, this.resetTimeout - elapsed);
      }
      this.logger.info("Circuit moving to HALF_OPEN state", { circuit: this.name });
      this.state = "HALF_OPEN";
      this.trialInFlight = false;
    }

    if (this.state === "HALF_OPEN") {
      if (this.trialInFlight) {
        throw new CircuitBreakerOpenError(this.name, 0);
      }
      this.trialInFlight = true;
    }
  }

  recordSuccess(): void {
    if (this.state !== "CLOSED") {
      this.logger.info("Circuit CLOSED after successful recovery", {
        circuit: this.name,
      });
    }
    this.state = "CLOSED";
    this.failureCount = 0;
    this.trialInFlight = false;
  }

  recordFailure(error?: unknown): void {
    // Caller-initiated cancellation says nothing about remote health.
    if (
      error instanceof SyncError &&
      error.category === ErrorCategory.OPERATION &&
      error.kind === "cancelled"
    ) {
      this.trialInFlight = false;
      return;
    }

    this.failureCount++;
    this.lastFailureTime = this.now();
    this.trialInFlight = false;

    if (this.state === "HALF_OPEN" || this.failureCount >= this.failureThreshold) {
      if (this.state !== "OPEN") {
        this.logger.warn("Circuit OPEN", {
          circuit: this.name,
          consecutiveFailures: this.failureCount,
        });
      }
      this.state = "OPEN";
    }
  }

  /**
   * Reject with a timeout NetworkError if `operation` outlives `timeout`.
   */
  async withTimeout<T>(operation: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new NetworkError("timeout", {
            message: `${this.name} timed out after ${this.timeout}ms`,
            context: { timeoutMs: this.timeout },
          }),
        );
      }, this.timeout);
    });
    try {
      return await Promise.race([operation, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }

  reset(): void {
    this.state = "CLOSED";
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.trialInFlight = false;
    this.logger.info("Circuit breaker reset", { circuit: this.name });
  }

  getState(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
