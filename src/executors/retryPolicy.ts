import { setTimeout as delay } from "timers/promises";
import type { Logger } from "winston";
import {
  DEFAULT_ERROR_BASE_DELAY,
  NETWORK_ERROR_BASE_DELAYS,
  ResilienceDefaults,
  RetryAttempt,
  RetryOptions,
  RetryPolicyConfig,
} from "../constants/SyncConstant";
import {
  ErrorCategory,
  NetworkError,
  OperationError,
  SyncError,
  isRetryable,
} from "../errors/sync.errors";

/**
 * Named retry profiles
 */
export const RetryPresets = {
  default: {},
  network: {
    maxRetries: 3,
    baseDelay: 2000,
    maxDelay: 120000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
  },
  aggressive: {
    maxRetries: 5,
    baseDelay: 1000,
    maxDelay: 600000,
    backoffMultiplier: 1.5,
    jitterFactor: 0.2,
  },
  conservative: {
    maxRetries: 2,
    baseDelay: 5000,
    maxDelay: 60000,
    backoffMultiplier: 3,
    jitterFactor: 0.05,
  },
} satisfies Record<string, RetryPolicyConfig>;

export interface RetryRuntime {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export type RetryOutcome<T> =
  | { succeeded: true; result: T; attempts: RetryAttempt[] }
  | { succeeded: false; error: Error; attempts: RetryAttempt[] };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * Exponential backoff with jitter. Makes at most `maxRetries + 1` attempts.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly backoffMultiplier: number;
  readonly jitterFactor: number;
  private readonly retryable: (error: unknown) => boolean;
  private readonly useErrorSpecificDelays: boolean;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly logger: Logger,
    config: RetryPolicyConfig = {},
    runtime: RetryRuntime = {},
  ) {
    this.maxRetries = config.maxRetries ?? ResilienceDefaults.MAX_RETRIES;
    this.baseDelay = config.baseDelay ?? ResilienceDefaults.BASE_RETRY_DELAY;
    this.maxDelay = config.maxDelay ?? ResilienceDefaults.MAX_RETRY_DELAY;
    this.backoffMultiplier =
      config.backoffMultiplier ?? ResilienceDefaults.BACKOFF_MULTIPLIER;
    this.jitterFactor = config.jitterFactor ?? ResilienceDefaults.JITTER_FACTOR;
    this.retryable = config.isRetryable ?? isRetryable;
    this.useErrorSpecificDelays = config.useErrorSpecificDelays ?? true;
    this.sleep = runtime.sleep ?? defaultSleep;
    this.random = runtime.random ?? Math.random;
  }

  static preset(
    name: keyof typeof RetryPresets,
    logger: Logger,
    runtime: RetryRuntime = {},
  ): RetryPolicy {
    return new RetryPolicy(logger, RetryPresets[name], runtime);
  }

  isRetryable(error: unknown): boolean {
    return this.retryable(error);
  }

  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const outcome = await this.executeWithResult(fn, options);
    if (outcome.succeeded) {
      return outcome.result;
    }
    throw outcome.error;
  }

  /**
   * Like `execute` but reports every attempt instead of throwing.
   */
  async executeWithResult<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<RetryOutcome<T>> {
    const { context = "operation", onRetry, signal } = options;
    const attempts: RetryAttempt[] = [];
    const totalAttempts = this.maxRetries + 1;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      if (signal?.aborted) {
        return {
          succeeded: false,
          error: new OperationError("cancelled", { context: { operation: context } }),
          attempts,
        };
      }

      const startedAt = Date.now();
      try {
        const result = await fn(attempt);
        attempts.push({ attempt, startedAt, durationMs: Date.now() - startedAt });
        return { succeeded: true, result, attempts };
      } catch (thrown) {
        const error = toError(thrown);
        const record: RetryAttempt = {
          attempt,
          startedAt,
          durationMs: Date.now() - startedAt,
          error: error.message,
        };
        attempts.push(record);

        if (attempt >= totalAttempts || !this.retryable(error)) {
          return { succeeded: false, error, attempts };
        }

        const wait = this.calculateDelay(attempt, error);
        record.delayMs = wait;

        this.logger.warn("Remote operation failed, retrying", {
          context,
          attempt,
          maxAttempts: totalAttempts,
          delayMs: wait,
          error: error.message,
        });
        onRetry?.(error, attempt, wait);

        try {
          await this.sleep(wait, signal);
        } catch (sleepError) {
          return {
            succeeded: false,
            error: new OperationError("cancelled", {
              context: { operation: context },
              cause: toError(sleepError),
            }),
            attempts,
          };
        }
      }
    }

    return {
      succeeded: false,
      error: new OperationError("invalidState", {
        message: "Retry loop exited without a result",
      }),
      attempts,
    };
  }

  /**
   * Delay before the attempt following `attempt`. Network failures use a
   * per-kind base scaled by min(2^(attempt-1), 16); anything else uses
   * baseDelay * multiplier^(attempt-1). Both are capped at maxDelay,
   * jittered by ±jitterFactor and floored at 100ms.
   */
  calculateDelay(attempt: number, error?: unknown): number {
    let base = this.baseDelay * Math.pow(this.backoffMultiplier, attempt - 1);

    if (this.useErrorSpecificDelays && error instanceof SyncError) {
      const errorBase = this.errorBaseDelay(error);
      if (errorBase !== undefined) {
        const factor = Math.min(
          Math.pow(2, attempt - 1),
          ResilienceDefaults.ERROR_DELAY_MAX_FACTOR,
        );
        base = Math.min(
          Math.max(errorBase * factor, ResilienceDefaults.ERROR_DELAY_FLOOR),
          ResilienceDefaults.ERROR_DELAY_CEILING,
        );
      }
    }

    const capped = Math.min(base, this.maxDelay);
    const jitter = capped * this.jitterFactor * (this.random() * 2 - 1);
    return Math.max(
      ResilienceDefaults.MIN_RETRY_DELAY,
      Math.round(capped + jitter),
    );
  }

  private errorBaseDelay(error: SyncError): number | undefined {
    if (error instanceof NetworkError) {
      return NETWORK_ERROR_BASE_DELAYS[error.kind];
    }
    if (error.category === ErrorCategory.STORAGE) {
      return DEFAULT_ERROR_BASE_DELAY;
    }
    return undefined;
  }
}
