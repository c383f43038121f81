import type { Logger } from "winston";
import {
  CircuitBreakerConfig,
  CircuitBreakerState,
  RetryOptions,
  RetryPolicyConfig,
} from "../constants/SyncConstant";
import { CircuitBreaker } from "./circuitBreaker";
import { RetryPolicy, RetryRuntime } from "./retryPolicy";

/**
 * Unified resilience executor: the circuit breaker wraps the whole retried
 * operation, so an exhausted retry counts once toward the breaker. The
 * breaker's timeout applies to each attempt.
 */
export class ResilienceExecutor {
  readonly retryPolicy: RetryPolicy;
  readonly circuitBreaker: CircuitBreaker;

  constructor(
    name: string,
    logger: Logger,
    retryConfig: RetryPolicyConfig = {},
    circuitBreakerConfig: CircuitBreakerConfig = {},
    runtime: RetryRuntime & { now?: () => number } = {},
  ) {
    this.retryPolicy = new RetryPolicy(logger, retryConfig, runtime);
    this.circuitBreaker = new CircuitBreaker(
      name,
      logger,
      circuitBreakerConfig,
      runtime.now,
    );
  }

  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    this.circuitBreaker.acquire();
    try {
      const result = await this.retryPolicy.execute(
        (attempt) => this.circuitBreaker.withTimeout(fn(attempt)),
        options,
      );
      this.circuitBreaker.recordSuccess();
      return result;
    } catch (error) {
      this.circuitBreaker.recordFailure(error);
      throw error;
    }
  }

  reset(): void {
    this.circuitBreaker.reset();
  }

  getState(): CircuitBreakerState {
    return this.circuitBreaker.getState();
  }
}
