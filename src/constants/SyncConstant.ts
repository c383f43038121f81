import type { NetworkErrorKind } from "../errors/sync.errors";

export const ResilienceDefaults = {
  // Retry
  MAX_RETRIES: 3,
  BASE_RETRY_DELAY: 1000, // 1 second
  MAX_RETRY_DELAY: 300000, // 5 minutes
  BACKOFF_MULTIPLIER: 2,
  JITTER_FACTOR: 0.1,
  MIN_RETRY_DELAY: 100,

  // Error-specific backoff is clamped to this window
  ERROR_DELAY_FLOOR: 1000,
  ERROR_DELAY_CEILING: 300000,
  ERROR_DELAY_MAX_FACTOR: 16,

  // Circuit breaker
  CIRCUIT_BREAKER_THRESHOLD: 5,
  CIRCUIT_BREAKER_RESET_TIMEOUT: 60000, // 1 minute
  OPERATION_TIMEOUT: 30000, // 30 seconds
} as const;

/**
 * Base delay per network failure before exponential scaling
 */
export const NETWORK_ERROR_BASE_DELAYS: Record<NetworkErrorKind, number> = {
  noConnectivity: 60000,
  timeout: 30000,
  serverError: 120000,
  rateLimited: 300000,
  connectionRefused: 15000,
  dnsFailure: 30000,
};

export const DEFAULT_ERROR_BASE_DELAY = 30000;

export const SyncDefaults = {
  TABLES: ["patients", "visits", "payments"],
  SNAPSHOT_VERSION: 1,
  SYNC_FILE_PREFIX: "clinic",
  BACKUP_EXTENSION: ".enc",
  AUTO_SAVE_DEBOUNCE_MS: 30000,
  SYNC_CRON: "0 * * * *",
} as const;

/**
 * Progress checkpoints reported by the engine, per operation
 */
export const ProgressSteps = {
  FULL_SYNC: {
    UPLOAD: { fraction: 0.1, step: "Uploading local changes" },
    DOWNLOAD: { fraction: 0.5, step: "Downloading remote changes" },
    METADATA: { fraction: 0.9, step: "Updating sync metadata" },
  },
  INCREMENTAL_SYNC: {
    PREPARE: { fraction: 0.1, step: "Preparing incremental sync" },
    UPLOAD: { fraction: 0.3, step: "Uploading changes since last sync" },
    DOWNLOAD: { fraction: 0.6, step: "Downloading remote changes" },
    METADATA: { fraction: 0.9, step: "Updating sync metadata" },
  },
  BACKUP: {
    EXPORT: { fraction: 0.1, step: "Exporting local data" },
    PREPARE: { fraction: 0.2, step: "Preparing snapshot" },
    ENCRYPT: { fraction: 0.4, step: "Encrypting snapshot" },
    UPLOAD: { fraction: 0.6, step: "Uploading backup" },
    CLEANUP: { fraction: 0.9, step: "Cleaning up old backups" },
  },
  RESTORE: {
    DOWNLOAD: { fraction: 0.1, step: "Downloading backup" },
    DECRYPT: { fraction: 0.4, step: "Decrypting backup" },
    VALIDATE: { fraction: 0.5, step: "Validating backup integrity" },
    IMPORT: { fraction: 0.6, step: "Importing records" },
    METADATA: { fraction: 0.9, step: "Updating sync metadata" },
  },
  RECONCILE: {
    DECIDE: { fraction: 0.05, step: "Comparing local and remote save times" },
  },
  PRUNE: {
    LIST: { fraction: 0.2, step: "Listing remote backups" },
    DELETE: { fraction: 0.5, step: "Deleting expired backups" },
  },
  DONE: { fraction: 1, step: "Completed" },
} as const;

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerState {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
}

export interface CircuitBreakerConfig {
  failureThreshold?: number;
  resetTimeout?: number;
  timeout?: number;
}

export interface RetryPolicyConfig {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  jitterFactor?: number;
  isRetryable?: (error: unknown) => boolean;
  /** Prefer the per-error delay table over the generic exponential formula */
  useErrorSpecificDelays?: boolean;
}

export interface RetryOptions {
  context?: string;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

export interface RetryAttempt {
  attempt: number;
  startedAt: number;
  durationMs: number;
  error?: string;
  delayMs?: number;
}
