import axios from "axios";

/**
 * Broad error families used for routing and retry decisions
 */
export enum ErrorCategory {
  NETWORK = "network",
  AUTH = "auth",
  INTEGRITY = "integrity",
  STORAGE = "storage",
  CONFLICT = "conflict",
  OPERATION = "operation",
  CIRCUIT = "circuit",
  KEY = "key",
}

export type NetworkErrorKind =
  | "noConnectivity"
  | "timeout"
  | "serverError"
  | "rateLimited"
  | "dnsFailure"
  | "connectionRefused";

export type AuthErrorKind =
  | "tokenExpired"
  | "invalidCredentials"
  | "accountDisabled"
  | "permissionDenied";

export type IntegrityErrorKind =
  | "checksumMismatch"
  | "corruptedData"
  | "versionMismatch"
  | "encryptionFailed"
  | "decryptionFailed";

export type StorageErrorKind =
  | "insufficientSpace"
  | "notFound"
  | "accessDenied"
  | "quotaExceeded";

export type ConflictErrorKind = "unresolvable" | "multiple" | "invalidResolution";

export type OperationErrorKind = "alreadyInProgress" | "invalidState" | "cancelled";

export type KeyErrorKind = "readFailed" | "writeFailed" | "deleteFailed" | "notFound";

export type ErrorContext = Record<string, unknown>;

export interface SyncErrorOptions {
  message?: string;
  code?: string;
  context?: ErrorContext;
  cause?: Error;
}

const toCode = (category: ErrorCategory, kind: string): string =>
  `${category}_${kind.replace(/([a-z])([A-Z])/g, "$1_$2")}`.toUpperCase();

/**
 * Base class for every error the sync engine raises or maps.
 */
export class SyncError<K extends string = string> extends Error {
  readonly code: string;
  readonly context?: ErrorContext;
  override readonly cause?: Error;

  constructor(
    readonly category: ErrorCategory,
    readonly kind: K,
    options: SyncErrorOptions = {},
  ) {
    super(options.message ?? `${category} error: ${kind}`);
    this.name = "SyncError";
    this.code = options.code ?? toCode(category, kind);
    this.context = options.context;
    this.cause = options.cause;

    if (options.cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }

  get retryable(): boolean {
    return isRetryable(this);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      kind: this.kind,
      retryable: this.retryable,
      message: this.message,
      context: this.context,
    };
  }

  override toString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.context) {
      parts.push(`Context: ${JSON.stringify(this.context)}`);
    }
    return parts.join(" | ");
  }
}

const NETWORK_MESSAGES: Record<NetworkErrorKind, string> = {
  noConnectivity: "No network connectivity",
  timeout: "Remote request timed out",
  serverError: "Remote server error",
  rateLimited: "Remote rate limit exceeded",
  dnsFailure: "Could not resolve remote host",
  connectionRefused: "Remote host refused the connection",
};

export class NetworkError extends SyncError<NetworkErrorKind> {
  constructor(kind: NetworkErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.NETWORK, kind, {
      ...options,
      message: options.message ?? NETWORK_MESSAGES[kind],
    });
    this.name = "NetworkError";
  }
}

export class AuthError extends SyncError<AuthErrorKind> {
  constructor(kind: AuthErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.AUTH, kind, {
      ...options,
      message: options.message ?? `Authentication failed: ${kind}`,
    });
    this.name = "AuthError";
  }
}

export class IntegrityError extends SyncError<IntegrityErrorKind> {
  constructor(kind: IntegrityErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.INTEGRITY, kind, {
      ...options,
      message: options.message ?? `Data integrity check failed: ${kind}`,
    });
    this.name = "IntegrityError";
  }
}

/** Raised when a payload names an algorithm the codec does not implement */
export class UnsupportedAlgorithmError extends IntegrityError {
  constructor(algorithm: string) {
    super("decryptionFailed", {
      code: "UNSUPPORTED_ALGORITHM",
      message: `Unsupported encryption algorithm: ${algorithm}`,
      context: { algorithm },
    });
    this.name = "UnsupportedAlgorithmError";
  }
}

/** AEAD tag verification failed: wrong key or tampered ciphertext */
export class AuthenticationFailedError extends IntegrityError {
  constructor(cause?: Error) {
    super("decryptionFailed", {
      code: "AUTHENTICATION_FAILED",
      message: "Decryption failed: authentication tag mismatch",
      cause,
    });
    this.name = "AuthenticationFailedError";
  }
}

export class StorageError extends SyncError<StorageErrorKind> {
  constructor(kind: StorageErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.STORAGE, kind, {
      ...options,
      message: options.message ?? `Remote storage error: ${kind}`,
    });
    this.name = "StorageError";
  }
}

export class ConflictError extends SyncError<ConflictErrorKind> {
  constructor(kind: ConflictErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.CONFLICT, kind, {
      ...options,
      message: options.message ?? `Conflict error: ${kind}`,
    });
    this.name = "ConflictError";
  }
}

export class OperationError extends SyncError<OperationErrorKind> {
  constructor(kind: OperationErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.OPERATION, kind, {
      ...options,
      message: options.message ?? `Operation error: ${kind}`,
    });
    this.name = "OperationError";
  }
}

export class KeyStorageError extends SyncError<KeyErrorKind> {
  constructor(kind: KeyErrorKind, options: SyncErrorOptions = {}) {
    super(ErrorCategory.KEY, kind, {
      ...options,
      message: options.message ?? `Key storage error: ${kind}`,
    });
    this.name = "KeyStorageError";
  }
}

export class CircuitBreakerOpenError extends SyncError<"open"> {
  constructor(context: string, retryInMs: number) {
    super(ErrorCategory.CIRCUIT, "open", {
      code: "CIRCUIT_BREAKER_OPEN",
      message: `Circuit breaker is OPEN for ${context}. Try again in ${Math.ceil(retryInMs / 1000)}s`,
      context: { operation: context, retryInMs },
    });
    this.name = "CircuitBreakerOpenError";
  }
}

const NODE_CODE_KINDS: Record<string, NetworkErrorKind> = {
  ETIMEDOUT: "timeout",
  ECONNABORTED: "timeout",
  ESOCKETTIMEDOUT: "timeout",
  ECONNREFUSED: "connectionRefused",
  ENOTFOUND: "dnsFailure",
  EAI_AGAIN: "dnsFailure",
  ECONNRESET: "noConnectivity",
  ENETUNREACH: "noConnectivity",
  EHOSTUNREACH: "noConnectivity",
  ERR_NETWORK: "noConnectivity",
};

const fromHttpStatus = (status: number, cause: Error): SyncError | undefined => {
  const context = { status };
  if (status === 401) return new AuthError("tokenExpired", { context, cause });
  if (status === 403) return new AuthError("permissionDenied", { context, cause });
  if (status === 404) return new StorageError("notFound", { context, cause });
  if (status === 507) return new StorageError("insufficientSpace", { context, cause });
  if (status === 429) return new NetworkError("rateLimited", { context, cause });
  if (status >= 500) return new NetworkError("serverError", { context, cause });
  return undefined;
};

const errorCodeOf = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Map any thrown value onto the sync error taxonomy.
 */
export const classifyError = (error: unknown): SyncError => {
  if (error instanceof SyncError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  if (cause.name === "AbortError") {
    return new OperationError("cancelled", { cause });
  }

  if (axios.isAxiosError(error) && error.response) {
    const mapped = fromHttpStatus(error.response.status, cause);
    if (mapped) return mapped;
  }

  const code = errorCodeOf(error);
  if (code && NODE_CODE_KINDS[code]) {
    return new NetworkError(NODE_CODE_KINDS[code], {
      message: `${NETWORK_MESSAGES[NODE_CODE_KINDS[code]]}: ${cause.message}`,
      context: { code },
      cause,
    });
  }

  return new OperationError("invalidState", { message: cause.message, cause });
};

/**
 * Retry policy for the error taxonomy: transient network failures and
 * remote not-found are retried, everything else surfaces immediately.
 */
export const isRetryable = (error: unknown): boolean => {
  const classified = classifyError(error);
  switch (classified.category) {
    case ErrorCategory.NETWORK:
      return true;
    case ErrorCategory.STORAGE:
      return classified.kind === "notFound";
    default:
      return false;
  }
};

export const requiresReauth = (error: unknown): boolean =>
  classifyError(error).category === ErrorCategory.AUTH;
