/**
 * Field values a synced record may hold. Nested structures stay JSON-shaped.
 */
export type SyncValue =
  | string
  | number
  | boolean
  | null
  | SyncValue[]
  | { [key: string]: SyncValue };

export type SyncFields = { [field: string]: SyncValue };

export type RecordSyncStatus = "pending" | "synced";

/**
 * A row of a sync-enabled table. `fields` carries the clinic data; the
 * remaining properties are sync bookkeeping owned by the engine.
 */
export interface SyncRecord {
  id: string;
  fields: SyncFields;
  /** Epoch milliseconds of the last local or remote modification */
  lastModified: number;
  syncStatus: RecordSyncStatus;
  originId: string | null;
}

export type SnapshotTables = Record<string, SyncRecord[]>;

/**
 * Full or per-table export. The checksum covers every other field.
 */
export interface SyncSnapshot {
  readonly tenantId: string;
  readonly originId: string;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly version: number;
  readonly tables: Readonly<SnapshotTables>;
  readonly checksum: string;
  readonly metadata: Readonly<SyncFields>;
}

export enum ConflictStrategy {
  USE_LOCAL = "useLocal",
  USE_REMOTE = "useRemote",
  MERGE = "merge",
  MANUAL = "manual",
}

export type ConflictKind = "bothModified";

export interface SyncConflict {
  id: string;
  tableName: string;
  recordId: string;
  localRecord: SyncRecord;
  remoteRecord: SyncRecord;
  detectedAt: string;
  kind: ConflictKind;
}

export interface ConflictResolution {
  conflictId: string;
  strategy: ConflictStrategy;
  resolvedRecord: SyncRecord;
  resolvedAt: string;
  notes?: string;
}

export type ConflictStatus = "pending" | "resolved" | "superseded";

/**
 * A conflict as the record store keeps it, with every resolution applied
 * to it so far keyed by strategy and manual record.
 */
export interface StoredConflict {
  conflict: SyncConflict;
  status: ConflictStatus;
  resolutions: Record<string, ConflictResolution>;
}

export interface SyncMetadata {
  tableName: string;
  lastSyncTimestamp: number | null;
  lastBackupTimestamp: number | null;
  pendingChangeCount: number;
  lastOriginId: string | null;
}

export type BackupKind = "full" | "incremental" | "sync" | "manual";

export interface BackupDescriptor {
  id: string;
  name: string;
  createdAt: Date;
  size: number;
  tenantId: string;
  originId: string | null;
  kind: BackupKind;
  /** Table name of a per-table sync blob */
  table?: string;
}

export type SyncState = "idle" | "syncing" | "backingUp" | "restoring" | "error";

export type SyncOperation =
  | "fullSync"
  | "incrementalSync"
  | "backup"
  | "restore"
  | "reconcile"
  | "resolveConflict"
  | "resolveConflicts"
  | "pruneBackups";

export type SyncResultStatus = "success" | "failure" | "partial" | "cancelled";

export interface SyncCounts {
  uploaded: number;
  downloaded: number;
  inserted: number;
  updated: number;
  conflicts: number;
}

/**
 * Outcome of every top-level engine operation. Operations never throw.
 */
export interface SyncResult {
  operation: SyncOperation;
  status: SyncResultStatus;
  startedAt: string;
  durationMs: number;
  counts: SyncCounts;
  conflictIds: string[];
  errorCode?: string;
  errorMessage?: string;
  requiresReauth: boolean;
  metadata: Record<string, unknown>;
}

export interface SyncProgress {
  operation: SyncOperation;
  /** Fraction in [0, 1], never decreasing within one operation */
  fraction: number;
  step: string;
}

export type ProgressListener = (progress: SyncProgress) => void;
