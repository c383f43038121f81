import { ConflictStrategy, SyncRecord, SyncValue } from "./sync.model";

export interface FieldChange {
  field: string;
  oldValue: SyncValue | undefined;
  newValue: SyncValue | undefined;
  source: "LOCAL" | "REMOTE" | "MANUAL";
  reason: string; // e.g. "remote timestamp is later than local"
}

export interface AuditLog {
  id: string;
  conflictId: string;
  tableName: string;
  recordId: string;
  strategy: ConflictStrategy;
  timestamp: Date;
  details: string;
  changes: FieldChange[];
  triggeredBy: "SYSTEM" | "USER";
}

export interface MergeResult {
  record: SyncRecord;
  changes: FieldChange[];
}

/**
 * Outcome of comparing a remote record with its local counterpart
 */
export type ConflictDetection =
  | { action: "insert"; record: SyncRecord }
  | { action: "update"; record: SyncRecord }
  | { action: "conflict"; localRecord: SyncRecord; remoteRecord: SyncRecord }
  | { action: "skip" };
