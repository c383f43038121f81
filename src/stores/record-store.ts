import {
  ConflictStatus,
  StoredConflict,
  SyncMetadata,
  SyncRecord,
} from "../models/sync.model";

/**
 * Metadata key holding the time of the last local save to remote storage
 */
export const CLOUD_SAVE_METADATA_KEY = "cloud_save";

/**
 * Local persistence of sync-enabled tables. Every table holds records
 * keyed by id, plus one sync metadata row per table.
 */
export interface RecordStore {
  /** Pending records modified after `since` (epoch ms), oldest first */
  changedSince(table: string, since: number): Promise<SyncRecord[]>;
  getById(table: string, id: string): Promise<SyncRecord | undefined>;
  insert(table: string, record: SyncRecord): Promise<void>;
  update(table: string, id: string, record: SyncRecord): Promise<void>;
  /**
   * Mark uploaded records synced. A record edited again after the uploaded
   * version (a later `lastModified`) stays pending.
   */
  markSynced(table: string, uploaded: readonly UploadedVersion[]): Promise<void>;
  getSyncMetadata(table: string): Promise<SyncMetadata | undefined>;
  setSyncMetadata(table: string, metadata: SyncMetadata): Promise<void>;
  /** Every record of the table, ordered by id */
  exportTable(table: string): Promise<SyncRecord[]>;
  countRecords(tables: readonly string[]): Promise<number>;
  countPending(table: string): Promise<number>;
  /** Insert or replace a conflict by id */
  saveConflict(entry: StoredConflict): Promise<void>;
  getConflict(id: string): Promise<StoredConflict | undefined>;
  /** Conflicts with the given status, oldest detection first */
  listConflicts(status: ConflictStatus): Promise<StoredConflict[]>;
}

export type UploadedVersion = Pick<SyncRecord, "id" | "lastModified">;

export const emptySyncMetadata = (tableName: string): SyncMetadata => ({
  tableName,
  lastSyncTimestamp: null,
  lastBackupTimestamp: null,
  pendingChangeCount: 0,
  lastOriginId: null,
});
