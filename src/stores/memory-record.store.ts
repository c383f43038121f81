import {
  ConflictStatus,
  StoredConflict,
  SyncFields,
  SyncMetadata,
  SyncRecord,
} from "../models/sync.model";
import { RecordStore, UploadedVersion } from "./record-store";

/**
 * In-process record store. Used when RECORD_STORE=memory and in tests.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly tables = new Map<string, Map<string, SyncRecord>>();
  private readonly metadata = new Map<string, SyncMetadata>();
  private readonly conflicts = new Map<string, StoredConflict>();

  constructor(
    private readonly originId: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Apply a local edit: the record becomes pending and owned by this origin.
   */
  async saveLocal(table: string, id: string, fields: SyncFields): Promise<SyncRecord> {
    const record: SyncRecord = {
      id,
      fields: structuredClone(fields),
      lastModified: this.now().getTime(),
      syncStatus: "pending",
      originId: this.originId,
    };
    this.table(table).set(id, record);
    return structuredClone(record);
  }

  async changedSince(table: string, since: number): Promise<SyncRecord[]> {
    return [...this.table(table).values()]
      .filter((record) => record.syncStatus === "pending" && record.lastModified > since)
      .sort((a, b) => a.lastModified - b.lastModified || a.id.localeCompare(b.id))
      .map((record) => structuredClone(record));
  }

  async getById(table: string, id: string): Promise<SyncRecord | undefined> {
    const record = this.table(table).get(id);
    return record ? structuredClone(record) : undefined;
  }

  async insert(table: string, record: SyncRecord): Promise<void> {
    this.table(table).set(record.id, structuredClone(record));
  }

  async update(table: string, id: string, record: SyncRecord): Promise<void> {
    this.table(table).set(id, structuredClone({ ...record, id }));
  }

  async markSynced(table: string, uploaded: readonly UploadedVersion[]): Promise<void> {
    const rows = this.table(table);
    for (const { id, lastModified } of uploaded) {
      const record = rows.get(id);
      if (record && record.lastModified <= lastModified) {
        rows.set(id, { ...record, syncStatus: "synced" });
      }
    }
  }

  async getSyncMetadata(table: string): Promise<SyncMetadata | undefined> {
    const metadata = this.metadata.get(table);
    return metadata ? { ...metadata } : undefined;
  }

  async setSyncMetadata(table: string, metadata: SyncMetadata): Promise<void> {
    this.metadata.set(table, { ...metadata, tableName: table });
  }

  async exportTable(table: string): Promise<SyncRecord[]> {
    return [...this.table(table).values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((record) => structuredClone(record));
  }

  async countRecords(tables: readonly string[]): Promise<number> {
    return tables.reduce((sum, table) => sum + this.table(table).size, 0);
  }

  async countPending(table: string): Promise<number> {
    let pending = 0;
    for (const record of this.table(table).values()) {
      if (record.syncStatus === "pending") pending++;
    }
    return pending;
  }

  async saveConflict(entry: StoredConflict): Promise<void> {
    this.conflicts.set(entry.conflict.id, structuredClone(entry));
  }

  async getConflict(id: string): Promise<StoredConflict | undefined> {
    const entry = this.conflicts.get(id);
    return entry ? structuredClone(entry) : undefined;
  }

  async listConflicts(status: ConflictStatus): Promise<StoredConflict[]> {
    return [...this.conflicts.values()]
      .filter((entry) => entry.status === status)
      .sort(
        (a, b) =>
          a.conflict.detectedAt.localeCompare(b.conflict.detectedAt) ||
          a.conflict.id.localeCompare(b.conflict.id),
      )
      .map((entry) => structuredClone(entry));
  }

  private table(name: string): Map<string, SyncRecord> {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = new Map();
      this.tables.set(name, rows);
    }
    return rows;
  }
}
