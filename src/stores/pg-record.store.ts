import { z } from "zod";
import type { Logger } from "winston";
import { Queryable, SqlExecutor } from "../config/database";
import { OperationError } from "../errors/sync.errors";
import {
  ConflictStatus,
  ConflictStrategy,
  StoredConflict,
  SyncMetadata,
  SyncRecord,
} from "../models/sync.model";
import { syncFieldsSchema, syncRecordSchema } from "../services/sync/snapshot";
import { RecordStore, UploadedVersion } from "./record-store";

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

// BIGINT columns come back from pg as strings
const bigint = z.union([z.string(), z.number()]).transform(Number);

const recordRowSchema = z.object({
  id: z.string(),
  data: syncFieldsSchema,
  last_modified: bigint,
  sync_status: z.enum(["pending", "synced"]),
  origin_id: z.string().nullable(),
});

const metadataRowSchema = z.object({
  table_name: z.string(),
  last_sync_timestamp: bigint.nullable(),
  last_backup_timestamp: bigint.nullable(),
  pending_change_count: z.coerce.number(),
  last_origin_id: z.string().nullable(),
});

const countRowSchema = z.object({ count: bigint });

const conflictRowSchema = z.object({
  status: z.enum(["pending", "resolved", "superseded"]),
  conflict: z.object({
    id: z.string(),
    tableName: z.string(),
    recordId: z.string(),
    localRecord: syncRecordSchema,
    remoteRecord: syncRecordSchema,
    detectedAt: z.string(),
    kind: z.literal("bothModified"),
  }),
  resolutions: z.record(
    z.object({
      conflictId: z.string(),
      strategy: z.nativeEnum(ConflictStrategy),
      resolvedRecord: syncRecordSchema,
      resolvedAt: z.string(),
      notes: z.string().optional(),
    }),
  ),
});

const toStoredConflict = (row: unknown): StoredConflict => conflictRowSchema.parse(row);

const toRecord = (row: unknown): SyncRecord => {
  const parsed = recordRowSchema.parse(row);
  return {
    id: parsed.id,
    fields: parsed.data,
    lastModified: parsed.last_modified,
    syncStatus: parsed.sync_status,
    originId: parsed.origin_id,
  };
};

/**
 * PostgreSQL record store. Each sync table keeps the record fields in a
 * JSONB column next to the bookkeeping columns.
 */
export class PgRecordStore implements RecordStore {
  private readonly tables: ReadonlySet<string>;

  constructor(
    private readonly db: SqlExecutor,
    tables: readonly string[],
    private readonly logger: Logger,
  ) {
    for (const table of tables) {
      if (!IDENTIFIER.test(table)) {
        throw new OperationError("invalidState", {
          message: `Invalid table name: ${table}`,
        });
      }
    }
    this.tables = new Set(tables);
  }

  async ensureSchema(): Promise<void> {
    await this.db.transaction(async (client) => {
      for (const table of this.tables) {
        await client.query(
          `CREATE TABLE IF NOT EXISTS "${table}" (
            id TEXT PRIMARY KEY,
            data JSONB NOT NULL,
            last_modified BIGINT NOT NULL,
            sync_status TEXT NOT NULL DEFAULT 'pending',
            origin_id TEXT
          )`,
        );
      }
      await client.query(
        `CREATE TABLE IF NOT EXISTS sync_metadata (
          table_name TEXT PRIMARY KEY,
          last_sync_timestamp BIGINT,
          last_backup_timestamp BIGINT,
          pending_change_count INTEGER NOT NULL DEFAULT 0,
          last_origin_id TEXT
        )`,
      );
      await client.query(
        `CREATE TABLE IF NOT EXISTS sync_conflicts (
          id TEXT PRIMARY KEY,
          table_name TEXT NOT NULL,
          record_id TEXT NOT NULL,
          status TEXT NOT NULL,
          detected_at TIMESTAMPTZ NOT NULL,
          conflict JSONB NOT NULL,
          resolutions JSONB NOT NULL DEFAULT '{}'
        )`,
      );
    });
    this.logger.info("Record store schema ready", { tables: [...this.tables] });
  }

  async changedSince(table: string, since: number): Promise<SyncRecord[]> {
    const rows = await this.db.query(
      `SELECT id, data, last_modified, sync_status, origin_id FROM ${this.ident(table)}
       WHERE last_modified > $1 AND sync_status = 'pending' ORDER BY last_modified ASC, id ASC`,
      [since],
    );
    return rows.map(toRecord);
  }

  async getById(table: string, id: string): Promise<SyncRecord | undefined> {
    const rows = await this.db.query(
      `SELECT id, data, last_modified, sync_status, origin_id FROM ${this.ident(table)} WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toRecord(rows[0]) : undefined;
  }

  async insert(table: string, record: SyncRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.ident(table)} (id, data, last_modified, sync_status, origin_id)
       VALUES ($1, $2, $3, $4, $5)`,
      [record.id, JSON.stringify(record.fields), record.lastModified, record.syncStatus, record.originId],
    );
  }

  async update(table: string, id: string, record: SyncRecord): Promise<void> {
    await this.db.query(
      `UPDATE ${this.ident(table)}
       SET data = $2, last_modified = $3, sync_status = $4, origin_id = $5
       WHERE id = $1`,
      [id, JSON.stringify(record.fields), record.lastModified, record.syncStatus, record.originId],
    );
  }

  async markSynced(table: string, uploaded: readonly UploadedVersion[]): Promise<void> {
    if (uploaded.length === 0) return;
    await this.db.query(
      `UPDATE ${this.ident(table)} AS t SET sync_status = 'synced'
       FROM unnest($1::text[], $2::bigint[]) AS uploaded(id, last_modified)
       WHERE t.id = uploaded.id AND t.last_modified <= uploaded.last_modified`,
      [uploaded.map((record) => record.id), uploaded.map((record) => record.lastModified)],
    );
  }

  async getSyncMetadata(table: string): Promise<SyncMetadata | undefined> {
    const rows = await this.db.query(
      `SELECT table_name, last_sync_timestamp, last_backup_timestamp, pending_change_count, last_origin_id
       FROM sync_metadata WHERE table_name = $1`,
      [table],
    );
    if (rows.length === 0) return undefined;
    const row = metadataRowSchema.parse(rows[0]);
    return {
      tableName: row.table_name,
      lastSyncTimestamp: row.last_sync_timestamp,
      lastBackupTimestamp: row.last_backup_timestamp,
      pendingChangeCount: row.pending_change_count,
      lastOriginId: row.last_origin_id,
    };
  }

  async setSyncMetadata(table: string, metadata: SyncMetadata): Promise<void> {
    await this.db.query(
      `INSERT INTO sync_metadata (table_name, last_sync_timestamp, last_backup_timestamp, pending_change_count, last_origin_id)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (table_name) DO UPDATE SET
         last_sync_timestamp = EXCLUDED.last_sync_timestamp,
         last_backup_timestamp = EXCLUDED.last_backup_timestamp,
         pending_change_count = EXCLUDED.pending_change_count,
         last_origin_id = EXCLUDED.last_origin_id`,
      [
        table,
        metadata.lastSyncTimestamp,
        metadata.lastBackupTimestamp,
        metadata.pendingChangeCount,
        metadata.lastOriginId,
      ],
    );
  }

  async exportTable(table: string): Promise<SyncRecord[]> {
    const rows = await this.db.query(
      `SELECT id, data, last_modified, sync_status, origin_id FROM ${this.ident(table)} ORDER BY id ASC`,
    );
    return rows.map(toRecord);
  }

  async countRecords(tables: readonly string[]): Promise<number> {
    let total = 0;
    for (const table of tables) {
      total += await this.count(this.db, `SELECT COUNT(*) AS count FROM ${this.ident(table)}`);
    }
    return total;
  }

  async countPending(table: string): Promise<number> {
    return this.count(
      this.db,
      `SELECT COUNT(*) AS count FROM ${this.ident(table)} WHERE sync_status = 'pending'`,
    );
  }

  async saveConflict(entry: StoredConflict): Promise<void> {
    const { conflict } = entry;
    await this.db.query(
      `INSERT INTO sync_conflicts (id, table_name, record_id, status, detected_at, conflict, resolutions)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (id) DO UPDATE SET
         status = EXCLUDED.status,
         resolutions = EXCLUDED.resolutions`,
      [
        conflict.id,
        conflict.tableName,
        conflict.recordId,
        entry.status,
        conflict.detectedAt,
        JSON.stringify(conflict),
        JSON.stringify(entry.resolutions),
      ],
    );
  }

  async getConflict(id: string): Promise<StoredConflict | undefined> {
    const rows = await this.db.query(
      `SELECT status, conflict, resolutions FROM sync_conflicts WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toStoredConflict(rows[0]) : undefined;
  }

  async listConflicts(status: ConflictStatus): Promise<StoredConflict[]> {
    const rows = await this.db.query(
      `SELECT status, conflict, resolutions FROM sync_conflicts
       WHERE status = $1 ORDER BY detected_at ASC, id ASC`,
      [status],
    );
    return rows.map(toStoredConflict);
  }

  private async count(client: Queryable, sql: string): Promise<number> {
    const rows = await client.query(sql);
    return rows.length > 0 ? countRowSchema.parse(rows[0]).count : 0;
  }

  private ident(table: string): string {
    if (!this.tables.has(table)) {
      throw new OperationError("invalidState", {
        message: `Table is not sync-enabled: ${table}`,
        context: { table },
      });
    }
    return `"${table}"`;
  }
}
