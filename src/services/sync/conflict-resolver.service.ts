import type { Logger } from "winston";
import { v4 as uuidv4 } from "uuid";
import {
  ConflictResolution,
  ConflictStrategy,
  SyncConflict,
  SyncFields,
  SyncRecord,
  SyncValue,
} from "../../models/sync.model";
import {
  AuditLog,
  ConflictDetection,
  FieldChange,
  MergeResult,
} from "../../models/sync-config.model";
import { ConflictError } from "../../errors/sync.errors";
import { canonicalJson } from "../../utils/canonical-json";
import { isTimestampField, parseTimestamp } from "../../utils/timestamps";

/**
 * Bookkeeping fields that merges never copy from the remote side
 */
export const BOOKKEEPING_FIELDS: ReadonlySet<string> = new Set([
  "sync_status",
  "origin_id",
  "created_at",
  "updated_at",
]);

export interface ResolveOptions {
  /** Record supplied by the caller for `manual` resolution */
  manualRecord?: SyncFields;
  triggeredBy?: AuditLog["triggeredBy"];
  notes?: string;
}

export interface ResolvedConflict {
  resolution: ConflictResolution;
  auditLog: AuditLog;
}

export class ConflictResolver {
  constructor(
    private readonly originId: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Compare a remote record with the local copy. A conflict exists only
   * when the local copy carries unsynced changes and the data differs.
   */
  detect(local: SyncRecord | undefined, remote: SyncRecord): ConflictDetection {
    if (!local) {
      return { action: "insert", record: { ...remote, syncStatus: "synced" } };
    }

    if (local.syncStatus === "pending") {
      if (this.isEqual(local.fields, remote.fields)) {
        return { action: "skip" };
      }
      return { action: "conflict", localRecord: local, remoteRecord: remote };
    }

    if (remote.lastModified > local.lastModified) {
      return { action: "update", record: { ...remote, syncStatus: "synced" } };
    }
    return { action: "skip" };
  }

  createConflict(
    tableName: string,
    localRecord: SyncRecord,
    remoteRecord: SyncRecord,
  ): SyncConflict {
    const detectedAt = this.now();
    return {
      id: `${tableName}_${localRecord.id}_${detectedAt.getTime()}`,
      tableName,
      recordId: localRecord.id,
      localRecord,
      remoteRecord,
      detectedAt: detectedAt.toISOString(),
      kind: "bothModified",
    };
  }

  /**
   * Last-write-wins on `lastModified`. Remote wins only when strictly newer.
   */
  lastWriteWins(
    local: SyncRecord,
    remote: SyncRecord,
  ): ConflictStrategy.USE_LOCAL | ConflictStrategy.USE_REMOTE {
    return remote.lastModified > local.lastModified
      ? ConflictStrategy.USE_REMOTE
      : ConflictStrategy.USE_LOCAL;
  }

  /**
   * Resolve a conflict with `strategy`, or last-write-wins when omitted.
   * The resolved record is always marked pending so it syncs back out.
   */
  resolve(
    conflict: SyncConflict,
    strategy?: ConflictStrategy,
    options: ResolveOptions = {},
  ): ResolvedConflict {
    const { localRecord, remoteRecord } = conflict;
    const chosen = strategy ?? this.lastWriteWins(localRecord, remoteRecord);
    const resolvedAt = this.now();

    let fields: SyncFields;
    let changes: FieldChange[];

    switch (chosen) {
      case ConflictStrategy.USE_LOCAL:
        fields = structuredClone(localRecord.fields);
        changes = [];
        break;
      case ConflictStrategy.USE_REMOTE:
        fields = structuredClone(remoteRecord.fields);
        changes = this.diff(localRecord.fields, fields, "REMOTE", "remote record chosen");
        break;
      case ConflictStrategy.MERGE: {
        const merged = this.mergeRecords(localRecord, remoteRecord);
        fields = merged.record.fields;
        changes = merged.changes;
        break;
      }
      case ConflictStrategy.MANUAL:
        if (!options.manualRecord) {
          throw new ConflictError("invalidResolution", {
            message: "Manual resolution requires a resolved record",
            context: { conflictId: conflict.id },
          });
        }
        fields = structuredClone(options.manualRecord);
        changes = this.diff(localRecord.fields, fields, "MANUAL", "supplied by caller");
        break;
      default:
        throw new ConflictError("invalidResolution", {
          message: `Unknown resolution strategy: ${String(chosen)}`,
          context: { conflictId: conflict.id },
        });
    }

    const resolvedRecord: SyncRecord = {
      id: localRecord.id,
      fields,
      lastModified: resolvedAt.getTime(),
      syncStatus: "pending",
      originId: this.originId,
    };

    const resolution: ConflictResolution = {
      conflictId: conflict.id,
      strategy: chosen,
      resolvedRecord,
      resolvedAt: resolvedAt.toISOString(),
      notes: options.notes ?? (strategy ? undefined : "last-write-wins"),
    };

    const auditLog: AuditLog = {
      id: uuidv4(),
      conflictId: conflict.id,
      tableName: conflict.tableName,
      recordId: conflict.recordId,
      strategy: chosen,
      timestamp: resolvedAt,
      details: `Resolved ${conflict.tableName}/${conflict.recordId} using ${chosen}`,
      changes,
      triggeredBy: options.triggeredBy ?? "SYSTEM",
    };

    this.logger.info("Conflict resolved", { auditLog });
    return { resolution, auditLog };
  }

  /**
   * Field-level merge starting from the local record. Remote values fill
   * empty local fields; timestamp-like fields take the later value;
   * numeric fields take the larger value; everything else stays local.
   */
  mergeRecords(local: SyncRecord, remote: SyncRecord): MergeResult {
    const merged: SyncFields = structuredClone(local.fields);
    const changes: FieldChange[] = [];

    for (const [field, remoteValue] of Object.entries(remote.fields)) {
      if (BOOKKEEPING_FIELDS.has(field)) continue;

      const localValue = local.fields[field];
      if (this.isEqual(localValue, remoteValue)) continue;

      const adopt = (reason: string) => {
        merged[field] = structuredClone(remoteValue);
        changes.push({
          field,
          oldValue: localValue,
          newValue: remoteValue,
          source: "REMOTE",
          reason,
        });
      };

      if (this.isEmpty(localValue)) {
        if (!this.isEmpty(remoteValue)) adopt("local value was empty");
        continue;
      }

      if (isTimestampField(field)) {
        const localTime = parseTimestamp(localValue);
        const remoteTime = parseTimestamp(remoteValue);
        if (
          localTime !== undefined &&
          remoteTime !== undefined &&
          remoteTime > localTime
        ) {
          adopt("remote timestamp is later");
        }
        continue;
      }

      if (
        typeof localValue === "number" &&
        typeof remoteValue === "number" &&
        remoteValue > localValue
      ) {
        adopt("remote value is larger");
      }
    }

    return {
      record: {
        id: local.id,
        fields: merged,
        lastModified: this.now().getTime(),
        syncStatus: "pending",
        originId: this.originId,
      },
      changes,
    };
  }

  private diff(
    before: SyncFields,
    after: SyncFields,
    source: FieldChange["source"],
    reason: string,
  ): FieldChange[] {
    const fields = new Set([...Object.keys(before), ...Object.keys(after)]);
    const changes: FieldChange[] = [];
    for (const field of fields) {
      if (!this.isEqual(before[field], after[field])) {
        changes.push({
          field,
          oldValue: before[field],
          newValue: after[field],
          source,
          reason,
        });
      }
    }
    return changes;
  }

  private isEmpty(value: SyncValue | undefined): boolean {
    return (
      value === undefined ||
      value === null ||
      value === "" ||
      (Array.isArray(value) && value.length === 0)
    );
  }

  private isEqual(a: unknown, b: unknown): boolean {
    return canonicalJson(a) === canonicalJson(b);
  }
}
