import type { Logger } from "winston";
import { ProgressSteps, CircuitBreakerState } from "../../constants/SyncConstant";
import { ResilienceExecutor } from "../../executors/resilienceExecutor";
import {
  AuthenticationFailedError,
  ConflictError,
  ErrorCategory,
  IntegrityError,
  KeyStorageError,
  OperationError,
  StorageError,
  SyncError,
  classifyError,
  requiresReauth,
} from "../../errors/sync.errors";
import { StoredKey } from "../../models/encryption.model";
import {
  BackupDescriptor,
  BackupKind,
  ConflictResolution,
  ConflictStrategy,
  ProgressListener,
  SnapshotTables,
  StoredConflict,
  SyncConflict,
  SyncCounts,
  SyncFields,
  SyncMetadata,
  SyncOperation,
  SyncProgress,
  SyncRecord,
  SyncResult,
  SyncSnapshot,
  SyncState,
} from "../../models/sync.model";
import { AuditLog } from "../../models/sync-config.model";
import {
  RemoteFileDescriptor,
  StorageConnector,
  newestFile,
} from "../../connectors/base-connector";
import {
  CLOUD_SAVE_METADATA_KEY,
  RecordStore,
  emptySyncMetadata,
} from "../../stores/record-store";
import { canonicalJson } from "../../utils/canonical-json";
import { KeyManager } from "../encryption/key-manager.service";
import { EncryptionCodec } from "../encryption/encryption.service";
import { BackupCatalog, BackupStatistics } from "../backup/backup-catalog.service";
import {
  RetentionPolicyConfig,
  RetentionPresets,
  prune,
} from "../backup/retention-policy";
import { FlushSummary, OfflineQueue } from "../offline/offline-queue.service";
import { ConflictResolver } from "./conflict-resolver.service";
import {
  buildSnapshot,
  parseSnapshot,
  snapshotRecordCount,
  validateSnapshotIntegrity,
} from "./snapshot";

type ActiveState = Exclude<SyncState, "idle" | "error">;

type Checkpoint = { readonly fraction: number; readonly step: string };

export type ReconcileDecision = "restore" | "backup";

export interface SyncEngineOptions {
  tenantId: string;
  originId: string;
  tables: readonly string[];
  retention?: RetentionPolicyConfig;
  /** Resolve conflicts by last-write-wins during sync instead of deferring them */
  autoResolve?: boolean;
  filePrefix?: string;
  now?: () => Date;
}

export interface SyncEngineDependencies {
  keyManager: KeyManager;
  codec: EncryptionCodec;
  store: RecordStore;
  storage: StorageConnector;
  resilience: ResilienceExecutor;
  logger: Logger;
  offlineQueue?: OfflineQueue;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface BackupOptions extends OperationOptions {
  kind?: Exclude<BackupKind, "sync">;
}

export interface RestoreOptions extends OperationOptions {
  backupId?: string;
}

export interface ResolveConflictOptions {
  manualRecord?: SyncFields;
  triggeredBy?: AuditLog["triggeredBy"];
  notes?: string;
}

export interface SyncStatus {
  tenantId: string;
  originId: string;
  state: SyncState;
  progress: SyncProgress | null;
  lastResult: SyncResult | null;
  localSaveTime: string | null;
  tables: SyncMetadata[];
  circuitBreaker: CircuitBreakerState;
  pendingOperations: number;
  pendingConflicts: number;
}

export interface ValidBackup {
  descriptor: BackupDescriptor;
  snapshot: SyncSnapshot;
}

interface OperationContext {
  operation: SyncOperation;
  signal?: AbortSignal;
  counts: SyncCounts;
  conflictIds: string[];
  uploaded: Set<string>;
  metadata: Record<string, unknown>;
}

interface Attempt {
  result: SyncResult;
  error?: SyncError;
}

/**
 * Decide what a one-click save does: restore when the remote copy is newer
 * than the last local save (or nothing was saved locally yet), otherwise
 * back up. With no remote copy there is nothing to restore.
 */
export const decideReconcile = (
  localSaveTime: number | null,
  remoteModifiedAt: Date | undefined,
): ReconcileDecision => {
  if (!remoteModifiedAt) return "backup";
  if (localSaveTime === null) return "restore";
  return remoteModifiedAt.getTime() > localSaveTime ? "restore" : "backup";
};

const isBackupBlob = (descriptor: BackupDescriptor): boolean =>
  descriptor.kind !== "sync";

/**
 * Orchestrates sync, backup, restore and reconcile for one tenant.
 * One operation runs at a time; every public operation reports a
 * `SyncResult` instead of throwing.
 */
export class SyncEngine {
  readonly tenantId: string;
  readonly originId: string;
  readonly tables: readonly string[];

  private readonly keyManager: KeyManager;
  private readonly codec: EncryptionCodec;
  private readonly store: RecordStore;
  private readonly storage: StorageConnector;
  private readonly resilience: ResilienceExecutor;
  private readonly logger: Logger;
  private readonly offlineQueue?: OfflineQueue;
  private readonly retention: RetentionPolicyConfig;
  private readonly autoResolve: boolean;
  private readonly now: () => Date;
  private readonly catalog: BackupCatalog;
  private readonly resolver: ConflictResolver;

  private state: SyncState = "idle";
  private progress: SyncProgress | null = null;
  private lastResult: SyncResult | null = null;
  private readonly listeners = new Set<ProgressListener>();

  constructor(options: SyncEngineOptions, deps: SyncEngineDependencies) {
    this.tenantId = options.tenantId;
    this.originId = options.originId;
    this.tables = [...options.tables];
    this.retention = options.retention ?? RetentionPresets.default;
    this.autoResolve = options.autoResolve ?? false;
    this.now = options.now ?? (() => new Date());

    this.keyManager = deps.keyManager;
    this.codec = deps.codec;
    this.store = deps.store;
    this.storage = deps.storage;
    this.resilience = deps.resilience;
    this.logger = deps.logger;
    this.offlineQueue = deps.offlineQueue;

    this.catalog = new BackupCatalog(this.tenantId, options.filePrefix);
    this.resolver = new ConflictResolver(this.originId, this.logger, this.now);
  }

  /* =======================
     Operations
  ======================= */

  async fullSync(options: OperationOptions = {}): Promise<SyncResult> {
    const { result } = await this.attempt("fullSync", "syncing", options, (ctx) =>
      this.performFullSync(ctx),
    );
    return result;
  }

  /**
   * Upload only local changes since the oldest per-table sync point, then
   * apply the latest remote snapshot. Falls back to a full sync when any
   * table has never been synced.
   */
  async incrementalSync(options: OperationOptions = {}): Promise<SyncResult> {
    const { result } = await this.attempt(
      "incrementalSync",
      "syncing",
      options,
      async (ctx) => {
        this.report(ctx, ProgressSteps.INCREMENTAL_SYNC.PREPARE);
        const since = await this.oldestSyncPoint();
        if (since === null) {
          this.logger.info("No previous sync point, running full sync", {
            tenantId: this.tenantId,
          });
          ctx.metadata.fallbackToFullSync = true;
          await this.performFullSync(ctx);
          return;
        }

        ctx.metadata.since = new Date(since).toISOString();
        this.report(ctx, ProgressSteps.INCREMENTAL_SYNC.UPLOAD);
        await this.uploadChanges(ctx, since);
        // The latest remote snapshot is applied whole: a record changed offline
        // on another device can carry a time before this device's sync point
        this.report(ctx, ProgressSteps.INCREMENTAL_SYNC.DOWNLOAD);
        await this.downloadChanges(ctx);
        this.report(ctx, ProgressSteps.INCREMENTAL_SYNC.METADATA);
        await this.updateTableMetadata({ lastSyncTimestamp: this.now().getTime() });
      },
    );
    return result;
  }

  async createBackup(options: BackupOptions = {}): Promise<SyncResult> {
    const kind = options.kind ?? "full";
    const { result, error } = await this.attempt("backup", "backingUp", options, (ctx) =>
      this.performBackup(ctx, kind),
    );

    if (error?.category === ErrorCategory.NETWORK && this.offlineQueue) {
      this.offlineQueue.enqueue(`backup:${kind}`, () => this.queuedBackup(kind));
      result.metadata.queued = true;
    }
    return result;
  }

  async restore(options: RestoreOptions = {}): Promise<SyncResult> {
    const { result } = await this.attempt("restore", "restoring", options, (ctx) =>
      this.performRestore(ctx, options.backupId),
    );
    return result;
  }

  /**
   * One-click save: restore when the remote copy is newer, otherwise back up.
   */
  async reconcile(options: OperationOptions = {}): Promise<SyncResult> {
    const { result } = await this.attempt("reconcile", "syncing", options, async (ctx) => {
      this.report(ctx, ProgressSteps.RECONCILE.DECIDE);
      const files = await this.remote("list remote files", ctx, () => this.storage.list());
      const latest = this.latestBackupFile(files);
      const localSaveTime = await this.localSaveTime();
      const decision = decideReconcile(localSaveTime, latest?.modifiedAt);

      ctx.metadata.decision = decision;
      ctx.metadata.localSaveTime =
        localSaveTime === null ? null : new Date(localSaveTime).toISOString();
      ctx.metadata.remoteModifiedAt = latest?.modifiedAt.toISOString() ?? null;
      this.logger.info("Reconcile decision", { tenantId: this.tenantId, ...ctx.metadata });

      if (decision === "restore" && latest) {
        this.state = "restoring";
        await this.performRestore(ctx, latest.id);
      } else {
        this.state = "backingUp";
        await this.performBackup(ctx, "full");
      }
    });
    return result;
  }

  /**
   * Apply a resolution to a detected conflict. Resolving the same conflict
   * again with the same strategy returns the stored resolution unchanged.
   */
  async resolveConflict(
    conflictId: string,
    strategy?: ConflictStrategy,
    options: ResolveConflictOptions = {},
  ): Promise<SyncResult> {
    const { result } = await this.attempt("resolveConflict", "syncing", {}, async (ctx) => {
      const cacheKey = `${strategy ?? "default"}:${
        options.manualRecord ? canonicalJson(options.manualRecord) : ""
      }`;
      const entry = await this.store.getConflict(conflictId);
      const cached = entry?.resolutions[cacheKey];
      if (cached) {
        ctx.metadata.resolution = cached;
        ctx.metadata.cached = true;
        return;
      }

      if (!entry || entry.status === "superseded") {
        throw new ConflictError("unresolvable", {
          message: entry
            ? `Conflict was superseded by a newer one: ${conflictId}`
            : `Unknown conflict: ${conflictId}`,
          context: { conflictId },
        });
      }

      const { resolution } = this.resolver.resolve(entry.conflict, strategy, {
        manualRecord: options.manualRecord,
        triggeredBy: options.triggeredBy ?? "USER",
        notes: options.notes,
      });
      await this.applyResolution(entry, resolution, cacheKey);
      ctx.counts.updated++;
      ctx.metadata.resolution = resolution;
    });
    return result;
  }

  /**
   * Resolve every pending conflict with `strategy`, or last-write-wins when
   * omitted. Conflicts that fail to resolve stay pending and are listed in
   * `conflictIds` of a partial result.
   */
  async resolveAllConflicts(
    strategy?: Exclude<ConflictStrategy, ConflictStrategy.MANUAL>,
    options: Omit<ResolveConflictOptions, "manualRecord"> = {},
  ): Promise<SyncResult> {
    const { result } = await this.attempt("resolveConflicts", "syncing", {}, async (ctx) => {
      const pending = await this.store.listConflicts("pending");
      const resolved: string[] = [];
      ctx.counts.conflicts = pending.length;

      for (const entry of pending) {
        try {
          const { resolution } = this.resolver.resolve(entry.conflict, strategy, {
            triggeredBy: options.triggeredBy ?? "USER",
            notes: options.notes,
          });
          await this.applyResolution(entry, resolution, `${strategy ?? "default"}:`);
          ctx.counts.updated++;
          resolved.push(entry.conflict.id);
        } catch (error) {
          const classified = classifyError(error);
          ctx.conflictIds.push(entry.conflict.id);
          this.logger.warn("Conflict left unresolved", {
            conflictId: entry.conflict.id,
            code: classified.code,
            error: classified.message,
          });
        }
      }
      ctx.metadata.resolved = resolved;
    });
    return result;
  }

  /**
   * Delete remote backups the retention policy no longer keeps.
   */
  async pruneBackups(options: OperationOptions = {}): Promise<SyncResult> {
    const { result } = await this.attempt("pruneBackups", "backingUp", options, async (ctx) => {
      this.report(ctx, ProgressSteps.PRUNE.LIST);
      const files = await this.remote("list remote files", ctx, () => this.storage.list());
      this.report(ctx, ProgressSteps.PRUNE.DELETE);
      ctx.metadata.deleted = await this.applyRetention(ctx, files);
    });
    return result;
  }

  /* =======================
     Queries
  ======================= */

  async listBackups(signal?: AbortSignal): Promise<BackupDescriptor[]> {
    const files = await this.resilience.execute(() => this.storage.list(), {
      context: "list remote files",
      signal,
    });
    return this.catalog.describeAll(files);
  }

  async getBackupStatistics(signal?: AbortSignal): Promise<BackupStatistics> {
    return this.catalog.statistics(await this.listBackups(signal));
  }

  /**
   * The backup closest in time to `target` that downloads, decrypts and
   * passes its integrity check.
   */
  async findNearestValidBackup(
    target: Date,
    signal?: AbortSignal,
  ): Promise<ValidBackup | undefined> {
    const candidates = (await this.listBackups(signal))
      .filter(isBackupBlob)
      .sort(
        (a, b) =>
          Math.abs(a.createdAt.getTime() - target.getTime()) -
          Math.abs(b.createdAt.getTime() - target.getTime()),
      );

    for (const descriptor of candidates) {
      try {
        const bytes = await this.resilience.execute(
          () => this.storage.download(descriptor.id),
          { context: `download ${descriptor.name}`, signal },
        );
        return { descriptor, snapshot: await this.openSnapshot(bytes) };
      } catch (error) {
        const classified = classifyError(error);
        if (classified.kind === "cancelled") throw classified;
        this.logger.warn("Skipping unusable backup", {
          backupId: descriptor.id,
          code: classified.code,
        });
      }
    }
    return undefined;
  }

  async listConflicts(): Promise<SyncConflict[]> {
    return (await this.store.listConflicts("pending")).map((entry) => entry.conflict);
  }

  getState(): SyncState {
    return this.state;
  }

  async getStatus(): Promise<SyncStatus> {
    const tables: SyncMetadata[] = [];
    for (const table of this.tables) {
      tables.push((await this.store.getSyncMetadata(table)) ?? emptySyncMetadata(table));
    }
    const localSaveTime = await this.localSaveTime();

    return {
      tenantId: this.tenantId,
      originId: this.originId,
      state: this.state,
      progress: this.progress,
      lastResult: this.lastResult,
      localSaveTime: localSaveTime === null ? null : new Date(localSaveTime).toISOString(),
      tables,
      circuitBreaker: this.resilience.getState(),
      pendingOperations: this.offlineQueue?.size ?? 0,
      pendingConflicts: (await this.store.listConflicts("pending")).length,
    };
  }

  onProgress(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async flushOfflineQueue(): Promise<FlushSummary> {
    if (!this.offlineQueue) return { processed: 0, requeued: 0, dropped: 0 };
    return this.offlineQueue.flush();
  }

  /* =======================
     Operation steps
  ======================= */

  private async performFullSync(ctx: OperationContext): Promise<void> {
    this.report(ctx, ProgressSteps.FULL_SYNC.UPLOAD);
    await this.uploadChanges(ctx, 0);
    this.report(ctx, ProgressSteps.FULL_SYNC.DOWNLOAD);
    await this.downloadChanges(ctx);
    this.report(ctx, ProgressSteps.FULL_SYNC.METADATA);
    await this.updateTableMetadata({ lastSyncTimestamp: this.now().getTime() });
  }

  private async uploadChanges(ctx: OperationContext, since: number): Promise<void> {
    for (const table of this.tables) {
      this.throwIfCancelled(ctx);
      const changes = await this.store.changedSince(table, since);
      if (changes.length === 0) continue;

      const createdAt = this.now();
      const snapshot = buildSnapshot({
        tenantId: this.tenantId,
        originId: this.originId,
        tables: { [table]: changes },
        metadata: { kind: "sync", table },
        now: createdAt,
      });
      const bytes = await this.seal(snapshot);
      const name = this.catalog.syncFileName(table, createdAt);

      const remoteId = await this.remote(`upload ${name}`, ctx, () =>
        this.storage.upload(name, bytes),
      );
      ctx.uploaded.add(remoteId);

      // Only acknowledged uploads become synced, and only as uploaded
      await this.store.markSynced(
        table,
        changes.map(({ id, lastModified }) => ({ id, lastModified })),
      );
      ctx.counts.uploaded += changes.length;
      this.logger.info("Uploaded table changes", {
        table,
        records: changes.length,
        file: name,
      });
    }
  }

  private async downloadChanges(ctx: OperationContext): Promise<void> {
    const files = await this.remote("list remote files", ctx, () => this.storage.list());
    const latest = this.catalog
      .describeAll(files)
      .find((descriptor) => !ctx.uploaded.has(descriptor.id));
    if (!latest) {
      ctx.metadata.remoteSnapshot = null;
      return;
    }

    const bytes = await this.remote(`download ${latest.name}`, ctx, () =>
      this.storage.download(latest.id),
    );
    const snapshot = await this.openSnapshot(bytes);
    ctx.metadata.remoteSnapshot = latest.name;
    ctx.counts.downloaded += snapshotRecordCount(snapshot);
    await this.importSnapshot(ctx, snapshot);
  }

  private async performBackup(
    ctx: OperationContext,
    kind: Exclude<BackupKind, "sync">,
  ): Promise<void> {
    this.report(ctx, ProgressSteps.BACKUP.EXPORT);
    const tables: SnapshotTables = {};
    for (const table of this.tables) {
      this.throwIfCancelled(ctx);
      tables[table] = await this.store.exportTable(table);
    }

    this.report(ctx, ProgressSteps.BACKUP.PREPARE);
    const createdAt = this.now();
    const snapshot = buildSnapshot({
      tenantId: this.tenantId,
      originId: this.originId,
      tables,
      metadata: { kind },
      now: createdAt,
    });
    const recordCount = snapshotRecordCount(snapshot);

    this.report(ctx, ProgressSteps.BACKUP.ENCRYPT);
    const bytes = await this.seal(snapshot);

    this.report(ctx, ProgressSteps.BACKUP.UPLOAD);
    const name = this.catalog.backupFileName(createdAt, kind);
    const remoteId = await this.remote(`upload ${name}`, ctx, () =>
      this.storage.upload(name, bytes),
    );
    ctx.uploaded.add(remoteId);
    ctx.counts.uploaded += recordCount;
    ctx.metadata.backup = { id: remoteId, name, size: bytes.length, records: recordCount };
    this.logger.info("Backup uploaded", { tenantId: this.tenantId, name, records: recordCount });

    this.report(ctx, ProgressSteps.BACKUP.CLEANUP);
    let savedAt = createdAt.getTime();
    try {
      const files = await this.remote("list remote files", ctx, () => this.storage.list());
      const uploadedFile = files.find((file) => file.id === remoteId);
      if (uploadedFile) savedAt = Math.max(savedAt, uploadedFile.modifiedAt.getTime());
      ctx.metadata.deleted = await this.applyRetention(ctx, files);
    } catch (error) {
      const classified = classifyError(error);
      if (classified.kind === "cancelled") throw classified;
      this.logger.warn("Backup retention cleanup failed", {
        code: classified.code,
        error: classified.message,
      });
    }

    await this.updateTableMetadata({ lastBackupTimestamp: createdAt.getTime() });
    await this.recordLocalSave(savedAt);
  }

  private async performRestore(ctx: OperationContext, backupId?: string): Promise<void> {
    this.report(ctx, ProgressSteps.RESTORE.DOWNLOAD);
    const files = await this.remote("list remote files", ctx, () => this.storage.list());
    const file = backupId
      ? files.find((candidate) => candidate.id === backupId)
      : this.latestBackupFile(files);
    if (!file) {
      throw new StorageError("notFound", {
        message: backupId ? `Backup not found: ${backupId}` : "No backup available to restore",
        context: { backupId },
      });
    }

    const bytes = await this.remote(`download ${file.name}`, ctx, () =>
      this.storage.download(file.id),
    );

    this.report(ctx, ProgressSteps.RESTORE.DECRYPT);
    const snapshot = await this.decryptSnapshot(bytes);

    this.report(ctx, ProgressSteps.RESTORE.VALIDATE);
    this.assertIntegrity(snapshot);
    ctx.counts.downloaded += snapshotRecordCount(snapshot);
    ctx.metadata.restoredFrom = { id: file.id, name: file.name, timestamp: snapshot.timestamp };

    this.report(ctx, ProgressSteps.RESTORE.IMPORT);
    await this.importSnapshot(ctx, snapshot);

    this.report(ctx, ProgressSteps.RESTORE.METADATA);
    const now = this.now().getTime();
    await this.updateTableMetadata({ lastSyncTimestamp: now });
    await this.recordLocalSave(Math.max(now, file.modifiedAt.getTime()));
  }

  private async queuedBackup(kind: Exclude<BackupKind, "sync">): Promise<void> {
    const { error } = await this.attempt("backup", "backingUp", {}, (ctx) =>
      this.performBackup(ctx, kind),
    );
    if (error) throw error;
  }

  /**
   * Merge a snapshot into the local store through conflict detection.
   * Records already seen are skipped by detection.
   */
  private async importSnapshot(ctx: OperationContext, snapshot: SyncSnapshot): Promise<void> {
    for (const [table, records] of Object.entries(snapshot.tables)) {
      if (!this.tables.includes(table)) {
        this.logger.warn("Ignoring table that is not sync-enabled", { table });
        continue;
      }
      this.throwIfCancelled(ctx);

      for (const remote of records) {
        const local = await this.store.getById(table, remote.id);
        const detection = this.resolver.detect(local, remote);
        switch (detection.action) {
          case "insert":
            await this.store.insert(table, detection.record);
            ctx.counts.inserted++;
            break;
          case "update":
            await this.store.update(table, remote.id, detection.record);
            ctx.counts.updated++;
            break;
          case "conflict":
            await this.handleConflict(ctx, table, detection.localRecord, detection.remoteRecord);
            break;
          case "skip":
            break;
        }
      }
    }
  }

  private async handleConflict(
    ctx: OperationContext,
    table: string,
    local: SyncRecord,
    remote: SyncRecord,
  ): Promise<void> {
    ctx.counts.conflicts++;
    const conflict = this.resolver.createConflict(table, local, remote);

    // A newer conflict on the same record supersedes the older one
    for (const existing of await this.store.listConflicts("pending")) {
      if (existing.conflict.tableName === table && existing.conflict.recordId === local.id) {
        await this.store.saveConflict({ ...existing, status: "superseded" });
      }
    }

    const entry: StoredConflict = { conflict, status: "pending", resolutions: {} };
    if (this.autoResolve) {
      const { resolution } = this.resolver.resolve(conflict, undefined, {
        triggeredBy: "SYSTEM",
      });
      await this.applyResolution(entry, resolution, "default:");
      return;
    }

    await this.store.saveConflict(entry);
    ctx.conflictIds.push(conflict.id);
    this.logger.warn("Conflict deferred for resolution", {
      conflictId: conflict.id,
      table,
      recordId: local.id,
    });
  }

  private async applyResolution(
    entry: StoredConflict,
    resolution: ConflictResolution,
    cacheKey: string,
  ): Promise<void> {
    const { conflict } = entry;
    await this.store.update(conflict.tableName, conflict.recordId, resolution.resolvedRecord);
    await this.store.saveConflict({
      conflict,
      status: "resolved",
      resolutions: { ...entry.resolutions, [cacheKey]: resolution },
    });
  }

  /**
   * Apply the retention policy to full backups and, separately, to the
   * sync blobs of each table. Deletion failures are logged and skipped.
   */
  private async applyRetention(
    ctx: OperationContext,
    files: readonly RemoteFileDescriptor[],
  ): Promise<number> {
    const descriptors = this.catalog.describeAll(files);
    const groups = new Map<string, BackupDescriptor[]>();
    for (const descriptor of descriptors) {
      const key = descriptor.kind === "sync" ? `sync:${descriptor.table ?? ""}` : "backup";
      groups.set(key, [...(groups.get(key) ?? []), descriptor]);
    }

    const now = this.now();
    let deleted = 0;
    for (const group of groups.values()) {
      for (const doomed of prune(group, this.retention, now)) {
        this.throwIfCancelled(ctx);
        try {
          await this.remote(`delete ${doomed.name}`, ctx, () => this.storage.delete(doomed.id));
          deleted++;
        } catch (error) {
          const classified = classifyError(error);
          if (classified.kind === "cancelled") throw classified;
          this.logger.warn("Failed to delete expired backup", {
            backupId: doomed.id,
            code: classified.code,
          });
        }
      }
    }

    if (deleted > 0) {
      this.logger.info("Expired backups deleted", { tenantId: this.tenantId, deleted });
    }
    return deleted;
  }

  /* =======================
     Encryption
  ======================= */

  private async seal(snapshot: SyncSnapshot): Promise<Buffer> {
    const key = await this.writeKey();
    const payload = await this.codec.encrypt(snapshot, key.material, key.metadata.keyId);
    return this.codec.serialize(payload);
  }

  private async writeKey(): Promise<StoredKey> {
    const keyId = await this.keyManager.deriveAndStoreKey(this.tenantId);
    const key = await this.keyManager.getKey(keyId);
    if (!key) {
      throw new KeyStorageError("notFound", {
        message: `Active key ${keyId} could not be loaded`,
        context: { keyId },
      });
    }
    return key;
  }

  private async openSnapshot(bytes: Buffer): Promise<SyncSnapshot> {
    const snapshot = await this.decryptSnapshot(bytes);
    this.assertIntegrity(snapshot);
    return snapshot;
  }

  /**
   * Decrypt with the key named by the payload, then every other key of
   * the tenant, then the legacy derivation.
   */
  private async decryptSnapshot(bytes: Buffer): Promise<SyncSnapshot> {
    const payload = this.codec.parse(bytes);
    const candidates = await this.keyManager.candidateKeys(this.tenantId, payload.keyId);

    let lastFailure: AuthenticationFailedError | undefined;
    for (const candidate of candidates) {
      try {
        const plaintext = await this.codec.decrypt(payload, candidate.material);
        if (candidate.legacy) {
          this.logger.warn("Snapshot decrypted with legacy tenant key", {
            tenantId: this.tenantId,
          });
        }
        return parseSnapshot(plaintext);
      } catch (error) {
        if (!(error instanceof AuthenticationFailedError)) throw error;
        lastFailure = error;
      }
    }

    throw lastFailure ?? new AuthenticationFailedError();
  }

  private assertIntegrity(snapshot: SyncSnapshot): void {
    if (snapshot.tenantId !== this.tenantId) {
      throw new IntegrityError("corruptedData", {
        message: `Snapshot belongs to tenant ${snapshot.tenantId}`,
        context: { expected: this.tenantId, actual: snapshot.tenantId },
      });
    }
    if (!validateSnapshotIntegrity(snapshot)) {
      throw new IntegrityError("corruptedData", {
        message: "Snapshot checksum does not match its contents",
        context: { timestamp: snapshot.timestamp },
      });
    }
  }

  /* =======================
     Metadata
  ======================= */

  private async oldestSyncPoint(): Promise<number | null> {
    let oldest: number | null = null;
    for (const table of this.tables) {
      const metadata = await this.store.getSyncMetadata(table);
      if (!metadata || metadata.lastSyncTimestamp === null) return null;
      oldest =
        oldest === null
          ? metadata.lastSyncTimestamp
          : Math.min(oldest, metadata.lastSyncTimestamp);
    }
    return oldest;
  }

  private async updateTableMetadata(
    changes: Partial<Pick<SyncMetadata, "lastSyncTimestamp" | "lastBackupTimestamp">>,
  ): Promise<void> {
    for (const table of this.tables) {
      const current = (await this.store.getSyncMetadata(table)) ?? emptySyncMetadata(table);
      await this.store.setSyncMetadata(table, {
        ...current,
        ...changes,
        pendingChangeCount: await this.store.countPending(table),
        lastOriginId: this.originId,
      });
    }
  }

  private async localSaveTime(): Promise<number | null> {
    const metadata = await this.store.getSyncMetadata(CLOUD_SAVE_METADATA_KEY);
    return metadata?.lastBackupTimestamp ?? null;
  }

  private async recordLocalSave(savedAt: number): Promise<void> {
    await this.store.setSyncMetadata(CLOUD_SAVE_METADATA_KEY, {
      ...emptySyncMetadata(CLOUD_SAVE_METADATA_KEY),
      lastBackupTimestamp: savedAt,
      lastOriginId: this.originId,
    });
  }

  private latestBackupFile(
    files: readonly RemoteFileDescriptor[],
  ): RemoteFileDescriptor | undefined {
    return newestFile(
      files.filter((file) => {
        const descriptor = this.catalog.describe(file);
        return descriptor !== undefined && isBackupBlob(descriptor);
      }),
    );
  }

  /* =======================
     Plumbing
  ======================= */

  private async attempt(
    operation: SyncOperation,
    state: ActiveState,
    options: OperationOptions,
    body: (ctx: OperationContext) => Promise<void>,
  ): Promise<Attempt> {
    const startedAt = this.now();
    const ctx: OperationContext = {
      operation,
      signal: options.signal,
      counts: { uploaded: 0, downloaded: 0, inserted: 0, updated: 0, conflicts: 0 },
      conflictIds: [],
      uploaded: new Set(),
      metadata: {},
    };

    if (this.state !== "idle") {
      const error = new OperationError("alreadyInProgress", {
        message: `Cannot start ${operation} while engine is ${this.state}`,
        context: { state: this.state },
      });
      this.logger.warn("Operation rejected", { operation, state: this.state });
      return { result: this.buildResult(ctx, startedAt, error), error };
    }

    this.state = state;
    this.progress = null;
    this.logger.info("Sync operation started", { operation, tenantId: this.tenantId });

    try {
      this.throwIfCancelled(ctx);
      await body(ctx);
      this.report(ctx, ProgressSteps.DONE);
      const result = this.buildResult(ctx, startedAt);
      this.lastResult = result;
      this.logger.info("Sync operation finished", {
        operation,
        status: result.status,
        durationMs: result.durationMs,
        counts: result.counts,
      });
      return { result };
    } catch (error) {
      const classified = classifyError(error);
      const result = this.buildResult(ctx, startedAt, classified);
      this.lastResult = result;
      if (result.status === "cancelled") {
        this.logger.warn("Sync operation cancelled", { operation });
      } else {
        this.state = "error";
        this.logger.error("Sync operation failed", {
          operation,
          error: classified.toJSON(),
        });
      }
      return { result, error: classified };
    } finally {
      this.state = "idle";
    }
  }

  private buildResult(
    ctx: OperationContext,
    startedAt: Date,
    error?: SyncError,
  ): SyncResult {
    let status: SyncResult["status"];
    if (error) {
      status =
        error.category === ErrorCategory.OPERATION && error.kind === "cancelled"
          ? "cancelled"
          : "failure";
    } else {
      status = ctx.conflictIds.length > 0 ? "partial" : "success";
    }

    return {
      operation: ctx.operation,
      status,
      startedAt: startedAt.toISOString(),
      durationMs: Math.max(0, this.now().getTime() - startedAt.getTime()),
      counts: { ...ctx.counts },
      conflictIds: [...ctx.conflictIds],
      errorCode: error?.code,
      errorMessage: error?.message,
      requiresReauth: error ? requiresReauth(error) : false,
      metadata: ctx.metadata,
    };
  }

  private async remote<T>(
    label: string,
    ctx: OperationContext,
    fn: () => Promise<T>,
  ): Promise<T> {
    this.throwIfCancelled(ctx);
    return this.resilience.execute(() => fn(), { context: label, signal: ctx.signal });
  }

  private throwIfCancelled(ctx: OperationContext): void {
    if (ctx.signal?.aborted) {
      throw new OperationError("cancelled", {
        message: `${ctx.operation} was cancelled`,
      });
    }
  }

  /**
   * Progress never moves backwards within an operation
   */
  private report(ctx: OperationContext, checkpoint: Checkpoint): void {
    if (this.progress && this.progress.operation === ctx.operation) {
      if (checkpoint.fraction < this.progress.fraction) return;
    }
    const progress: SyncProgress = {
      operation: ctx.operation,
      fraction: checkpoint.fraction,
      step: checkpoint.step,
    };
    this.progress = progress;
    for (const listener of this.listeners) {
      try {
        listener(progress);
      } catch (error) {
        this.logger.warn("Progress listener failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
