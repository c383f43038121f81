import { SyncDefaults } from "../../constants/SyncConstant";
import { BackupDescriptor, BackupKind } from "../../models/sync.model";
import { RemoteFileDescriptor } from "../../connectors/base-connector";

const FILE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})(\.\d{3})?Z$/;

export interface BackupStatistics {
  totalBackups: number;
  totalSize: number;
  totalSizeHuman: string;
  oldest: Date | null;
  newest: Date | null;
  byKind: Record<BackupKind, number>;
  byOrigin: Record<string, number>;
}

/**
 * ISO-8601 with ':' replaced, safe in file names
 */
export const toFileTimestamp = (date: Date): string =>
  date.toISOString().replace(/:/g, "-");

export const fromFileTimestamp = (value: string): Date | undefined => {
  const match = FILE_TIMESTAMP.exec(value);
  if (!match) return undefined;
  const [, day, hours, minutes, seconds, millis] = match;
  const parsed = new Date(`${day}T${hours}:${minutes}:${seconds}${millis ?? ""}Z`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

export const formatBytes = (bytes: number): string => {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${unit === 0 ? value : value.toFixed(1)} ${units[unit]}`;
};

/**
 * Names and recognizes the remote blobs of one tenant.
 *
 * - full:     `{tenant}_{timestamp}.enc`
 * - manual:   `{tenant}_manual_{timestamp}.enc`
 * - incremental: `{tenant}_incremental_{timestamp}.enc`
 * - sync:     `{prefix}_sync_{tenant}_{table}_{timestamp}.enc`
 */
export class BackupCatalog {
  private readonly extension = SyncDefaults.BACKUP_EXTENSION;

  constructor(
    readonly tenantId: string,
    private readonly prefix: string = SyncDefaults.SYNC_FILE_PREFIX,
  ) {}

  backupFileName(createdAt: Date, kind: Exclude<BackupKind, "sync"> = "full"): string {
    const marker = kind === "full" ? "" : `${kind}_`;
    return `${this.tenantId}_${marker}${toFileTimestamp(createdAt)}${this.extension}`;
  }

  syncFileName(table: string, createdAt: Date): string {
    return `${this.prefix}_sync_${this.tenantId}_${table}_${toFileTimestamp(createdAt)}${this.extension}`;
  }

  /**
   * Descriptor for a remote file of this tenant, or undefined for
   * anything else in the folder.
   */
  describe(file: RemoteFileDescriptor): BackupDescriptor | undefined {
    if (!file.name.endsWith(this.extension)) return undefined;
    const stem = file.name.slice(0, -this.extension.length);

    const syncPrefix = `${this.prefix}_sync_${this.tenantId}_`;
    if (stem.startsWith(syncPrefix)) {
      const rest = stem.slice(syncPrefix.length);
      const split = rest.lastIndexOf("_");
      if (split <= 0) return undefined;
      return this.descriptor(file, "sync", rest.slice(split + 1), rest.slice(0, split));
    }

    const backupPrefix = `${this.tenantId}_`;
    if (!stem.startsWith(backupPrefix)) return undefined;
    const rest = stem.slice(backupPrefix.length);

    for (const kind of ["manual", "incremental"] as const) {
      if (rest.startsWith(`${kind}_`)) {
        return this.descriptor(file, kind, rest.slice(kind.length + 1));
      }
    }
    return this.descriptor(file, "full", rest);
  }

  describeAll(files: readonly RemoteFileDescriptor[]): BackupDescriptor[] {
    return files
      .map((file) => this.describe(file))
      .filter((descriptor): descriptor is BackupDescriptor => descriptor !== undefined)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  statistics(descriptors: readonly BackupDescriptor[]): BackupStatistics {
    const byKind: Record<BackupKind, number> = {
      full: 0,
      incremental: 0,
      sync: 0,
      manual: 0,
    };
    const byOrigin: Record<string, number> = {};
    let totalSize = 0;
    let oldest: Date | null = null;
    let newest: Date | null = null;

    for (const descriptor of descriptors) {
      byKind[descriptor.kind]++;
      const origin = descriptor.originId ?? "unknown";
      byOrigin[origin] = (byOrigin[origin] ?? 0) + 1;
      totalSize += descriptor.size;
      if (!oldest || descriptor.createdAt < oldest) oldest = descriptor.createdAt;
      if (!newest || descriptor.createdAt > newest) newest = descriptor.createdAt;
    }

    return {
      totalBackups: descriptors.length,
      totalSize,
      totalSizeHuman: formatBytes(totalSize),
      oldest,
      newest,
      byKind,
      byOrigin,
    };
  }

  private descriptor(
    file: RemoteFileDescriptor,
    kind: BackupKind,
    timestamp: string,
    table?: string,
  ): BackupDescriptor | undefined {
    const createdAt = fromFileTimestamp(timestamp);
    if (!createdAt) return undefined;
    return {
      id: file.id,
      name: file.name,
      createdAt,
      size: file.size,
      tenantId: this.tenantId,
      originId: null,
      kind,
      ...(table ? { table } : {}),
    };
  }
}
