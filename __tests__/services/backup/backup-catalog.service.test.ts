import { describe, expect, it } from "vitest";
import { RemoteFileDescriptor } from "../../../src/connectors/base-connector";
import {
  BackupCatalog,
  formatBytes,
  fromFileTimestamp,
  toFileTimestamp,
} from "../../../src/services/backup/backup-catalog.service";

const T0 = new Date("2024-03-01T10:00:00.000Z");
const catalog = new BackupCatalog("clinic-1");

const file = (name: string, size = 100): RemoteFileDescriptor => ({
  id: name,
  name,
  size,
  modifiedAt: T0,
});

describe("file timestamps", () => {
  it("replaces colons and parses back", () => {
    expect(toFileTimestamp(T0)).toBe("2024-03-01T10-00-00.000Z");
    expect(fromFileTimestamp("2024-03-01T10-00-00.000Z")).toEqual(T0);
    expect(fromFileTimestamp("2024-03-01T10-00-00Z")).toEqual(T0);
    expect(fromFileTimestamp("2024-03-01T10:00:00.000Z")).toBeUndefined();
  });
});

describe("formatBytes", () => {
  it("uses binary units", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
  });
});

describe("BackupCatalog", () => {
  it("names backups and sync blobs", () => {
    expect(catalog.backupFileName(T0)).toBe("clinic-1_2024-03-01T10-00-00.000Z.enc");
    expect(catalog.backupFileName(T0, "manual")).toBe(
      "clinic-1_manual_2024-03-01T10-00-00.000Z.enc",
    );
    expect(catalog.syncFileName("patients", T0)).toBe(
      "clinic_sync_clinic-1_patients_2024-03-01T10-00-00.000Z.enc",
    );
    expect(new BackupCatalog("clinic-1", "dental").syncFileName("visits", T0)).toBe(
      "dental_sync_clinic-1_visits_2024-03-01T10-00-00.000Z.enc",
    );
  });

  it("describes each kind of file", () => {
    expect(catalog.describe(file("clinic-1_2024-03-01T10-00-00.000Z.enc"))).toEqual({
      id: "clinic-1_2024-03-01T10-00-00.000Z.enc",
      name: "clinic-1_2024-03-01T10-00-00.000Z.enc",
      createdAt: T0,
      size: 100,
      tenantId: "clinic-1",
      originId: null,
      kind: "full",
    });
    expect(
      catalog.describe(file("clinic-1_incremental_2024-03-01T10-00-00.000Z.enc"))?.kind,
    ).toBe("incremental");
    expect(
      catalog.describe(file("clinic_sync_clinic-1_lab_results_2024-03-01T10-00-00.000Z.enc")),
    ).toMatchObject({ kind: "sync", table: "lab_results", createdAt: T0 });
  });

  it("ignores files of other tenants and unrelated files", () => {
    expect(catalog.describe(file("clinic-2_2024-03-01T10-00-00.000Z.enc"))).toBeUndefined();
    expect(catalog.describe(file("clinic-10_2024-03-01T10-00-00.000Z.enc"))).toBeUndefined();
    expect(catalog.describe(file("notes.txt"))).toBeUndefined();
    expect(catalog.describe(file("clinic-1_yesterday.enc"))).toBeUndefined();
  });

  it("lists descriptors newest first", () => {
    const described = catalog.describeAll([
      file("clinic-1_2024-02-01T10-00-00.000Z.enc"),
      file("readme.md"),
      file("clinic-1_manual_2024-03-01T10-00-00.000Z.enc"),
    ]);
    expect(described.map((d) => d.name)).toEqual([
      "clinic-1_manual_2024-03-01T10-00-00.000Z.enc",
      "clinic-1_2024-02-01T10-00-00.000Z.enc",
    ]);
  });

  it("summarises backups", () => {
    const stats = catalog.statistics(
      catalog.describeAll([
        file("clinic-1_2024-02-01T10-00-00.000Z.enc", 512),
        file("clinic-1_manual_2024-03-01T10-00-00.000Z.enc", 1024),
      ]),
    );

    expect(stats).toEqual({
      totalBackups: 2,
      totalSize: 1536,
      totalSizeHuman: "1.5 KB",
      oldest: new Date("2024-02-01T10:00:00.000Z"),
      newest: T0,
      byKind: { full: 1, incremental: 0, sync: 0, manual: 1 },
      byOrigin: { unknown: 2 },
    });
  });

  it("summarises an empty list", () => {
    expect(catalog.statistics([])).toMatchObject({
      totalBackups: 0,
      totalSizeHuman: "0 B",
      oldest: null,
      newest: null,
    });
  });
});
