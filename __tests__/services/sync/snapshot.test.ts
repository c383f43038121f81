import { describe, expect, it } from "vitest";
import { IntegrityError } from "../../../src/errors/sync.errors";
import {
  buildSnapshot,
  parseSnapshot,
  snapshotRecordCount,
  validateSnapshotIntegrity,
} from "../../../src/services/sync/snapshot";

const build = () =>
  buildSnapshot({
    tenantId: "clinic-1",
    originId: "origin-a",
    tables: {
      patients: [
        {
          id: "p1",
          fields: { name: "Test Patient" },
          lastModified: 1709287200000,
          syncStatus: "pending",
          originId: "origin-a",
        },
      ],
      visits: [],
    },
    metadata: { kind: "full" },
    now: new Date("2024-03-01T10:00:00.000Z"),
  });

describe("snapshot", () => {
  it("builds a frozen snapshot with a valid checksum", () => {
    const snapshot = build();

    expect(snapshot.timestamp).toBe("2024-03-01T10:00:00.000Z");
    expect(snapshot.version).toBe(1);
    expect(snapshot.checksum).toMatch(/^[0-9a-f]{64}$/);
    expect(validateSnapshotIntegrity(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.tables)).toBe(true);
    expect(snapshotRecordCount(snapshot)).toBe(1);
  });

  it("detects changed records", () => {
    const snapshot = build();
    const tampered = {
      ...snapshot,
      tables: {
        ...snapshot.tables,
        patients: [{ ...snapshot.tables.patients[0], fields: { name: "Someone Else" } }],
      },
    };
    expect(validateSnapshotIntegrity(tampered)).toBe(false);
  });

  it("covers metadata with the checksum", () => {
    const snapshot = build();
    expect(validateSnapshotIntegrity({ ...snapshot, metadata: { kind: "manual" } })).toBe(false);
  });

  it("parses its own JSON form back to an equal, valid snapshot", () => {
    const snapshot = build();
    const parsed = parseSnapshot(JSON.parse(JSON.stringify(snapshot)));
    expect(parsed).toEqual(snapshot);
    expect(validateSnapshotIntegrity(parsed)).toBe(true);
  });

  it("normalises record timestamps and defaults", () => {
    const parsed = parseSnapshot({
      tenantId: "clinic-1",
      originId: "origin-a",
      timestamp: "2024-03-01T10:00:00.000Z",
      version: 1,
      checksum: "x",
      tables: {
        patients: [{ id: "p1", fields: {}, lastModified: "2024-03-01T10:00:00.000Z" }],
      },
    });

    expect(parsed.tables.patients[0]).toEqual({
      id: "p1",
      fields: {},
      lastModified: 1709287200000,
      syncStatus: "synced",
      originId: null,
    });
    expect(parsed.metadata).toEqual({});
  });

  it("rejects malformed snapshots", () => {
    expect(() => parseSnapshot({ tenantId: "clinic-1" })).toThrow(IntegrityError);
    expect(() => parseSnapshot("not an object")).toThrow(
      "Snapshot does not have the expected structure",
    );
  });

  it("rejects snapshots from a newer format", () => {
    const raw: unknown = JSON.parse(JSON.stringify(build()));
    let thrown: unknown;
    try {
      parseSnapshot(Object.assign({}, raw, { version: 2 }));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(IntegrityError);
    expect(thrown).toMatchObject({
      code: "INTEGRITY_VERSION_MISMATCH",
      message: "Snapshot version 2 is newer than supported version 1",
    });
  });
});
