import { describe, expect, it } from "vitest";
import { ConflictError } from "../../../src/errors/sync.errors";
import { ConflictStrategy, SyncRecord } from "../../../src/models/sync.model";
import { ConflictResolver } from "../../../src/services/sync/conflict-resolver.service";
import { createSilentLogger } from "../../../src/utils/logger";

const NOW = "2024-03-01T10:00:00.000Z";
const resolver = new ConflictResolver("origin-a", createSilentLogger(), () => new Date(NOW));

const local: SyncRecord = {
  id: "p1",
  fields: {
    name: "Local Name",
    balance: 10,
    lastVisitDate: "2024-02-01",
    phone: "",
    sync_status: "pending",
  },
  lastModified: 2000,
  syncStatus: "pending",
  originId: "origin-a",
};

const remote: SyncRecord = {
  id: "p1",
  fields: {
    name: "Remote Name",
    balance: 25,
    lastVisitDate: "2024-02-15",
    phone: "555-0100",
    sync_status: "synced",
    email: "patient@example.com",
  },
  lastModified: 1000,
  syncStatus: "synced",
  originId: "origin-b",
};

const conflict = resolver.createConflict("patients", local, remote);

describe("ConflictResolver", () => {
  describe("detect", () => {
    it("inserts records missing locally as synced", () => {
      expect(resolver.detect(undefined, { ...remote, syncStatus: "pending" })).toEqual({
        action: "insert",
        record: { ...remote, syncStatus: "synced" },
      });
    });

    it("flags a conflict when pending local data differs", () => {
      expect(resolver.detect(local, remote)).toEqual({
        action: "conflict",
        localRecord: local,
        remoteRecord: remote,
      });
    });

    it("skips pending local data equal to the remote copy", () => {
      expect(resolver.detect(local, { ...remote, fields: { ...local.fields } })).toEqual({
        action: "skip",
      });
    });

    it("updates synced records from newer remote copies only", () => {
      const synced: SyncRecord = { ...local, syncStatus: "synced", lastModified: 500 };
      expect(resolver.detect(synced, remote)).toEqual({
        action: "update",
        record: { ...remote, syncStatus: "synced" },
      });
      expect(resolver.detect({ ...synced, lastModified: 1000 }, remote)).toEqual({
        action: "skip",
      });
    });
  });

  it("names conflicts after table, record and detection time", () => {
    expect(conflict).toMatchObject({
      id: `patients_p1_${Date.parse(NOW)}`,
      tableName: "patients",
      recordId: "p1",
      detectedAt: NOW,
      kind: "bothModified",
    });
  });

  describe("resolve", () => {
    it("takes the remote fields for useRemote", () => {
      const { resolution, auditLog } = resolver.resolve(conflict, ConflictStrategy.USE_REMOTE);

      expect(resolution.resolvedRecord).toEqual({
        id: "p1",
        fields: remote.fields,
        lastModified: Date.parse(NOW),
        syncStatus: "pending",
        originId: "origin-a",
      });
      expect(auditLog.changes.map((change) => change.field)).toEqual([
        "name",
        "balance",
        "lastVisitDate",
        "phone",
        "sync_status",
        "email",
      ]);
      expect(auditLog.triggeredBy).toBe("SYSTEM");
      expect(auditLog.details).toBe("Resolved patients/p1 using useRemote");
    });

    it("keeps the local fields for useLocal", () => {
      const { resolution, auditLog } = resolver.resolve(conflict, ConflictStrategy.USE_LOCAL);
      expect(resolution.resolvedRecord.fields).toEqual(local.fields);
      expect(auditLog.changes).toEqual([]);
    });

    it("uses the supplied record for manual resolution", () => {
      const manualRecord = { name: "Agreed Name", balance: 20 };
      const { resolution, auditLog } = resolver.resolve(conflict, ConflictStrategy.MANUAL, {
        manualRecord,
        triggeredBy: "USER",
        notes: "checked with front desk",
      });

      expect(resolution.resolvedRecord.fields).toEqual(manualRecord);
      expect(resolution.notes).toBe("checked with front desk");
      expect(auditLog.triggeredBy).toBe("USER");
      expect(auditLog.changes.every((change) => change.source === "MANUAL")).toBe(true);
    });

    it("requires a record for manual resolution", () => {
      expect(() => resolver.resolve(conflict, ConflictStrategy.MANUAL)).toThrow(ConflictError);
    });

    it("falls back to last-write-wins", () => {
      const { resolution } = resolver.resolve(conflict);
      expect(resolution.strategy).toBe(ConflictStrategy.USE_LOCAL);
      expect(resolution.notes).toBe("last-write-wins");

      const newerRemote = resolver.createConflict("patients", local, { ...remote, lastModified: 3000 });
      expect(resolver.resolve(newerRemote).resolution.strategy).toBe(ConflictStrategy.USE_REMOTE);
    });

    it("keeps the local record on a timestamp tie", () => {
      expect(resolver.lastWriteWins(local, { ...remote, lastModified: 2000 })).toBe(
        ConflictStrategy.USE_LOCAL,
      );
    });
  });

  describe("mergeRecords", () => {
    it("merges field by field without touching bookkeeping fields", () => {
      const { record, changes } = resolver.mergeRecords(local, remote);

      expect(record.fields).toEqual({
        name: "Local Name",
        balance: 25,
        lastVisitDate: "2024-02-15",
        phone: "555-0100",
        sync_status: "pending",
        email: "patient@example.com",
      });
      expect(changes.map((change) => [change.field, change.reason])).toEqual([
        ["balance", "remote value is larger"],
        ["lastVisitDate", "remote timestamp is later"],
        ["phone", "local value was empty"],
        ["email", "local value was empty"],
      ]);
      expect(record).toMatchObject({ syncStatus: "pending", originId: "origin-a" });
    });

    it("keeps later local timestamps and larger local numbers", () => {
      const { record, changes } = resolver.mergeRecords(
        { ...local, fields: { balance: 50, lastVisitDate: "2024-02-20" } },
        remote,
      );
      expect(record.fields.balance).toBe(50);
      expect(record.fields.lastVisitDate).toBe("2024-02-20");
      expect(changes.map((change) => change.field)).toEqual(["name", "phone", "email"]);
    });
  });
});
