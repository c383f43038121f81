import { describe, expect, it, vi } from "vitest";
import { Queryable, SqlExecutor } from "../../src/config/database";
import { OperationError } from "../../src/errors/sync.errors";
import { PgRecordStore } from "../../src/stores/pg-record.store";
import { createSilentLogger } from "../../src/utils/logger";

const createDb = () => {
  const query = vi.fn();
  query.mockResolvedValue([]);
  const transaction = vi.fn();
  const db: SqlExecutor = {
    query,
    transaction: async <T>(callback: (client: Queryable) => Promise<T>): Promise<T> => {
      transaction();
      return callback(db);
    },
  };
  const store = new PgRecordStore(db, ["patients", "visits"], createSilentLogger());
  return { db, query, transaction, store };
};

const row = {
  id: "p1",
  data: { name: "Test Patient" },
  last_modified: "1709287200000",
  sync_status: "pending",
  origin_id: "origin-a",
};

describe("PgRecordStore", () => {
  it("rejects table names that are not plain identifiers", () => {
    const db: SqlExecutor = {
      query: vi.fn(),
      transaction: async <T>(callback: (client: Queryable) => Promise<T>): Promise<T> =>
        callback(db),
    };
    expect(() => new PgRecordStore(db, ['patients"; drop'], createSilentLogger())).toThrow(
      OperationError,
    );
  });

  it("refuses tables that are not sync-enabled", async () => {
    const { store, query } = createDb();
    await expect(store.exportTable("billing")).rejects.toThrow(
      "Table is not sync-enabled: billing",
    );
    expect(query).not.toHaveBeenCalled();
  });

  it("creates every table inside one transaction", async () => {
    const { store, query, transaction } = createDb();
    await store.ensureSchema();

    expect(transaction).toHaveBeenCalledTimes(1);
    const statements = query.mock.calls.map(([text]) => String(text));
    expect(statements).toHaveLength(4);
    expect(statements[0]).toContain('CREATE TABLE IF NOT EXISTS "patients"');
    expect(statements[1]).toContain('CREATE TABLE IF NOT EXISTS "visits"');
    expect(statements[2]).toContain("CREATE TABLE IF NOT EXISTS sync_metadata");
    expect(statements[3]).toContain("CREATE TABLE IF NOT EXISTS sync_conflicts");
  });

  it("selects pending changes and converts bigint columns", async () => {
    const { store, query } = createDb();
    query.mockResolvedValueOnce([row]);

    expect(await store.changedSince("patients", 1000)).toEqual([
      {
        id: "p1",
        fields: { name: "Test Patient" },
        lastModified: 1709287200000,
        syncStatus: "pending",
        originId: "origin-a",
      },
    ]);
    const [text, params] = query.mock.calls[0];
    expect(String(text)).toContain(`FROM "patients"`);
    expect(String(text)).toContain("last_modified > $1 AND sync_status = 'pending'");
    expect(params).toEqual([1000]);
  });

  it("returns undefined for a missing record", async () => {
    const { store } = createDb();
    expect(await store.getById("patients", "nope")).toBeUndefined();
  });

  it("writes record fields as JSON", async () => {
    const { store, query } = createDb();
    await store.insert("patients", {
      id: "p1",
      fields: { name: "Test Patient", tags: ["a"] },
      lastModified: 5,
      syncStatus: "synced",
      originId: null,
    });

    expect(query.mock.calls[0][1]).toEqual([
      "p1",
      '{"name":"Test Patient","tags":["a"]}',
      5,
      "synced",
      null,
    ]);
  });

  it("marks records synced only at the uploaded version", async () => {
    const { store, query } = createDb();
    await store.markSynced("patients", []);
    expect(query).not.toHaveBeenCalled();

    await store.markSynced("patients", [
      { id: "p1", lastModified: 1000 },
      { id: "p2", lastModified: 2000 },
    ]);
    const text = String(query.mock.calls[0][0]);
    expect(text).toContain("FROM unnest($1::text[], $2::bigint[]) AS uploaded(id, last_modified)");
    expect(text).toContain("t.last_modified <= uploaded.last_modified");
    expect(query.mock.calls[0][1]).toEqual([
      ["p1", "p2"],
      [1000, 2000],
    ]);
  });

  it("upserts conflicts and parses them back", async () => {
    const { store, query } = createDb();
    const local = {
      id: "p1",
      fields: { name: "Local" },
      lastModified: 1000,
      syncStatus: "pending" as const,
      originId: "origin-a",
    };
    const conflict = {
      id: "patients_p1_2000",
      tableName: "patients",
      recordId: "p1",
      localRecord: local,
      remoteRecord: { ...local, fields: { name: "Remote" }, syncStatus: "synced" as const },
      detectedAt: "2024-03-01T10:00:02.000Z",
      kind: "bothModified" as const,
    };

    await store.saveConflict({ conflict, status: "pending", resolutions: {} });
    expect(String(query.mock.calls[0][0])).toContain("ON CONFLICT (id) DO UPDATE");
    expect(query.mock.calls[0][1]).toEqual([
      "patients_p1_2000",
      "patients",
      "p1",
      "pending",
      "2024-03-01T10:00:02.000Z",
      JSON.stringify(conflict),
      "{}",
    ]);

    query.mockResolvedValueOnce([{ status: "pending", conflict, resolutions: {} }]);
    expect(await store.listConflicts("pending")).toEqual([
      { conflict, status: "pending", resolutions: {} },
    ]);
    expect(query.mock.calls[1][1]).toEqual(["pending"]);
    expect(await store.getConflict("patients_p1_9")).toBeUndefined();
  });

  it("reads and upserts sync metadata", async () => {
    const { store, query } = createDb();
    query.mockResolvedValueOnce([
      {
        table_name: "patients",
        last_sync_timestamp: "1000",
        last_backup_timestamp: null,
        pending_change_count: 2,
        last_origin_id: "origin-a",
      },
    ]);

    expect(await store.getSyncMetadata("patients")).toEqual({
      tableName: "patients",
      lastSyncTimestamp: 1000,
      lastBackupTimestamp: null,
      pendingChangeCount: 2,
      lastOriginId: "origin-a",
    });

    await store.setSyncMetadata("patients", {
      tableName: "patients",
      lastSyncTimestamp: 2000,
      lastBackupTimestamp: 1500,
      pendingChangeCount: 0,
      lastOriginId: "origin-a",
    });
    expect(String(query.mock.calls[1][0])).toContain("ON CONFLICT (table_name) DO UPDATE");
    expect(query.mock.calls[1][1]).toEqual(["patients", 2000, 1500, 0, "origin-a"]);
  });

  it("sums counts across tables", async () => {
    const { store, query } = createDb();
    query.mockResolvedValueOnce([{ count: "2" }]).mockResolvedValueOnce([{ count: "3" }]);
    expect(await store.countRecords(["patients", "visits"])).toBe(5);
  });
});
