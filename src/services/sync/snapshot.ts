import { z } from "zod";
import { SyncDefaults } from "../../constants/SyncConstant";
import { IntegrityError } from "../../errors/sync.errors";
import {
  SnapshotTables,
  SyncFields,
  SyncSnapshot,
  SyncValue,
} from "../../models/sync.model";
import { canonicalJson, sha256Hex } from "../../utils/canonical-json";
import { parseTimestamp } from "../../utils/timestamps";

export const syncValueSchema: z.ZodType<SyncValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(syncValueSchema),
    z.record(syncValueSchema),
  ]),
);

export const syncFieldsSchema = z.record(syncValueSchema);

export const syncRecordSchema = z.object({
  id: z.string().min(1),
  fields: syncFieldsSchema,
  lastModified: z
    .union([z.number(), z.string()])
    .transform((value, ctx) => {
      const parsed = parseTimestamp(value);
      if (parsed === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "lastModified is not a timestamp",
        });
        return z.NEVER;
      }
      return parsed;
    }),
  syncStatus: z.enum(["pending", "synced"]).default("synced"),
  originId: z.string().nullable().default(null),
});

const snapshotSchema = z.object({
  tenantId: z.string().min(1),
  originId: z.string(),
  timestamp: z.string(),
  version: z.number().int(),
  tables: z.record(z.array(syncRecordSchema)),
  checksum: z.string(),
  metadata: syncFieldsSchema.default({}),
});

export interface SnapshotInput {
  tenantId: string;
  originId: string;
  tables: SnapshotTables;
  metadata?: SyncFields;
  now?: Date;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
};

/**
 * Digest over every snapshot field except the checksum itself.
 */
export const computeSnapshotChecksum = (
  snapshot: Omit<SyncSnapshot, "checksum">,
): string =>
  sha256Hex(
    canonicalJson({
      tenantId: snapshot.tenantId,
      originId: snapshot.originId,
      timestamp: snapshot.timestamp,
      version: snapshot.version,
      tables: snapshot.tables,
      metadata: snapshot.metadata,
    }),
  );

export const buildSnapshot = (input: SnapshotInput): SyncSnapshot => {
  const body = {
    tenantId: input.tenantId,
    originId: input.originId,
    timestamp: (input.now ?? new Date()).toISOString(),
    version: SyncDefaults.SNAPSHOT_VERSION,
    tables: structuredClone(input.tables),
    metadata: structuredClone(input.metadata ?? {}),
  };
  return deepFreeze({ ...body, checksum: computeSnapshotChecksum(body) });
};

export const validateSnapshotIntegrity = (snapshot: SyncSnapshot): boolean =>
  computeSnapshotChecksum(snapshot) === snapshot.checksum;

/**
 * Validate the shape of a decrypted snapshot. Integrity is checked
 * separately with `validateSnapshotIntegrity`.
 */
export const parseSnapshot = (raw: unknown): SyncSnapshot => {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IntegrityError("corruptedData", {
      message: "Snapshot does not have the expected structure",
      context: {
        issues: parsed.error.issues.slice(0, 5).map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      },
    });
  }
  if (parsed.data.version > SyncDefaults.SNAPSHOT_VERSION) {
    throw new IntegrityError("versionMismatch", {
      message: `Snapshot version ${parsed.data.version} is newer than supported version ${SyncDefaults.SNAPSHOT_VERSION}`,
      context: { version: parsed.data.version },
    });
  }
  return deepFreeze(parsed.data);
};

export const snapshotRecordCount = (snapshot: SyncSnapshot): number =>
  Object.values(snapshot.tables).reduce((sum, records) => sum + records.length, 0);
