import { z } from "zod";
import { ConflictStrategy } from "../models/sync.model";
import { syncFieldsSchema } from "../services/sync/snapshot";

export const syncRequestSchema = z.object({
  mode: z.enum(["full", "incremental"]).default("incremental"),
});

export const backupRequestSchema = z.object({
  kind: z.enum(["full", "manual"]).default("manual"),
});

export const restoreRequestSchema = z.object({
  backupId: z.string().min(1, "backupId must not be empty").optional(),
});

export const resolveConflictSchema = z
  .object({
    strategy: z.nativeEnum(ConflictStrategy).optional(),
    record: syncFieldsSchema.optional(),
    notes: z.string().max(500).optional(),
  })
  .refine((body) => body.strategy !== ConflictStrategy.MANUAL || body.record !== undefined, {
    message: "record is required for manual resolution",
    path: ["record"],
  });

export const resolveAllConflictsSchema = z.object({
  strategy: z
    .enum([ConflictStrategy.USE_LOCAL, ConflictStrategy.USE_REMOTE, ConflictStrategy.MERGE])
    .optional(),
  notes: z.string().max(500).optional(),
});

export const conflictParamsSchema = z.object({
  id: z
    .string()
    .max(300)
    .regex(/^[A-Za-z0-9_.-]+$/, "conflict id contains unexpected characters"),
});

export const listBackupsQuerySchema = z.object({
  kind: z.enum(["full", "incremental", "sync", "manual"]).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export type SyncRequest = z.infer<typeof syncRequestSchema>;
export type BackupRequest = z.infer<typeof backupRequestSchema>;
export type RestoreRequest = z.infer<typeof restoreRequestSchema>;
export type ResolveConflictRequest = z.infer<typeof resolveConflictSchema>;
export type ResolveAllConflictsRequest = z.infer<typeof resolveAllConflictsSchema>;
export type ListBackupsQuery = z.infer<typeof listBackupsQuerySchema>;
