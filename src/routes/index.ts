import { Router } from "express";
import { BackupController } from "../controllers/backup.controller";
import { ConflictController } from "../controllers/conflict.controller";
import { KeyController } from "../controllers/key.controller";
import { SyncController } from "../controllers/sync.controller";
import { asyncHandler } from "../middleware/error.middleware";
import { validate, validateParams, validateQuery } from "../middleware/validation.middleware";
import {
  backupRequestSchema,
  conflictParamsSchema,
  listBackupsQuerySchema,
  resolveAllConflictsSchema,
  resolveConflictSchema,
  restoreRequestSchema,
  syncRequestSchema,
} from "../schemas/request.schemas";
import type { KeyManager } from "../services/encryption/key-manager.service";
import type { SyncEngine } from "../services/sync/sync-engine.service";

export interface ApiDependencies {
  engine: SyncEngine;
  keyManager: KeyManager;
}

export const createApiRoutes = ({ engine, keyManager }: ApiDependencies): Router => {
  const router = Router();
  const sync = new SyncController(engine);
  const backups = new BackupController(engine);
  const conflicts = new ConflictController(engine);
  const keys = new KeyController(keyManager, engine.tenantId);

  router.get("/sync/status", asyncHandler((req, res) => sync.getStatus(req, res)));
  router.post(
    "/sync",
    validate(syncRequestSchema),
    asyncHandler((req, res) => sync.sync(req, res)),
  );
  router.post("/sync/reconcile", asyncHandler((req, res) => sync.reconcile(req, res)));

  router.post(
    "/backups",
    validate(backupRequestSchema),
    asyncHandler((req, res) => backups.create(req, res)),
  );
  router.get(
    "/backups",
    validateQuery(listBackupsQuerySchema),
    asyncHandler((req, res) => backups.list(req, res)),
  );
  router.get("/backups/statistics", asyncHandler((req, res) => backups.statistics(req, res)));
  router.post(
    "/backups/restore",
    validate(restoreRequestSchema),
    asyncHandler((req, res) => backups.restore(req, res)),
  );
  router.post("/backups/prune", asyncHandler((req, res) => backups.prune(req, res)));

  router.get("/conflicts", asyncHandler((req, res) => conflicts.list(req, res)));
  router.post(
    "/conflicts/resolve",
    validate(resolveAllConflictsSchema),
    asyncHandler((req, res) => conflicts.resolveAll(req, res)),
  );
  router.post(
    "/conflicts/:id/resolve",
    validateParams(conflictParamsSchema),
    validate(resolveConflictSchema),
    asyncHandler((req, res) => conflicts.resolve(req, res)),
  );

  router.get("/keys", asyncHandler((req, res) => keys.list(req, res)));
  router.post("/keys/rotate", asyncHandler((req, res) => keys.rotate(req, res)));

  return router;
};
