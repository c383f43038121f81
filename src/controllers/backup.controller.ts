import { Request, Response } from "express";
import {
  BackupRequest,
  RestoreRequest,
  listBackupsQuerySchema,
} from "../schemas/request.schemas";
import { SyncEngine } from "../services/sync/sync-engine.service";
import { sendResult } from "./result-status";

export class BackupController {
  constructor(private readonly engine: SyncEngine) {}

  /**
   * POST /api/v1/backups
   */
  public async create(req: Request, res: Response): Promise<void> {
    const { kind }: BackupRequest = req.body;
    sendResult(res, await this.engine.createBackup({ kind }));
  }

  /**
   * GET /api/v1/backups
   */
  public async list(req: Request, res: Response): Promise<void> {
    const query = listBackupsQuerySchema.parse(req.validatedQuery ?? {});
    const backups = (await this.engine.listBackups()).filter(
      (backup) => !query.kind || backup.kind === query.kind,
    );
    const limited = query.limit ? backups.slice(0, query.limit) : backups;

    res.status(200).json({
      success: true,
      data: { total: backups.length, backups: limited },
    });
  }

  /**
   * GET /api/v1/backups/statistics
   */
  public async statistics(_req: Request, res: Response): Promise<void> {
    res.status(200).json({ success: true, data: await this.engine.getBackupStatistics() });
  }

  /**
   * POST /api/v1/backups/restore
   */
  public async restore(req: Request, res: Response): Promise<void> {
    const { backupId }: RestoreRequest = req.body;
    sendResult(res, await this.engine.restore({ backupId }));
  }

  /**
   * POST /api/v1/backups/prune
   */
  public async prune(_req: Request, res: Response): Promise<void> {
    sendResult(res, await this.engine.pruneBackups());
  }
}
