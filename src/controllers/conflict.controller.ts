import { Request, Response } from "express";
import {
  ResolveAllConflictsRequest,
  ResolveConflictRequest,
} from "../schemas/request.schemas";
import { SyncEngine } from "../services/sync/sync-engine.service";
import { sendResult } from "./result-status";

export class ConflictController {
  constructor(private readonly engine: SyncEngine) {}

  /**
   * GET /api/v1/conflicts
   */
  public async list(_req: Request, res: Response): Promise<void> {
    const conflicts = await this.engine.listConflicts();
    res.status(200).json({ success: true, data: { total: conflicts.length, conflicts } });
  }

  /**
   * POST /api/v1/conflicts/:id/resolve
   */
  public async resolve(req: Request, res: Response): Promise<void> {
    const { strategy, record, notes }: ResolveConflictRequest = req.body;
    const result = await this.engine.resolveConflict(req.params.id, strategy, {
      manualRecord: record,
      notes,
      triggeredBy: "USER",
    });
    sendResult(res, result);
  }

  /**
   * POST /api/v1/conflicts/resolve
   */
  public async resolveAll(req: Request, res: Response): Promise<void> {
    const { strategy, notes }: ResolveAllConflictsRequest = req.body;
    const result = await this.engine.resolveAllConflicts(strategy, { notes, triggeredBy: "USER" });
    sendResult(res, result);
  }
}
