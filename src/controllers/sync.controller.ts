import { Request, Response } from "express";
import { SyncRequest } from "../schemas/request.schemas";
import { SyncEngine } from "../services/sync/sync-engine.service";
import { sendResult } from "./result-status";

export class SyncController {
  constructor(private readonly engine: SyncEngine) {}

  /**
   * GET /api/v1/sync/status
   */
  public async getStatus(_req: Request, res: Response): Promise<void> {
    res.status(200).json({ success: true, data: await this.engine.getStatus() });
  }

  /**
   * POST /api/v1/sync
   */
  public async sync(req: Request, res: Response): Promise<void> {
    const { mode }: SyncRequest = req.body;
    const result =
      mode === "full"
        ? await this.engine.fullSync()
        : await this.engine.incrementalSync();
    sendResult(res, result);
  }

  /**
   * POST /api/v1/sync/reconcile
   */
  public async reconcile(_req: Request, res: Response): Promise<void> {
    sendResult(res, await this.engine.reconcile());
  }
}
