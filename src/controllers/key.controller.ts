import { Request, Response } from "express";
import { KeyManager } from "../services/encryption/key-manager.service";

export class KeyController {
  constructor(
    private readonly keyManager: KeyManager,
    private readonly tenantId: string,
  ) {}

  /**
   * GET /api/v1/keys
   * Key metadata only, never key material
   */
  public async list(_req: Request, res: Response): Promise<void> {
    const [metadata, needsRotation] = await Promise.all([
      this.keyManager.exportKeyMetadata(this.tenantId),
      this.keyManager.needsKeyRotation(this.tenantId),
    ]);
    res.status(200).json({ success: true, data: { ...metadata, needsRotation } });
  }

  /**
   * POST /api/v1/keys/rotate
   */
  public async rotate(_req: Request, res: Response): Promise<void> {
    const keyId = await this.keyManager.rotateKey(this.tenantId);
    res.status(201).json({ success: true, data: { keyId } });
  }
}
