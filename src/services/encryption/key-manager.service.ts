import { randomBytes } from "crypto";
import type { Logger } from "winston";
import { z } from "zod";
import {
  CandidateKey,
  EncryptionKey,
  KeyMetadataExport,
  StoredKey,
} from "../../models/encryption.model";
import { KeyErrorKind, KeyStorageError } from "../../errors/sync.errors";
import { EncryptionCodec } from "./encryption.service";
import { SecretStorage } from "./secret-storage";

const DAY_MS = 24 * 60 * 60 * 1000;
const SALT_LENGTH = 16;
const KEY_ID_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const KeyManagerDefaults = {
  ROTATION_INTERVAL_DAYS: 90,
  MAX_KEY_HISTORY: 5,
} as const;

const StoragePrefix = {
  KEY: "key_",
  METADATA: "metadata_",
  ACTIVE: "active_key_",
  INDEX: "keys_",
} as const;

const keyMetadataSchema = z.object({
  keyId: z.string().min(1),
  tenantId: z.string().min(1),
  derivationMethod: z.literal("PBKDF2-SHA256"),
  salt: z.string(),
  iterations: z.number().int().positive(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  isActive: z.boolean(),
});

const keyIndexSchema = z.array(z.string());

export interface KeyManagerOptions {
  rotationIntervalDays?: number;
  maxKeyHistory?: number;
  now?: () => Date;
}

/**
 * Per-tenant key lifecycle: derivation, rotation, expiry and bounded
 * history. Exactly one key per tenant is active; older keys remain
 * readable until pruned.
 */
export class KeyManager {
  private readonly rotationIntervalMs: number;
  private readonly maxKeyHistory: number;
  private readonly now: () => Date;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly storage: SecretStorage,
    private readonly codec: EncryptionCodec,
    private readonly logger: Logger,
    options: KeyManagerOptions = {},
  ) {
    this.rotationIntervalMs =
      (options.rotationIntervalDays ?? KeyManagerDefaults.ROTATION_INTERVAL_DAYS) *
      DAY_MS;
    this.maxKeyHistory = options.maxKeyHistory ?? KeyManagerDefaults.MAX_KEY_HISTORY;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the active key id, creating a key when none is usable or when
   * `forceRotation` is set. Every new key trims the history.
   */
  async deriveAndStoreKey(tenantId: string, forceRotation = false): Promise<string> {
    return this.withLock(tenantId, async () => {
      if (!forceRotation) {
        const active = await this.getActiveMetadata(tenantId);
        if (active && !this.isExpired(active)) {
          return active.keyId;
        }
      }
      return this.createKey(tenantId);
    });
  }

  async rotateKey(tenantId: string): Promise<string> {
    return this.withLock(tenantId, () => this.createKey(tenantId));
  }

  async getKey(keyId: string): Promise<StoredKey | undefined> {
    const [material, metadata] = await Promise.all([
      this.readEntry(StoragePrefix.KEY + keyId),
      this.getKeyMetadata(keyId),
    ]);
    if (!material || !metadata) {
      return undefined;
    }
    return { metadata, material };
  }

  async getActiveKey(tenantId: string): Promise<StoredKey | undefined> {
    const activeKeyId = await this.getActiveKeyId(tenantId);
    return activeKeyId ? this.getKey(activeKeyId) : undefined;
  }

  async getKeyMetadata(keyId: string): Promise<EncryptionKey | undefined> {
    const raw = await this.readEntry(StoragePrefix.METADATA + keyId);
    return raw ? parseMetadata(raw) : undefined;
  }

  /**
   * Newest first.
   */
  async listKeys(tenantId: string): Promise<EncryptionKey[]> {
    const index = await this.readIndex(tenantId);
    const keys: EncryptionKey[] = [];
    for (const keyId of index) {
      const metadata = await this.getKeyMetadata(keyId);
      if (metadata) keys.push(metadata);
    }
    // Index is in insertion order; reversing first keeps later keys ahead on ties.
    return keys
      .reverse()
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }

  async needsKeyRotation(tenantId: string): Promise<boolean> {
    const active = await this.getActiveMetadata(tenantId);
    return !active || this.isExpired(active);
  }

  async validateKey(keyId: string): Promise<boolean> {
    const [material, metadata] = await Promise.all([
      this.readEntry(StoragePrefix.KEY + keyId),
      this.readEntry(StoragePrefix.METADATA + keyId),
    ]);
    return Boolean(material && metadata && parseMetadata(metadata));
  }

  async deactivateKey(keyId: string): Promise<void> {
    const metadata = await this.getKeyMetadata(keyId);
    if (!metadata || !metadata.isActive) return;
    await this.writeMetadata({ ...metadata, isActive: false });
  }

  /**
   * Delete the oldest inactive keys until the tenant is within the history
   * bound. Returns the number of keys removed.
   */
  async cleanupOldKeys(tenantId: string): Promise<number> {
    return this.withLock(tenantId, () => this.pruneHistory(tenantId));
  }

  async deleteAllKeys(tenantId: string): Promise<number> {
    return this.withLock(tenantId, async () => {
      const index = await this.readIndex(tenantId);
      for (const keyId of index) {
        await this.removeKey(keyId);
      }
      await this.deleteEntry(StoragePrefix.INDEX + tenantId);
      await this.deleteEntry(StoragePrefix.ACTIVE + tenantId);
      this.logger.warn("All encryption keys deleted", {
        tenantId,
        count: index.length,
      });
      return index.length;
    });
  }

  async exportKeyMetadata(tenantId: string): Promise<KeyMetadataExport> {
    return {
      tenantId,
      activeKeyId: (await this.getActiveKeyId(tenantId)) ?? null,
      keys: await this.listKeys(tenantId),
      exportedAt: this.now().toISOString(),
    };
  }

  /**
   * Re-derive and store the key bytes for a key whose metadata survived
   * but whose material was lost. Derivation is deterministic for the
   * recorded salt, so the recovered key decrypts existing payloads.
   */
  async recoverKey(keyId: string): Promise<boolean> {
    const metadata = await this.getKeyMetadata(keyId);
    if (!metadata) return false;
    const material = await this.codec.deriveKey(
      metadata.tenantId,
      Buffer.from(metadata.salt, "base64"),
    );
    await this.writeEntry(StoragePrefix.KEY + keyId, material);
    this.logger.info("Encryption key recovered from metadata", { keyId });
    return true;
  }

  /**
   * Keys to try, in order, when decrypting data for a tenant: the key named
   * by the payload, the active key, older keys newest first, and finally
   * the legacy tenant-wide derivation. The legacy key is never used to write.
   */
  async candidateKeys(tenantId: string, preferredKeyId?: string): Promise<CandidateKey[]> {
    const candidates: CandidateKey[] = [];
    const seen = new Set<string>();
    const add = (stored: StoredKey | undefined) => {
      if (!stored || seen.has(stored.metadata.keyId)) return;
      seen.add(stored.metadata.keyId);
      candidates.push({
        keyId: stored.metadata.keyId,
        material: stored.material,
        legacy: false,
      });
    };

    if (preferredKeyId) add(await this.getKey(preferredKeyId));
    add(await this.getActiveKey(tenantId));
    for (const metadata of await this.listKeys(tenantId)) {
      add(await this.getKey(metadata.keyId));
    }

    candidates.push({
      keyId: `${tenantId}_legacy`,
      material: await this.codec.deriveKey(tenantId, tenantId),
      legacy: true,
    });
    return candidates;
  }

  private async createKey(tenantId: string): Promise<string> {
    const previous = await this.getActiveKeyId(tenantId);
    const createdAt = this.now();
    const salt = randomBytes(SALT_LENGTH);
    const material = await this.codec.deriveKey(tenantId, salt);

    const metadata: EncryptionKey = {
      keyId: this.generateKeyId(tenantId, createdAt),
      tenantId,
      derivationMethod: "PBKDF2-SHA256",
      salt: salt.toString("base64"),
      iterations: this.codec.iterations,
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.rotationIntervalMs).toISOString(),
      isActive: true,
    };

    // Store everything before flipping the active pointer so readers never
    // see an active id without its key.
    await this.writeEntry(StoragePrefix.KEY + metadata.keyId, material);
    await this.writeMetadata(metadata);
    const index = await this.readIndex(tenantId);
    await this.writeEntry(
      StoragePrefix.INDEX + tenantId,
      Buffer.from(JSON.stringify([...index, metadata.keyId]), "utf8"),
    );
    await this.writeEntry(
      StoragePrefix.ACTIVE + tenantId,
      Buffer.from(metadata.keyId, "utf8"),
    );

    if (previous && previous !== metadata.keyId) {
      await this.deactivateKey(previous);
    }

    this.logger.info("Encryption key created", {
      tenantId,
      keyId: metadata.keyId,
      rotatedFrom: previous,
      expiresAt: metadata.expiresAt,
    });
    await this.pruneHistory(tenantId);
    return metadata.keyId;
  }

  private async pruneHistory(tenantId: string): Promise<number> {
    const keys = await this.listKeys(tenantId);
    let excess = keys.length - this.maxKeyHistory;
    if (excess <= 0) return 0;

    const activeKeyId = await this.getActiveKeyId(tenantId);
    const removable = keys
      .filter((key) => key.keyId !== activeKeyId && !key.isActive)
      .reverse();

    const removed: string[] = [];
    for (const key of removable) {
      if (excess <= 0) break;
      await this.removeKey(key.keyId);
      removed.push(key.keyId);
      excess--;
    }

    const index = await this.readIndex(tenantId);
    await this.writeEntry(
      StoragePrefix.INDEX + tenantId,
      Buffer.from(
        JSON.stringify(index.filter((id) => !removed.includes(id))),
        "utf8",
      ),
    );

    if (removed.length > 0) {
      this.logger.info("Pruned encryption key history", { tenantId, removed });
    }
    return removed.length;
  }

  private async removeKey(keyId: string): Promise<void> {
    await this.deleteEntry(StoragePrefix.KEY + keyId);
    await this.deleteEntry(StoragePrefix.METADATA + keyId);
  }

  private async getActiveKeyId(tenantId: string): Promise<string | undefined> {
    const raw = await this.readEntry(StoragePrefix.ACTIVE + tenantId);
    return raw ? raw.toString("utf8") : undefined;
  }

  private async getActiveMetadata(tenantId: string): Promise<EncryptionKey | undefined> {
    const keyId = await this.getActiveKeyId(tenantId);
    return keyId ? this.getKeyMetadata(keyId) : undefined;
  }

  private async readIndex(tenantId: string): Promise<string[]> {
    const raw = await this.readEntry(StoragePrefix.INDEX + tenantId);
    if (!raw) return [];
    try {
      const parsed = keyIndexSchema.safeParse(JSON.parse(raw.toString("utf8")));
      if (parsed.success) return parsed.data;
    } catch (error) {
      this.logger.error("Key index is not valid JSON", {
        tenantId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    throw new KeyStorageError("readFailed", {
      message: `Key index for tenant ${tenantId} is corrupt`,
      context: { tenantId },
    });
  }

  private async writeMetadata(metadata: EncryptionKey): Promise<void> {
    await this.writeEntry(
      StoragePrefix.METADATA + metadata.keyId,
      Buffer.from(JSON.stringify(metadata), "utf8"),
    );
  }

  private isExpired(metadata: EncryptionKey): boolean {
    return Date.parse(metadata.expiresAt) <= this.now().getTime();
  }

  private generateKeyId(tenantId: string, createdAt: Date): string {
    const suffix = Array.from(
      randomBytes(8),
      (byte) => KEY_ID_ALPHABET[byte % KEY_ID_ALPHABET.length],
    ).join("");
    return `${tenantId}_${createdAt.getTime()}_${suffix}`;
  }

  private readEntry(key: string): Promise<Buffer | undefined> {
    return this.guard("readFailed", key, () => this.storage.read(key));
  }

  private writeEntry(key: string, value: Buffer): Promise<void> {
    return this.guard("writeFailed", key, () => this.storage.write(key, value));
  }

  private deleteEntry(key: string): Promise<void> {
    return this.guard("deleteFailed", key, () => this.storage.delete(key));
  }

  private async guard<T>(
    kind: KeyErrorKind,
    entry: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new KeyStorageError(kind, {
        message: `Secret storage ${kind} for ${entry}`,
        context: { entry },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async withLock<T>(tenantId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(tenantId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(tenantId, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(tenantId) === settled) {
        this.locks.delete(tenantId);
      }
    }
  }
}

const parseMetadata = (raw: Buffer): EncryptionKey | undefined => {
  try {
    const parsed = keyMetadataSchema.safeParse(JSON.parse(raw.toString("utf8")));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
};
