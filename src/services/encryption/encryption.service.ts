import {
  createCipheriv,
  createDecipheriv,
  pbkdf2,
  randomBytes,
  timingSafeEqual,
} from "crypto";
import { promisify } from "util";
import { z } from "zod";
import {
  AES_256_GCM,
  EncryptedPayload,
} from "../../models/encryption.model";
import {
  AuthenticationFailedError,
  IntegrityError,
  UnsupportedAlgorithmError,
} from "../../errors/sync.errors";
import { canonicalJson, sha256Hex } from "../../utils/canonical-json";
import {
  PayloadTransform,
  defaultTransforms,
  identityTransform,
} from "./payload-transform";

const pbkdf2Async = promisify(pbkdf2);

export const KEY_LENGTH = 32;
export const IV_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;
export const PBKDF2_ITERATIONS = 10000;

const CIPHER = "aes-256-gcm";

const encryptedPayloadSchema = z.object({
  ciphertext: z.string(),
  iv: z.string(),
  authTag: z.string(),
  algorithm: z.string(),
  checksum: z.string(),
  timestamp: z.string(),
  keyId: z.string().optional(),
  compression: z.string().optional(),
});

export interface EncryptionCodecOptions {
  /** Transform applied to plaintext before encryption */
  transform?: PayloadTransform;
  /** Transforms recognised when decrypting */
  transforms?: readonly PayloadTransform[];
  iterations?: number;
  now?: () => Date;
}

/**
 * AES-256-GCM codec for structured payloads. A fresh IV is drawn for every
 * call; the checksum is computed over the canonical plaintext bytes.
 */
export class EncryptionCodec {
  private readonly transform: PayloadTransform;
  private readonly transforms: Map<string, PayloadTransform>;
  readonly iterations: number;
  private readonly now: () => Date;

  constructor(options: EncryptionCodecOptions = {}) {
    this.transform = options.transform ?? identityTransform;
    this.transforms = new Map(
      [...(options.transforms ?? defaultTransforms), this.transform].map(
        (t) => [t.name, t],
      ),
    );
    this.iterations = options.iterations ?? PBKDF2_ITERATIONS;
    this.now = options.now ?? (() => new Date());
  }

  async encrypt(
    plaintext: unknown,
    key: Buffer,
    keyId?: string,
  ): Promise<EncryptedPayload> {
    this.assertKey(key);
    const plaintextBytes = Buffer.from(canonicalJson(plaintext), "utf8");

    try {
      const encoded = await this.transform.encode(plaintextBytes);
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(CIPHER, key, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      const ciphertext = Buffer.concat([cipher.update(encoded), cipher.final()]);

      return {
        ciphertext: ciphertext.toString("base64"),
        iv: iv.toString("base64"),
        authTag: cipher.getAuthTag().toString("base64"),
        algorithm: AES_256_GCM,
        checksum: sha256Hex(plaintextBytes),
        timestamp: this.now().toISOString(),
        keyId,
        compression:
          this.transform.name === identityTransform.name
            ? undefined
            : this.transform.name,
      };
    } catch (error) {
      throw new IntegrityError("encryptionFailed", {
        message: "Encryption failed",
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async decrypt(payload: EncryptedPayload, key: Buffer): Promise<unknown> {
    if (payload.algorithm !== AES_256_GCM) {
      throw new UnsupportedAlgorithmError(payload.algorithm);
    }
    this.assertKey(key);

    const iv = Buffer.from(payload.iv, "base64");
    const authTag = Buffer.from(payload.authTag, "base64");
    if (iv.length !== IV_LENGTH || authTag.length !== AUTH_TAG_LENGTH) {
      throw new IntegrityError("corruptedData", {
        message: "Encrypted payload has a malformed IV or auth tag",
      });
    }

    let decrypted: Buffer;
    try {
      const decipher = createDecipheriv(CIPHER, key, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAuthTag(authTag);
      decrypted = Buffer.concat([
        decipher.update(Buffer.from(payload.ciphertext, "base64")),
        decipher.final(),
      ]);
    } catch (error) {
      throw new AuthenticationFailedError(
        error instanceof Error ? error : undefined,
      );
    }

    const plaintextBytes = await this.decode(decrypted, payload.compression);

    if (!this.validateIntegrity(plaintextBytes, payload.checksum)) {
      throw new IntegrityError("checksumMismatch", {
        message: "Decrypted payload does not match its checksum",
      });
    }

    try {
      return JSON.parse(plaintextBytes.toString("utf8"));
    } catch (error) {
      throw new IntegrityError("corruptedData", {
        message: "Decrypted payload is not valid JSON",
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Recompute the SHA-256 digest of `bytes` and compare in constant time.
   */
  validateIntegrity(bytes: Buffer | string, expectedChecksum: string): boolean {
    const actual = Buffer.from(sha256Hex(bytes), "hex");
    const expected = Buffer.from(expectedChecksum, "hex");
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }

  /**
   * PBKDF2-SHA256 over the tenant id. Deterministic for a fixed salt.
   */
  async deriveKey(tenantId: string, salt: Buffer | string): Promise<Buffer> {
    return pbkdf2Async(tenantId, salt, this.iterations, KEY_LENGTH, "sha256");
  }

  serialize(payload: EncryptedPayload): Buffer {
    return Buffer.from(JSON.stringify(payload), "utf8");
  }

  parse(bytes: Buffer): EncryptedPayload {
    let raw: unknown;
    try {
      raw = JSON.parse(bytes.toString("utf8"));
    } catch (error) {
      throw new IntegrityError("corruptedData", {
        message: "Encrypted blob is not valid JSON",
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = encryptedPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError("corruptedData", {
        message: "Encrypted blob is missing required fields",
        context: { issues: parsed.error.issues.map((i) => i.path.join(".")) },
      });
    }
    return parsed.data;
  }

  private async decode(data: Buffer, compression?: string): Promise<Buffer> {
    const transform = this.transforms.get(compression ?? identityTransform.name);
    if (!transform) {
      throw new IntegrityError("corruptedData", {
        message: `Unknown payload compression: ${compression}`,
      });
    }
    try {
      return await transform.decode(data);
    } catch (error) {
      throw new IntegrityError("corruptedData", {
        message: "Could not decompress payload",
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private assertKey(key: Buffer): void {
    if (key.length !== KEY_LENGTH) {
      throw new IntegrityError("encryptionFailed", {
        message: `Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`,
      });
    }
  }
}
