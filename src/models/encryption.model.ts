export const AES_256_GCM = "AES-256-GCM";

export type EncryptionAlgorithm = typeof AES_256_GCM;

export type DerivationMethod = "PBKDF2-SHA256";

/**
 * Key metadata as persisted next to the key bytes. Never carries key material.
 */
export interface EncryptionKey {
  keyId: string;
  tenantId: string;
  derivationMethod: DerivationMethod;
  /** base64 */
  salt: string;
  iterations: number;
  createdAt: string;
  expiresAt: string;
  isActive: boolean;
}

export interface StoredKey {
  metadata: EncryptionKey;
  material: Buffer;
}

/**
 * A candidate key tried during decryption. `legacy` keys are only ever
 * used to read.
 */
export interface CandidateKey {
  keyId: string;
  material: Buffer;
  legacy: boolean;
}

/**
 * Serialised envelope uploaded to remote storage. Binary fields are base64.
 */
export interface EncryptedPayload {
  ciphertext: string;
  iv: string;
  authTag: string;
  algorithm: string;
  /** SHA-256 hex of the canonical plaintext bytes */
  checksum: string;
  timestamp: string;
  keyId?: string;
  compression?: string;
}

export interface KeyMetadataExport {
  tenantId: string;
  activeKeyId: string | null;
  keys: EncryptionKey[];
  exportedAt: string;
}
