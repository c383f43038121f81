import { randomBytes } from "crypto";
import { describe, expect, it } from "vitest";
import {
  AuthenticationFailedError,
  IntegrityError,
  UnsupportedAlgorithmError,
} from "../../../src/errors/sync.errors";
import { EncryptionCodec } from "../../../src/services/encryption/encryption.service";
import { gzipTransform } from "../../../src/services/encryption/payload-transform";
import { sha256Hex } from "../../../src/utils/canonical-json";

const fixedNow = () => new Date("2024-03-01T10:00:00.000Z");
const record = { id: "p1", fields: { name: "Test Patient", visits: [1, 2, 3] } };

describe("EncryptionCodec", () => {
  const codec = new EncryptionCodec({ iterations: 1000, now: fixedNow });
  const key = randomBytes(32);

  it("round-trips structured data", async () => {
    const payload = await codec.encrypt(record, key, "key-1");

    expect(payload.algorithm).toBe("AES-256-GCM");
    expect(payload.keyId).toBe("key-1");
    expect(payload.timestamp).toBe("2024-03-01T10:00:00.000Z");
    expect(payload.compression).toBeUndefined();
    expect(Buffer.from(payload.iv, "base64")).toHaveLength(12);
    expect(Buffer.from(payload.authTag, "base64")).toHaveLength(16);
    await expect(codec.decrypt(payload, key)).resolves.toEqual(record);
  });

  it("checksums the canonical plaintext", async () => {
    const payload = await codec.encrypt({ b: 2, a: 1 }, key);
    expect(payload.checksum).toBe(sha256Hex('{"a":1,"b":2}'));
  });

  it("draws a fresh IV for every call", async () => {
    const first = await codec.encrypt(record, key);
    const second = await codec.encrypt(record, key);

    expect(first.iv).not.toBe(second.iv);
    expect(first.ciphertext).not.toBe(second.ciphertext);
    expect(first.checksum).toBe(second.checksum);
  });

  it("fails authentication with the wrong key", async () => {
    const payload = await codec.encrypt(record, key);
    await expect(codec.decrypt(payload, randomBytes(32))).rejects.toBeInstanceOf(
      AuthenticationFailedError,
    );
  });

  it("fails authentication when the ciphertext is altered", async () => {
    const payload = await codec.encrypt(record, key);
    const bytes = Buffer.from(payload.ciphertext, "base64");
    bytes[0] = bytes[0] ^ 0xff;
    await expect(
      codec.decrypt({ ...payload, ciphertext: bytes.toString("base64") }, key),
    ).rejects.toBeInstanceOf(AuthenticationFailedError);
  });

  it("rejects unsupported algorithms", async () => {
    const payload = await codec.encrypt(record, key);
    const error = await codec
      .decrypt({ ...payload, algorithm: "AES-128-CBC" }, key)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedAlgorithmError);
    expect(error).toMatchObject({ code: "UNSUPPORTED_ALGORITHM" });
  });

  it("detects a checksum that does not match the plaintext", async () => {
    const payload = await codec.encrypt(record, key);
    await expect(
      codec.decrypt({ ...payload, checksum: sha256Hex("something else") }, key),
    ).rejects.toMatchObject({ code: "INTEGRITY_CHECKSUM_MISMATCH" });
  });

  it("rejects a malformed IV before decrypting", async () => {
    const payload = await codec.encrypt(record, key);
    await expect(
      codec.decrypt({ ...payload, iv: Buffer.alloc(8).toString("base64") }, key),
    ).rejects.toMatchObject({ code: "INTEGRITY_CORRUPTED_DATA" });
  });

  it("requires 32-byte keys", async () => {
    await expect(codec.encrypt(record, randomBytes(16))).rejects.toMatchObject({
      code: "INTEGRITY_ENCRYPTION_FAILED",
      message: "Encryption key must be 32 bytes, got 16",
    });
  });

  it("compresses with gzip and any codec can read it back", async () => {
    const gzipCodec = new EncryptionCodec({ iterations: 1000, transform: gzipTransform });
    const payload = await gzipCodec.encrypt(record, key);

    expect(payload.compression).toBe("gzip");
    await expect(codec.decrypt(payload, key)).resolves.toEqual(record);
  });

  it("rejects unknown compression", async () => {
    const payload = await codec.encrypt(record, key);
    await expect(codec.decrypt({ ...payload, compression: "brotli" }, key)).rejects.toMatchObject({
      code: "INTEGRITY_CORRUPTED_DATA",
      message: "Unknown payload compression: brotli",
    });
  });

  describe("serialize and parse", () => {
    it("round-trips the envelope", async () => {
      const payload = await codec.encrypt(record, key, "key-1");
      expect(codec.parse(codec.serialize(payload))).toEqual(payload);
    });

    it("rejects bytes that are not JSON", () => {
      expect(() => codec.parse(Buffer.from("not json"))).toThrow(IntegrityError);
    });

    it("rejects JSON missing envelope fields", () => {
      expect(() => codec.parse(Buffer.from('{"ciphertext":"abc"}'))).toThrow(
        "Encrypted blob is missing required fields",
      );
    });
  });

  describe("deriveKey", () => {
    it("is deterministic for a fixed salt", async () => {
      const first = await codec.deriveKey("clinic-1", "salt-a");
      const second = await codec.deriveKey("clinic-1", "salt-a");
      const other = await codec.deriveKey("clinic-1", "salt-b");

      expect(first).toHaveLength(32);
      expect(first.equals(second)).toBe(true);
      expect(first.equals(other)).toBe(false);
    });
  });

  describe("validateIntegrity", () => {
    it("compares digests", () => {
      expect(codec.validateIntegrity("abc", sha256Hex("abc"))).toBe(true);
      expect(codec.validateIntegrity("abd", sha256Hex("abc"))).toBe(false);
      expect(codec.validateIntegrity("abc", "short")).toBe(false);
    });
  });
});
