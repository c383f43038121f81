import { promises as fs } from "fs";
import path from "path";

/**
 * Opaque persistence for key material and key metadata.
 */
export interface SecretStorage {
  read(key: string): Promise<Buffer | undefined>;
  write(key: string, value: Buffer): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemorySecretStorage implements SecretStorage {
  private readonly entries = new Map<string, Buffer>();

  async read(key: string): Promise<Buffer | undefined> {
    const value = this.entries.get(key);
    return value ? Buffer.from(value) : undefined;
  }

  async write(key: string, value: Buffer): Promise<void> {
    this.entries.set(key, Buffer.from(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

/**
 * One file per entry under `directory`. Entry names are hex encoded so any
 * key string maps to a safe file name.
 */
export class FileSecretStorage implements SecretStorage {
  constructor(private readonly directory: string) {}

  async read(key: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async write(key: string, value: Buffer): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
    const target = this.pathFor(key);
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, value, { mode: 0o600 });
    await fs.rename(temp, target);
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.pathFor(key));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  private pathFor(key: string): string {
    return path.join(this.directory, Buffer.from(key, "utf8").toString("hex"));
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
