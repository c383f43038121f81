import { StorageError } from "../errors/sync.errors";
import { RemoteFileDescriptor, StorageConnector, newestFile } from "./base-connector";

interface StoredBlob {
  name: string;
  data: Buffer;
  modifiedAt: Date;
}

/**
 * In-process blob store. Used when STORAGE_DRIVER=memory and in tests.
 */
export class MemoryStorageConnector implements StorageConnector {
  private readonly blobs = new Map<string, StoredBlob>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  getName(): string {
    return "memory";
  }

  async upload(name: string, data: Buffer): Promise<string> {
    this.blobs.set(name, { name, data: Buffer.from(data), modifiedAt: this.now() });
    return name;
  }

  async download(id: string): Promise<Buffer> {
    const blob = this.blobs.get(id);
    if (!blob) {
      throw new StorageError("notFound", {
        message: `Remote file not found: ${id}`,
        context: { id },
      });
    }
    return Buffer.from(blob.data);
  }

  async list(): Promise<RemoteFileDescriptor[]> {
    return [...this.blobs.entries()].map(([id, blob]) => ({
      id,
      name: blob.name,
      size: blob.data.length,
      modifiedAt: new Date(blob.modifiedAt),
    }));
  }

  async delete(id: string): Promise<void> {
    if (!this.blobs.delete(id)) {
      throw new StorageError("notFound", {
        message: `Remote file not found: ${id}`,
        context: { id },
      });
    }
  }

  async latest(): Promise<RemoteFileDescriptor | undefined> {
    return newestFile(await this.list());
  }
}
