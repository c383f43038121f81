import axios, { AxiosInstance } from "axios";
import type { Logger } from "winston";
import { classifyError } from "../errors/sync.errors";

/**
 * Configuration for remote storage connectors
 */
export interface StorageConfig {
  endpoint: string;
  basePath: string;
  timeout?: number;
  username?: string;
  password?: string;
}

/**
 * A file as listed by the remote store
 */
export interface RemoteFileDescriptor {
  id: string;
  name: string;
  size: number;
  modifiedAt: Date;
}

/**
 * Blob storage used for backups and sync snapshots
 */
export interface StorageConnector {
  /** Store `data` under `name` and return the remote id */
  upload(name: string, data: Buffer): Promise<string>;
  download(id: string): Promise<Buffer>;
  list(): Promise<RemoteFileDescriptor[]>;
  delete(id: string): Promise<void>;
  latest(): Promise<RemoteFileDescriptor | undefined>;
  getName(): string;
}

export const newestFile = (
  files: readonly RemoteFileDescriptor[],
): RemoteFileDescriptor | undefined =>
  files.reduce<RemoteFileDescriptor | undefined>(
    (newest, file) =>
      !newest || file.modifiedAt.getTime() > newest.modifiedAt.getTime()
        ? file
        : newest,
    undefined,
  );

/**
 * Base class for HTTP storage connectors. Subclasses implement the raw
 * transfers; failures leave here as classified sync errors.
 */
export abstract class BaseStorageConnector implements StorageConnector {
  protected config: Required<Omit<StorageConfig, "username" | "password">> &
    Pick<StorageConfig, "username" | "password">;
  protected isReady: boolean = false;
  protected httpClient: AxiosInstance;

  constructor(
    config: StorageConfig,
    protected readonly logger: Logger,
    httpClient?: AxiosInstance,
  ) {
    this.config = {
      timeout: 30000,
      ...config,
    };

    this.httpClient =
      httpClient ??
      axios.create({
        baseURL: config.endpoint,
        timeout: this.config.timeout,
        auth:
          config.username !== undefined && config.password !== undefined
            ? { username: config.username, password: config.password }
            : undefined,
      });
  }

  /**
   * Prepare the remote location, e.g. create the backup folder
   */
  protected abstract prepare(): Promise<void>;

  protected abstract uploadFile(name: string, data: Buffer): Promise<string>;

  protected abstract downloadFile(id: string): Promise<Buffer>;

  protected abstract listFiles(): Promise<RemoteFileDescriptor[]>;

  protected abstract deleteFile(id: string): Promise<void>;

  abstract getName(): string;

  async upload(name: string, data: Buffer): Promise<string> {
    return this.guard("upload", { name, bytes: data.length }, async () => {
      await this.ensureReady();
      return this.uploadFile(name, data);
    });
  }

  async download(id: string): Promise<Buffer> {
    return this.guard("download", { id }, async () => {
      await this.ensureReady();
      return this.downloadFile(id);
    });
  }

  async list(): Promise<RemoteFileDescriptor[]> {
    return this.guard("list", {}, async () => {
      await this.ensureReady();
      return this.listFiles();
    });
  }

  async delete(id: string): Promise<void> {
    return this.guard("delete", { id }, async () => {
      await this.ensureReady();
      await this.deleteFile(id);
    });
  }

  async latest(): Promise<RemoteFileDescriptor | undefined> {
    return newestFile(await this.list());
  }

  /**
   * Prepare the remote location once per connector
   */
  protected async ensureReady(): Promise<void> {
    if (!this.isReady) {
      await this.prepare();
      this.isReady = true;
    }
  }

  private async guard<T>(
    operation: string,
    context: Record<string, unknown>,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const classified = classifyError(error);
      this.logger.error(`${this.getName()} ${operation} failed`, {
        ...context,
        code: classified.code,
        error: classified.message,
      });
      throw classified;
    }
  }
}
