import type { Logger } from "winston";
import { v4 as uuidv4 } from "uuid";
import { AppConfig } from "./config/config";
import { Database } from "./config/database";
import { StorageConnector } from "./connectors/base-connector";
import { MemoryStorageConnector } from "./connectors/memory.connector";
import { WebDavStorageConnector } from "./connectors/webdav.connector";
import { ResilienceExecutor } from "./executors/resilienceExecutor";
import { RetryPresets } from "./executors/retryPolicy";
import { HealthCheckResult } from "./routes/health.routes";
import { RetentionPresets } from "./services/backup/retention-policy";
import { EncryptionCodec } from "./services/encryption/encryption.service";
import { KeyManager } from "./services/encryption/key-manager.service";
import {
  gzipTransform,
  identityTransform,
} from "./services/encryption/payload-transform";
import { FileSecretStorage } from "./services/encryption/secret-storage";
import { OfflineQueue } from "./services/offline/offline-queue.service";
import { SyncEngine } from "./services/sync/sync-engine.service";
import { SyncScheduler } from "./schedulers/sync-scheduler.service";
import { MemoryRecordStore } from "./stores/memory-record.store";
import { PgRecordStore } from "./stores/pg-record.store";
import { RecordStore } from "./stores/record-store";

export interface ServiceContainer {
  engine: SyncEngine;
  keyManager: KeyManager;
  scheduler: SyncScheduler;
  checkRecordStore: () => Promise<HealthCheckResult>;
  shutdown: () => Promise<void>;
}

interface RecordStoreHandle {
  store: RecordStore;
  check: () => Promise<HealthCheckResult>;
  close: () => Promise<void>;
}

const buildRecordStore = async (
  config: AppConfig,
  originId: string,
  logger: Logger,
): Promise<RecordStoreHandle> => {
  if (config.RECORD_STORE === "postgres") {
    const db = Database.connect(config, logger);
    const store = new PgRecordStore(db, config.SYNC_TABLES, logger);
    await store.ensureSchema();
    return { store, check: () => db.healthCheck(), close: () => db.close() };
  }

  logger.warn("Using in-memory record store; local data is lost on restart");
  return {
    store: new MemoryRecordStore(originId),
    check: async () => ({ status: "healthy" }),
    close: async () => undefined,
  };
};

const buildStorage = (config: AppConfig, logger: Logger): StorageConnector => {
  if (config.STORAGE_DRIVER === "webdav") {
    if (!config.WEBDAV_URL) {
      throw new Error("WEBDAV_URL is required when STORAGE_DRIVER=webdav");
    }
    return new WebDavStorageConnector(
      {
        endpoint: config.WEBDAV_URL,
        basePath: config.WEBDAV_BASE_PATH,
        timeout: config.STORAGE_TIMEOUT_MS,
        username: config.WEBDAV_USERNAME,
        password: config.WEBDAV_PASSWORD,
      },
      logger,
    );
  }

  logger.warn("Using in-memory remote storage; backups are lost on restart");
  return new MemoryStorageConnector();
};

/**
 * Wire every component of the service from validated configuration
 */
export const buildContainer = async (
  config: AppConfig,
  logger: Logger,
): Promise<ServiceContainer> => {
  const originId = config.ORIGIN_ID ?? uuidv4();
  if (!config.ORIGIN_ID) {
    logger.warn("ORIGIN_ID not set, using a generated id for this process", { originId });
  }

  const codec = new EncryptionCodec({
    transform: config.PAYLOAD_COMPRESSION === "gzip" ? gzipTransform : identityTransform,
  });
  const keyManager = new KeyManager(
    new FileSecretStorage(config.SECRET_STORE_PATH),
    codec,
    logger,
    {
      rotationIntervalDays: config.KEY_ROTATION_DAYS,
      maxKeyHistory: config.KEY_HISTORY_LIMIT,
    },
  );

  const records = await buildRecordStore(config, originId, logger);
  const resilience = new ResilienceExecutor("remote-storage", logger, RetryPresets.network, {
    timeout: config.STORAGE_TIMEOUT_MS,
  });

  const engine = new SyncEngine(
    {
      tenantId: config.TENANT_ID,
      originId,
      tables: config.SYNC_TABLES,
      retention: RetentionPresets[config.RETENTION_PRESET],
      autoResolve: config.AUTO_RESOLVE_CONFLICTS,
    },
    {
      keyManager,
      codec,
      store: records.store,
      storage: buildStorage(config, logger),
      resilience,
      logger,
      offlineQueue: new OfflineQueue(logger),
    },
  );

  const scheduler = new SyncScheduler(engine, logger, {
    cron: config.SYNC_CRON,
    autoSaveDebounceMs: config.AUTO_SAVE_DEBOUNCE_MS,
  });

  return {
    engine,
    keyManager,
    scheduler,
    checkRecordStore: records.check,
    shutdown: async () => {
      scheduler.stop();
      await records.close();
    },
  };
};
