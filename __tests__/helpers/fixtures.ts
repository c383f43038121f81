import { MemoryStorageConnector } from "../../src/connectors/memory.connector";
import { ResilienceExecutor } from "../../src/executors/resilienceExecutor";
import { RetentionPolicyConfig } from "../../src/services/backup/retention-policy";
import { EncryptionCodec } from "../../src/services/encryption/encryption.service";
import { KeyManager } from "../../src/services/encryption/key-manager.service";
import { MemorySecretStorage } from "../../src/services/encryption/secret-storage";
import { OfflineQueue } from "../../src/services/offline/offline-queue.service";
import { SyncEngine } from "../../src/services/sync/sync-engine.service";
import { MemoryRecordStore } from "../../src/stores/memory-record.store";
import { StorageConnector } from "../../src/connectors/base-connector";
import { createSilentLogger } from "../../src/utils/logger";

export const T0 = "2024-03-01T10:00:00.000Z";

export interface TestClock {
  now: () => Date;
  advance: (ms: number) => void;
  set: (iso: string) => void;
}

export const createClock = (start: string = T0): TestClock => {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
    set: (iso) => {
      current = Date.parse(iso);
    },
  };
};

export interface EngineFixtureOptions {
  clock: TestClock;
  storage?: StorageConnector;
  secrets?: MemorySecretStorage;
  store?: MemoryRecordStore;
  tenantId?: string;
  originId?: string;
  tables?: string[];
  autoResolve?: boolean;
  retention?: RetentionPolicyConfig;
  withQueue?: boolean;
}

export interface EngineFixture {
  engine: SyncEngine;
  store: MemoryRecordStore;
  storage: StorageConnector;
  secrets: MemorySecretStorage;
  keyManager: KeyManager;
  codec: EncryptionCodec;
  resilience: ResilienceExecutor;
  offlineQueue?: OfflineQueue;
}

/**
 * Engine wired to in-process stores, a fixed clock and a retry policy
 * that never sleeps.
 */
export const createEngineFixture = (options: EngineFixtureOptions): EngineFixture => {
  const logger = createSilentLogger();
  const { clock } = options;
  const originId = options.originId ?? "origin-a";
  const storage = options.storage ?? new MemoryStorageConnector(clock.now);
  const secrets = options.secrets ?? new MemorySecretStorage();
  const codec = new EncryptionCodec({ iterations: 1000, now: clock.now });
  const keyManager = new KeyManager(secrets, codec, logger, { now: clock.now });
  const store = options.store ?? new MemoryRecordStore(originId, clock.now);
  const resilience = new ResilienceExecutor(
    "test-storage",
    logger,
    { maxRetries: 2 },
    { failureThreshold: 5, timeout: 5000 },
    {
      sleep: async () => undefined,
      random: () => 0.5,
      now: () => clock.now().getTime(),
    },
  );
  const offlineQueue = options.withQueue ? new OfflineQueue(logger, 100, clock.now) : undefined;

  const engine = new SyncEngine(
    {
      tenantId: options.tenantId ?? "clinic-1",
      originId,
      tables: options.tables ?? ["patients", "visits"],
      autoResolve: options.autoResolve,
      retention: options.retention,
      now: clock.now,
    },
    { keyManager, codec, store, storage, resilience, logger, offlineQueue },
  );

  return { engine, store, storage, secrets, keyManager, codec, resilience, offlineQueue };
};
