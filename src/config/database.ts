import { Pool, PoolClient, PoolConfig, QueryResultRow } from "pg";
import type { Logger } from "winston";
import type { AppConfig } from "./config";

/**
 * Minimal query surface shared by the pool wrapper and transaction clients
 */
export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface SqlExecutor extends Queryable {
  transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
}

export const buildPoolConfig = (config: AppConfig): PoolConfig => ({
  host: config.DB_HOST,
  port: config.DB_PORT,
  database: config.DB_NAME,
  user: config.DB_USER,
  password: config.DB_PASSWORD,
  max: config.DB_MAX_CONNECTIONS,
  idleTimeoutMillis: 15000,
  connectionTimeoutMillis: 15000,
  ssl: config.DB_SSL ? { rejectUnauthorized: false } : undefined,
});

const describeParams = (params?: unknown[]) =>
  params?.map((p) =>
    typeof p === "object" ? "[Object]" : String(p).substring(0, 50),
  );

/**
 * pg pool wrapper with query logging and transaction support.
 */
export class Database implements SqlExecutor {
  private closed = false;

  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
  ) {
    pool.on("error", (err) => {
      logger.error("Unexpected error on idle client", { error: err.message });
    });
  }

  static connect(config: AppConfig, logger: Logger): Database {
    const poolConfig = buildPoolConfig(config);
    logger.debug("Database pool configuration", {
      ...poolConfig,
      password: "***HIDDEN***",
    });
    return new Database(new Pool(poolConfig), logger);
  }

  async query<T extends QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<T[]> {
    return this.run<T>(this.pool, text, params);
  }

  async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const startTime = Date.now();
    const scoped: Queryable = {
      query: <R extends QueryResultRow>(text: string, params?: unknown[]) =>
        this.run<R>(client, text, params),
    };

    try {
      await client.query("BEGIN");
      const result = await callback(scoped);
      await client.query("COMMIT");
      this.logger.debug("Transaction committed", {
        duration: `${Date.now() - startTime}ms`,
      });
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      this.logger.error("Transaction rolled back", {
        error: error instanceof Error ? error.message : error,
        duration: `${Date.now() - startTime}ms`,
      });
      throw error;
    } finally {
      client.release();
    }
  }

  getPoolStats() {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  async healthCheck(): Promise<{
    status: "healthy" | "unhealthy";
    latency?: number;
    error?: string;
  }> {
    const start = Date.now();
    try {
      await this.query("SELECT 1");
      return { status: "healthy", latency: Date.now() - start };
    } catch (error) {
      return {
        status: "unhealthy",
        error: error instanceof Error ? error.message : "Unknown error",
      };
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      this.logger.warn("Pool already closed, skipping...");
      return;
    }
    this.logger.info("Closing database pool", this.getPoolStats());
    await this.pool.end();
    this.closed = true;
    this.logger.info("Database pool closed successfully");
  }

  private async run<T extends QueryResultRow>(
    executor: Pool | PoolClient,
    text: string,
    params?: unknown[],
  ): Promise<T[]> {
    const start = Date.now();
    try {
      const res = await executor.query<T>(text, params);
      this.logger.debug("Query executed", {
        duration: `${Date.now() - start}ms`,
        rows: res.rowCount,
        query: text.substring(0, 100),
      });
      return res.rows;
    } catch (error) {
      this.logger.error("Database query error", {
        error: error instanceof Error ? error.message : error,
        query: text.substring(0, 200),
        params: describeParams(params),
        duration: `${Date.now() - start}ms`,
      });
      throw error;
    }
  }
}
