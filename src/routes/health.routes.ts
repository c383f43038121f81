import { Router } from "express";
import type { Logger } from "winston";
import type { SyncEngine } from "../services/sync/sync-engine.service";

export interface HealthCheckResult {
  status: "healthy" | "unhealthy";
  latency?: number;
  error?: string;
}

export interface HealthDependencies {
  engine: Pick<SyncEngine, "getStatus">;
  checkRecordStore: () => Promise<HealthCheckResult>;
  logger: Logger;
  environment: string;
}

export const createHealthRoutes = (deps: HealthDependencies): Router => {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: deps.environment,
    });
  });

  router.get("/health/ready", async (_req, res) => {
    const checks: {
      recordStore: HealthCheckResult | "error";
      circuitBreaker?: string;
      timestamp: string;
    } = {
      recordStore: "error",
      timestamp: new Date().toISOString(),
    };

    try {
      checks.recordStore = await deps.checkRecordStore();
      const status = await deps.engine.getStatus();
      checks.circuitBreaker = status.circuitBreaker.state;

      if (checks.recordStore.status === "healthy") {
        res.status(200).json({ status: "ready", checks });
      } else {
        res.status(503).json({ status: "not ready", checks });
      }
    } catch (err) {
      deps.logger.error("Readiness check failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      res.status(503).json({ status: "not ready", checks });
    }
  });

  router.get("/health/live", (_req, res) => {
    res.status(200).json({
      status: "alive",
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
