import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "winston";

import { createHealthRoutes, HealthCheckResult } from "./routes/health.routes";
import { createApiRoutes } from "./routes";
import { createErrorHandler, notFoundHandler } from "./middleware/error.middleware";
import type { KeyManager } from "./services/encryption/key-manager.service";
import type { SyncEngine } from "./services/sync/sync-engine.service";

export interface AppDependencies {
  engine: SyncEngine;
  keyManager: KeyManager;
  logger: Logger;
  checkRecordStore: () => Promise<HealthCheckResult>;
  environment: "development" | "production" | "test";
  corsOrigin?: string;
}

export const createApp = (deps: AppDependencies): Application => {
  const app = express();
  const { logger } = deps;
  const corsOrigin = deps.corsOrigin ?? "*";

  app.use(helmet());
  // Browsers refuse credentialed responses for a wildcard origin
  app.use(
    cors({
      origin: corsOrigin,
      credentials: corsOrigin !== "*",
    }),
  );

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true, limit: "10mb" }));

  // Request logging
  if (deps.environment !== "test") {
    const morganFormat = deps.environment === "production" ? "combined" : "dev";
    app.use(
      morgan(morganFormat, {
        stream: {
          write: (message) => logger.info(message.trim()),
        },
      }),
    );
  }

  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    req.id = typeof header === "string" && header.length > 0 ? header : uuidv4();
    res.setHeader("X-Request-ID", req.id);
    next();
  });

  // Routes
  app.use(
    "/",
    createHealthRoutes({
      engine: deps.engine,
      checkRecordStore: deps.checkRecordStore,
      logger,
      environment: deps.environment,
    }),
  );
  app.use("/api/v1", createApiRoutes({ engine: deps.engine, keyManager: deps.keyManager }));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(createErrorHandler(logger, { exposeStack: deps.environment === "development" }));

  return app;
};
