import { Server } from "http";
import { createApp } from "./app";
import { parseEnv } from "./config/config";
import { buildContainer, ServiceContainer } from "./container";
import { createLogger } from "./utils/logger";

const config = parseEnv();
const logger = createLogger({
  logDir: config.LOG_FILE_PATH,
  logLevel: config.LOG_LEVEL,
  appName: config.APP_NAME,
  environment: config.NODE_ENV,
  enableFile: config.LOG_FILE,
});

let server: Server | undefined;
let container: ServiceContainer | undefined;
let shuttingDown = false;

const startServer = async () => {
  try {
    container = await buildContainer(config, logger);
    const app = createApp({
      engine: container.engine,
      keyManager: container.keyManager,
      logger,
      checkRecordStore: container.checkRecordStore,
      environment: config.NODE_ENV,
      corsOrigin: config.CORS_ORIGIN,
    });

    server = app.listen(config.PORT, () => {
      logger.info(`Server started successfully`, {
        port: config.PORT,
        environment: config.NODE_ENV,
        tenantId: config.TENANT_ID,
        nodeVersion: process.version,
      });
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${config.PORT} is already in use`);
      } else {
        logger.error("Server error", { error: error.message });
      }
      process.exit(1);
    });

    container.scheduler.start();
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
};

const releaseResources = async () => {
  try {
    await container?.shutdown();
  } catch (error) {
    logger.error("Error while releasing resources", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

const gracefulShutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30000).unref();

  if (server) {
    server.close(() => {
      logger.info("HTTP server closed");
      releaseResources()
        .then(() => {
          logger.info("Graceful shutdown completed");
          process.exit(0);
        })
        .catch(() => process.exit(1));
    });
  } else {
    await releaseResources();
    process.exit(0);
  }
};

const onSignal = (signal: string) => {
  gracefulShutdown(signal).catch((error: unknown) => {
    logger.error("Shutdown failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
};

// Handle shutdown signals
process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack });
  onSignal("UNCAUGHT_EXCEPTION");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: String(reason) });
  onSignal("UNHANDLED_REJECTION");
});

startServer().catch((error: unknown) => {
  logger.error("Failed to start server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
