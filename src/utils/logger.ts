import winston, { Logger, format } from "winston";
import path from "path";
import fs from "fs";
import DailyRotateFile from "winston-daily-rotate-file";

/**
 * Logger Configuration Interface
 */
export interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
  silent: boolean;
}

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Custom filter to match specific log level only
 */
const createLevelFilter = (targetLevel: string) => {
  return format((info) => {
    return info.level === targetLevel ? info : false;
  })();
};

const defaultConfig = (): LoggerConfig => ({
  logDir: "./logs",
  logLevel: "info",
  appName: "clinic-sync-service",
  environment: "development",
  maxSize: 5242880, // 5MB
  maxFiles: 5,
  enableConsole: true,
  enableFile: true,
  silent: false,
});

const getConsoleFormat = () => {
  return format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, environment: _env, ...meta }) => {
      const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : "";
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
    }),
  );
};

const getFileFormat = () => {
  return format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ["message", "level", "timestamp", "service"] }),
    format.json(),
  );
};

const rotatingFile = (
  config: LoggerConfig,
  name: string,
  options: { level?: string; format?: ReturnType<typeof format.combine> } = {},
): DailyRotateFile =>
  new DailyRotateFile({
    filename: path.join(config.logDir, `${name}-%DATE%.log`),
    datePattern: "YYYY-MM-DD",
    level: options.level,
    format: options.format ?? getFileFormat(),
    maxSize: config.maxSize,
    maxFiles: `${config.maxFiles}d`,
    auditFile: path.join(config.logDir, `.${name}-audit.json`),
    zippedArchive: false,
  });

/**
 * Build a winston logger. Each composition root owns its instance and
 * hands it to the components it constructs.
 */
export const createLogger = (customConfig: Partial<LoggerConfig> = {}): Logger => {
  const config = { ...defaultConfig(), ...customConfig };
  const isProduction = config.environment === "production";

  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        level: isProduction ? "info" : config.logLevel,
        format: isProduction
          ? format.combine(format.timestamp(), format.json())
          : getConsoleFormat(),
      }),
    );
  }

  if (config.enableFile) {
    ensureLogDir(config.logDir);
    transports.push(rotatingFile(config, "combined", { level: "info" }));
    transports.push(rotatingFile(config, "error", { level: "error" }));

    // Debug log only outside production
    if (!isProduction) {
      transports.push(
        rotatingFile(config, "debug", {
          format: format.combine(createLevelFilter("debug"), getFileFormat()),
        }),
      );
    }
  }

  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: config.logLevel,
    silent: config.silent,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
    exceptionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, "exceptions.log"),
            format: getFileFormat(),
          }),
        ]
      : undefined,
    rejectionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, "rejections.log"),
            format: getFileFormat(),
          }),
        ]
      : undefined,
  });
};

/** Logger that swallows output, for tests and embedded use */
export const createSilentLogger = (): Logger =>
  createLogger({ enableConsole: false, enableFile: false, silent: true });

export type { Logger };
