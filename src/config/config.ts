import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((value) => value === "true");

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    APP_NAME: z.string().default("clinic-sync-service"),
    CORS_ORIGIN: z.string().default("*"),

    // Logging
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    LOG_FILE_PATH: z.string().default("./logs"),
    LOG_FILE: booleanFlag("true"),

    // Tenant
    TENANT_ID: z.string().min(1, "TENANT_ID is required"),
    ORIGIN_ID: z.string().min(1).optional(),
    SYNC_TABLES: csv("patients,visits,payments"),

    // Record store
    RECORD_STORE: z.enum(["postgres", "memory"]).default("memory"),
    DB_HOST: z.string().optional(),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_NAME: z.string().optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(20),
    DB_SSL: booleanFlag("false"),

    // Remote storage
    STORAGE_DRIVER: z.enum(["webdav", "memory"]).default("memory"),
    WEBDAV_URL: z.string().url().optional(),
    WEBDAV_USERNAME: z.string().optional(),
    WEBDAV_PASSWORD: z.string().optional(),
    WEBDAV_BASE_PATH: z.string().default("/clinic-backups"),
    STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    // Keys
    SECRET_STORE_PATH: z.string().default("./.secrets"),
    KEY_ROTATION_DAYS: z.coerce.number().int().positive().default(90),
    KEY_HISTORY_LIMIT: z.coerce.number().int().positive().default(5),

    // Backups and scheduling
    RETENTION_PRESET: z
      .enum(["default", "conservative", "minimal"])
      .default("default"),
    SYNC_CRON: z.string().default("0 * * * *"),
    AUTO_RESOLVE_CONFLICTS: booleanFlag("false"),
    PAYLOAD_COMPRESSION: z.enum(["gzip", "none"]).default("gzip"),
    AUTO_SAVE_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(30000),
  })
  .superRefine((env, ctx) => {
    if (env.RECORD_STORE === "postgres") {
      for (const key of ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASSWORD"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when RECORD_STORE=postgres`,
          });
        }
      }
    }
    if (env.STORAGE_DRIVER === "webdav") {
      for (const key of ["WEBDAV_URL", "WEBDAV_USERNAME", "WEBDAV_PASSWORD"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when STORAGE_DRIVER=webdav`,
          });
        }
      }
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const parseEnv = (
  source: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missing = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new Error(`Missing or invalid environment variables: ${missing}`);
    }
    throw error;
  }
};
