import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .optional();
const flag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  PORT: numeric,
  NODE_ENV: z.string().optional(),

  DATABASE_URL: z.string().url().optional(),
  MAIN_DB_HOST: z.string().optional(),
  MAIN_DB_PORT: numeric,
  MAIN_DB_NAME: z.string().optional(),
  MAIN_DB_USER: z.string().optional(),
  MAIN_DB_PASSWORD: z.string().optional(),
  DB_SSL_CERT: z.string().optional(),
  DB_POOL_MAX: numeric,

  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  ENABLE_CONSOLE_LOG: flag,
  ENABLE_FILE_LOG: flag,
  LOG_FILE: z.string().optional(),

  RATE_LIMIT_WINDOW: numeric,
  RATE_LIMIT_MAX: numeric,
  CORS_ORIGIN: z.string().optional(),

  AUTO_MIGRATE: flag,
  SEED_ON_START: flag,
});

export type AppConfig = ReturnType<typeof buildConfig>;

const buildConfig = (env: NodeJS.ProcessEnv = process.env) => {
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    database: {
      url: env.DATABASE_URL,
      host: env.MAIN_DB_HOST || "localhost",
      port: parseInt(env.MAIN_DB_PORT || "5432", 10),
      name: env.MAIN_DB_NAME || "fitness_db",
      user: env.MAIN_DB_USER || "admin",
      password: env.MAIN_DB_PASSWORD || "password",
      sslCertPath: env.DB_SSL_CERT,
      poolMax: parseInt(env.DB_POOL_MAX || "10", 10),
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      // console output stays on unless explicitly disabled
      enableConsole: env.ENABLE_CONSOLE_LOG !== "false",
      enableFile: env.ENABLE_FILE_LOG === "true",
      file: env.LOG_FILE || "logs/app.log",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",").map((o) => o.trim()) || [
          "http://localhost:3000",
        ],
      },
    },
    startup: {
      autoMigrate: env.AUTO_MIGRATE !== "false",
      seedOnStart: env.SEED_ON_START === "true",
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

/**
 * Checks the raw environment and returns the config built from it.
 * Throws with every offending variable listed.
 */
export const validateConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return buildConfig(env);
};
