import { z } from "zod";

const DEFAULT_CORS_ORIGINS = "http://localhost:3000,http://localhost:5173";

const EnvSchema = z.object({
  PORT: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().min(0).max(65535).default(5121)
  ),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FORMAT: z.string().min(1).default("dev"),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),
  TODO_STORE: z.enum(["sqlite", "memory"]).default("sqlite"),
  DATABASE_PATH: z.string().min(1).default("todo.db"),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  logFormat: string;
  /** `"*"` allows every origin */
  corsOrigins: string[] | "*";
  store: "sqlite" | "memory";
  databasePath: string;
}

function parseOrigins(raw: string): string[] | "*" {
  const origins = raw.split(",").map((o) => o.trim()).filter(Boolean);
  return origins.includes("*") ? "*" : origins;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    corsOrigins: parseOrigins(e.CORS_ORIGINS),
    store: e.TODO_STORE,
    databasePath: e.DATABASE_PATH,
  };
}
