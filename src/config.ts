import { z } from "zod";

export const DEFAULT_MODEL_NAME = "Xenova/all-MiniLM-L6-v2";

export const SERVICE_NAME = "sentence-transformers-embedding";
export const SERVICE_VERSION = "1.0.0";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// Empty strings in the environment mean "not set".
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const envSchema = z.object({
  MODEL_NAME: optional(z.string().default(DEFAULT_MODEL_NAME)),
  HOST: optional(z.string().default("0.0.0.0")),
  PORT: optional(z.coerce.number().int().min(1).max(65535).default(8000)),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default("info")),
  MODEL_QUANTIZED: optional(
    z.enum(["true", "false", "1", "0"]).default("true"),
  ).transform((value) => value === "true" || value === "1"),
  MODEL_CACHE_DIR: optional(z.string().optional()),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  modelName: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  modelQuantized: boolean;
  modelCacheDir?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    modelName: vars.MODEL_NAME,
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    modelQuantized: vars.MODEL_QUANTIZED,
    modelCacheDir: vars.MODEL_CACHE_DIR,
  };
}
