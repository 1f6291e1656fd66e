import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { DEFAULT_CACHE_CAPACITY, LOG_LEVELS, type LogLevel } from "@plugin-catalog/core";

/**
 * Load `.env` from the working directory into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(): void {
  loadDotenv();
}

// Empty strings count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("127.0.0.1"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CLAUDE_CONFIG_DIR: optionalString,
  PLUGIN_MARKETPLACES_DIR: optionalString,
  PLUGIN_CACHE_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_CACHE_CAPACITY),
});

export type Env = z.infer<typeof envSchema>;

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  claudeDir?: string;
  marketplacesDir?: string;
  cacheCapacity: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment variables: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Validate the environment and map it onto server settings
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const env = result.data;
  return {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    claudeDir: env.CLAUDE_CONFIG_DIR,
    marketplacesDir: env.PLUGIN_MARKETPLACES_DIR,
    cacheCapacity: env.PLUGIN_CACHE_CAPACITY,
  };
}
