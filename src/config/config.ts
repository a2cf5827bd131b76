import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../util/logger.js";

export interface ProtectConfig {
  host: string;
  apiKey: string;
  logLevel: LogLevel;
  port: number;
}

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

const envSchema = z.object({
  PROTECT_HOST: z.string().trim().min(1, "PROTECT_HOST is required"),
  PROTECT_API_KEY: z.string().trim().min(1, "PROTECT_API_KEY is required"),
  PROTECT_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

/**
 * Reads settings from the environment. Call `dotenv.config()` first when a
 * .env file should be honoured; app.ts does.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProtectConfig {
  const parsed = envSchema.safeParse({
    PROTECT_HOST: env.PROTECT_HOST ?? "",
    PROTECT_API_KEY: env.PROTECT_API_KEY ?? "",
    PROTECT_LOG_LEVEL: env.PROTECT_LOG_LEVEL || undefined,
    PORT: env.PORT || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    host: parsed.data.PROTECT_HOST,
    apiKey: parsed.data.PROTECT_API_KEY,
    logLevel: parsed.data.PROTECT_LOG_LEVEL,
    port: parsed.data.PORT,
  };
}

export default loadConfig;
