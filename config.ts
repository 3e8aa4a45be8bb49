import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_BASE_URL = "https://public-api.linearb.io";
export const DEFAULT_TIMEOUT_SECONDS = 30;
// setTimeout overflows past 2^31 - 1 milliseconds.
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export interface ServerConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  LINEARB_API_KEY: z
    .string({ required_error: "environment variable is required" })
    .trim()
    .min(1, "environment variable is required"),
  LINEARB_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  API_TIMEOUT: z.coerce
    .number()
    .positive("must be a positive number of seconds")
    .finite("must be a finite number of seconds")
    .max(
      MAX_TIMEOUT_SECONDS,
      `must be at most ${MAX_TIMEOUT_SECONDS} seconds`,
    )
    .default(DEFAULT_TIMEOUT_SECONDS),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

/**
 * Loads variables from the dotenv file (LINEARB_ENV_FILE, or .env in the
 * working directory) into `env` without overriding what it already sets.
 * A missing default .env is fine; a named file that cannot be read is not.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  const path = env.LINEARB_ENV_FILE;
  const loaded: Record<string, string> = {};
  const result = dotenv.config({
    ...(path ? { path } : {}),
    processEnv: loaded,
  });
  if (path && result.error) {
    throw new ConfigError(
      `Cannot read env file ${path}: ${result.error.message}`,
    );
  }
  for (const [key, value] of Object.entries(loaded)) {
    env[key] ??= value;
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const { LINEARB_API_KEY, LINEARB_BASE_URL, API_TIMEOUT, LOG_LEVEL } =
    parsed.data;
  return {
    apiKey: LINEARB_API_KEY,
    baseUrl: LINEARB_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: Math.round(API_TIMEOUT * 1000),
    logLevel: LOG_LEVEL,
  };
}
