/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { availableParallelism } from "node:os";
import { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export rubric configuration module
export * from "./rubric/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Whether log entries are also appended to a file */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Default size of the scoring worker pool */
  readonly workerPoolSize: number;
}

/**
 * Load application configuration from the environment.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "spectral-evidence-engine"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    workerPoolSize: optionalEnvInt("SPECTRAL_WORKERS", availableParallelism()),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have no safe fallback.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
