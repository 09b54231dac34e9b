/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvPath } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export engine configuration module
export * from "./engine/index.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Also append log lines to output/logs/app.log */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Processed taxonomy JSON consumed by the entry point and CLI */
  readonly taxonomyPath: string;
  /** Optional JSON file with engine threshold overrides */
  readonly engineConfigPath: string | undefined;
  /** Where a finished session's priorities export is written */
  readonly prioritiesPath: string;
}

/**
 * Load application configuration from the environment.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "esg-preference-engine"),
    taxonomyPath: optionalEnv("TAXONOMY_PATH", "data/taxonomy.sample.json"),
    engineConfigPath: optionalEnvPath("ENGINE_CONFIG_PATH"),
    prioritiesPath: optionalEnv("PRIORITIES_PATH", "output/priorities.json"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Narrow a configured log level string.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate that all required configuration is present.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
