/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvUrl,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

export const DEFAULT_ORCID_API_URL = "https://pub.orcid.org/v3.0";
export const DEFAULT_CROSSREF_API_URL = "https://api.crossref.org";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name, used in the registry User-Agent */
  readonly appName: string;
  /** Also append log entries to a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Skip ORCID and DOI registry lookups entirely */
  readonly offline: boolean;
  readonly orcidApiUrl: string;
  readonly crossrefApiUrl: string;
  /** Contact address sent to Crossref so requests land in the polite pool */
  readonly crossrefMailto: string;
}

/**
 * Load application configuration from an environment source.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "chemked-toolkit", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    offline: optionalEnvBool("CHEMKED_OFFLINE", false, env),
    orcidApiUrl: optionalEnvUrl("ORCID_API_URL", DEFAULT_ORCID_API_URL, env),
    crossrefApiUrl: optionalEnvUrl("CROSSREF_API_URL", DEFAULT_CROSSREF_API_URL, env),
    crossrefMailto: optionalEnv("CROSSREF_MAILTO", "", env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have a closed set of options.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (appConfig.crossrefMailto !== "" && !appConfig.crossrefMailto.includes("@")) {
    throw new ConfigError(
      `Invalid CROSSREF_MAILTO: ${appConfig.crossrefMailto}. Must be an email address.`
    );
  }
}
