/**
 * Pieces shared by the command-line entry points.
 */

import { extname } from "node:path";

import { validateConfig, type AppConfig } from "../config/index.js";
import { DocumentParseError } from "../document/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { createRegistryLookup, type RegistryLookup } from "../lookup/index.js";
import type { Author } from "../schema/index.js";
import { DocumentValidationError, isOrcidFormat } from "../validation/index.js";

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/** Every error type the library raises prints its own details. */
export function describeError(err: unknown): string {
  if (err instanceof DocumentValidationError || err instanceof DocumentParseError) {
    return err.format();
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

// ============================================================
// Setup
// ============================================================

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliContext {
  logger: Logger;
  lookup: RegistryLookup;
}

/**
 * Logger and registry client for one run. `--offline` wins over the
 * CHEMKED_OFFLINE setting.
 */
export function createCliContext(appConfig: AppConfig, offline: boolean): CliContext {
  validateConfig(appConfig);
  initRunId();
  const logger = createLogger({
    level: appConfig.debug ? "debug" : isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info",
    file: appConfig.logToFile,
    logDir: appConfig.logDir,
  });
  const lookup = createRegistryLookup({ ...appConfig, offline: offline || appConfig.offline }, logger);
  return { logger, lookup };
}

// ============================================================
// Arguments
// ============================================================

export type ConversionDirection = "respecth-to-chemked" | "chemked-to-respecth";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);

/**
 * Direction follows the input extension; the output must be the other
 * format.
 */
export function conversionDirection(input: string, output: string): ConversionDirection {
  const from = extname(input).toLowerCase();
  const to = extname(output).toLowerCase();
  if (from === ".xml" && YAML_EXTENSIONS.has(to)) return "respecth-to-chemked";
  if (YAML_EXTENSIONS.has(from) && to === ".xml") return "chemked-to-respecth";
  throw new UsageError(
    `Cannot convert ${input} to ${output}: convert .xml to .yaml/.yml or .yaml/.yml to .xml`
  );
}

export function fileAuthorOption(name: string | undefined, orcid: string | undefined): Author | undefined {
  if (name === undefined) {
    if (orcid !== undefined) {
      throw new UsageError("--file-author-orcid requires --file-author");
    }
    return undefined;
  }
  if (orcid === undefined) return { name };
  if (!isOrcidFormat(orcid)) {
    throw new UsageError(`--file-author-orcid must look like 0000-0000-0000-0000, got ${orcid}`);
  }
  return { name, orcid };
}
