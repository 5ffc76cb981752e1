#!/usr/bin/env node
/**
 * Validate a ChemKED YAML file and print every issue found.
 *
 * Usage:
 *   npx tsx src/cli/validate.ts <file.yaml> [options]
 *   npm run validate -- <file.yaml>
 *
 * Options:
 *   --offline    Skip ORCID and DOI registry lookups
 *   --json       Print the result as JSON (for CI parsing)
 *   -h, --help   Show help
 *
 * Exit codes:
 *   0 - Valid (warnings may still be printed)
 *   1 - Invalid, or the file could not be read
 */

import { parseArgs } from "node:util";

import { config } from "../config/index.js";
import { readChemKEDFile } from "../document/index.js";
import {
  DocumentValidator,
  formatIssue,
  formatWarning,
  type ValidationResult,
} from "../validation/index.js";
import { c, createCliContext, describeError, UsageError } from "./shared.js";

const HELP = `
Usage: chemked-validate <file.yaml> [options]

Options:
  --offline    Skip ORCID and DOI registry lookups
  --json       Print the result as JSON (for CI parsing)
  -h, --help   Show this help message
`;

function printReport(file: string, result: ValidationResult): void {
  console.log("");
  console.log(c("bold", `─── ${file} ───`));
  for (const issue of result.errors) {
    console.log(`  ${c("red", "✗")} ${formatIssue(issue)}`);
  }
  for (const warning of result.warnings) {
    console.log(`  ${c("yellow", "!")} ${formatWarning(warning)}`);
  }
  console.log("");
  if (result.success) {
    console.log(c("green", `✓ Valid (${result.warnings.length} warning(s))`));
  } else {
    console.log(c("red", `✗ Invalid: ${result.errors.length} error(s)`));
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      offline: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }
  const [file, ...extra] = positionals;
  if (file === undefined || extra.length > 0) {
    throw new UsageError("Expected exactly one file to validate");
  }

  const { logger, lookup } = createCliContext(config, values.offline);
  const validator = new DocumentValidator({ lookup, logger });
  const result = await validator.validate(readChemKEDFile(file));

  if (values.json) {
    console.log(
      JSON.stringify({ file, valid: result.success, errors: result.errors, warnings: result.warnings }, null, 2)
    );
  } else {
    printReport(file, result);
  }
  process.exit(result.success ? 0 : 1);
}

main().catch((err) => {
  console.error(`${c("red", "✗")} ${describeError(err)}`);
  if (err instanceof UsageError) console.error(HELP);
  process.exit(1);
});
