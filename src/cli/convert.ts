#!/usr/bin/env node
/**
 * Convert between ReSpecTh XML and ChemKED YAML.
 *
 * Usage:
 *   npx tsx src/cli/convert.ts -i <input> -o <output> [options]
 *   npm run convert -- -i <input> -o <output>
 *
 * The direction follows the input extension: .xml is read as ReSpecTh and
 * written as ChemKED; .yaml/.yml the other way round.
 *
 * Options:
 *   -i, --input <path>           File to convert
 *   -o, --output <path>          File to write
 *   --file-author <name>         Author of the converted file
 *   --file-author-orcid <id>     ORCID of that author
 *   --offline                    Skip ORCID and DOI registry lookups
 *   -h, --help                   Show help
 *
 * Exit codes:
 *   0 - Converted
 *   1 - Bad arguments, unreadable input, or a failed conversion
 */

import { readFileSync, writeFileSync } from "node:fs";
import { basename } from "node:path";
import { parseArgs } from "node:util";

import { config } from "../config/index.js";
import { convertChemKEDToReSpecTh, convertReSpecThToChemKED } from "../converters/index.js";
import { toChemKEDYaml } from "../document/index.js";
import { ChemKED } from "../record/index.js";
import { DocumentValidator } from "../validation/index.js";
import {
  c,
  conversionDirection,
  createCliContext,
  describeError,
  fileAuthorOption,
  UsageError,
} from "./shared.js";

const HELP = `
Usage: chemked-convert -i <input> -o <output> [options]

Options:
  -i, --input <path>           File to convert (.xml, .yaml or .yml)
  -o, --output <path>          File to write
  --file-author <name>         Author of the converted file
  --file-author-orcid <id>     ORCID of that author
  --offline                    Skip ORCID and DOI registry lookups
  -h, --help                   Show this help message
`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      "file-author": { type: "string" },
      "file-author-orcid": { type: "string" },
      offline: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (values.input === undefined || values.output === undefined) {
    throw new UsageError("Both --input and --output are required");
  }

  const input = values.input;
  const output = values.output;
  const direction = conversionDirection(input, output);
  const fileAuthor = fileAuthorOption(values["file-author"], values["file-author-orcid"]);
  const { logger, lookup } = createCliContext(config, values.offline);

  if (direction === "respecth-to-chemked") {
    const { document } = await convertReSpecThToChemKED(readFileSync(input, "utf-8"), {
      lookup,
      fileAuthor,
      sourceName: basename(input),
      validate: true,
      logger,
    });
    writeFileSync(output, toChemKEDYaml(document), "utf-8");
  } else {
    const record = await ChemKED.fromFile(input, {
      validator: new DocumentValidator({ lookup, logger }),
    });
    const { xml, droppedFields } = convertChemKEDToReSpecTh(record, { fileAuthor });
    for (const field of droppedFields) {
      logger.warn(`Not written to ReSpecTh: ${field.path} (${field.reason})`);
    }
    writeFileSync(output, xml, "utf-8");
  }

  logger.info("Conversion finished", { input, output });
  console.log(`${c("green", "✓")} ${input} → ${output}`);
}

main().catch((err) => {
  console.error(`${c("red", "✗")} ${describeError(err)}`);
  if (err instanceof UsageError) console.error(HELP);
  process.exit(1);
});
