/**
 * Top-level ChemKED document schema.
 *
 * The schema decodes a normalized document (no `common-properties`) into
 * {@link ChemKEDData}: camel-cased, with every physical value held as a
 * tagged {@link ValueNode}. Build it with `semanticChecks: false` to decode
 * trusted input without the semantic rules.
 */

import { z } from "zod";

import { reportSemantic, type SchemaOptions } from "./context.js";
import { datapointSchema, type DatapointData } from "./datapoint.js";
import { ExperimentTypeSchema, SUPPORTED_CHEMKED_VERSIONS, type ExperimentType } from "./enums.js";
import {
  ApparatusSchema,
  authorSchema,
  referenceSchema,
  type Apparatus,
  type Author,
  type Reference,
} from "./reference.js";

export interface ChemKEDData {
  readonly fileAuthors: readonly Author[];
  readonly fileVersion: number;
  readonly chemkedVersion: string;
  readonly reference: Reference;
  readonly experimentType: ExperimentType;
  readonly apparatus: Apparatus;
  readonly datapoints: readonly DatapointData[];
}

function isSupportedVersion(version: string): boolean {
  return SUPPORTED_CHEMKED_VERSIONS.some((supported) => supported === version);
}

export function createChemKEDSchema(options: SchemaOptions) {
  return z
    .object({
      "file-authors": z.array(authorSchema(options)).nonempty(),
      "file-version": z.number().int().min(0),
      "chemked-version": z
        .union([z.string(), z.number()])
        .transform(String)
        .superRefine((version, ctx) => {
          if (!isSupportedVersion(version)) {
            reportSemantic(
              ctx,
              options,
              "unsupported_version",
              `ChemKED version ${version} is not supported; expected one of ${SUPPORTED_CHEMKED_VERSIONS.join(", ")}`
            );
          }
        }),
      reference: referenceSchema(options),
      "experiment-type": ExperimentTypeSchema,
      apparatus: ApparatusSchema,
      datapoints: z.array(datapointSchema(options)).nonempty(),
    })
    .strict()
    .transform(
      (document): ChemKEDData => ({
        fileAuthors: document["file-authors"],
        fileVersion: document["file-version"],
        chemkedVersion: document["chemked-version"],
        reference: document.reference,
        experimentType: document["experiment-type"],
        apparatus: document.apparatus,
        datapoints: document.datapoints,
      })
    );
}

export type ChemKEDSchema = ReturnType<typeof createChemKEDSchema>;
