/**
 * Shape of a parsed ReSpecTh file.
 *
 * fast-xml-parser hands back untyped objects; the schemas below check the
 * parts the converter reads and give them types. Attributes carry an `@_`
 * prefix and element text sits under `#text` when the element also has
 * attributes.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";

import { ConversionError } from "./errors.js";

export const ATTRIBUTE_PREFIX = "@_";

const ARRAY_PATHS = new Set([
  "experiment.commonProperties.property",
  "experiment.commonProperties.property.component",
  "experiment.dataGroup",
  "experiment.dataGroup.property",
  "experiment.dataGroup.dataPoint",
]);

const TextSchema = z.union([
  z.string(),
  z
    .object({ "#text": z.string().optional() })
    .passthrough()
    .transform((node) => node["#text"] ?? ""),
]);

/** Elements left empty in the file parse as "". */
function element<T extends z.ZodTypeAny>(schema: T) {
  return z.union([z.literal("").transform(() => undefined), schema]);
}

const SpeciesLinkSchema = z
  .object({
    "@_preferredKey": z.string().optional(),
    "@_InChI": z.string().optional(),
  })
  .passthrough();

const AmountSchema = z.union([
  z.string().transform((text) => ({ units: undefined, text })),
  z
    .object({ "@_units": z.string().optional(), "#text": z.string().optional() })
    .passthrough()
    .transform((node) => ({ units: node["@_units"], text: node["#text"] ?? "" })),
]);

const ComponentSchema = z
  .object({
    speciesLink: element(SpeciesLinkSchema).optional(),
    amount: AmountSchema.optional(),
  })
  .passthrough();

const PropertySchema = z
  .object({
    "@_name": z.string().optional(),
    "@_id": z.string().optional(),
    "@_units": z.string().optional(),
    "@_reference": z.string().optional(),
    "@_kind": z.string().optional(),
    "@_bound": z.string().optional(),
    value: TextSchema.optional(),
    component: z.array(ComponentSchema).optional(),
    speciesLink: element(SpeciesLinkSchema).optional(),
  })
  .passthrough();

const DataPointSchema = z.union([
  z.literal("").transform((): Record<string, string> => ({})),
  z.record(TextSchema),
]);

const DataGroupSchema = z
  .object({
    "@_id": z.string().optional(),
    property: z.array(PropertySchema).default([]),
    dataPoint: z.array(DataPointSchema).default([]),
  })
  .passthrough();

const ExperimentSchema = z
  .object({
    fileAuthor: TextSchema.optional(),
    bibliographyLink: element(
      z
        .object({
          "@_preferredKey": z.string().optional(),
          "@_doi": z.string().optional(),
        })
        .passthrough()
    ).optional(),
    experimentType: TextSchema.optional(),
    apparatus: element(z.object({ kind: TextSchema.optional() }).passthrough()).optional(),
    commonProperties: element(
      z.object({ property: z.array(PropertySchema).default([]) }).passthrough()
    ).optional(),
    dataGroup: z.array(element(DataGroupSchema)).default([]),
    ignitionType: element(
      z
        .object({
          "@_target": z.string().optional(),
          "@_type": z.string().optional(),
        })
        .passthrough()
    ).optional(),
  })
  .passthrough();

const FileSchema = z.object({ experiment: ExperimentSchema });

export type ReSpecThExperiment = z.infer<typeof ExperimentSchema>;
export type ReSpecThProperty = z.infer<typeof PropertySchema>;
export type ReSpecThDataGroup = z.infer<typeof DataGroupSchema>;
export type ReSpecThComponent = z.infer<typeof ComponentSchema>;

export function parseReSpecTh(xml: string): ReSpecThExperiment {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ConversionError(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
  });
  const parsed = FileSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConversionError(`Not a ReSpecTh experiment file: ${detail}`);
  }
  return parsed.data.experiment;
}
