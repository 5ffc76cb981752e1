/**
 * Authors, bibliographic reference and apparatus.
 */

import { z } from "zod";

import { isOrcidFormat, isValidOrcidChecksum } from "../validation/orcid.js";
import { reportSemantic, reportStructural, type SchemaOptions } from "./context.js";
import { ApparatusKindSchema } from "./enums.js";

export interface Author {
  readonly name: string;
  readonly orcid?: string;
}

export function authorSchema(options: SchemaOptions) {
  return z
    .object({
      name: z.string().min(1),
      ORCID: z.string().optional(),
    })
    .strict()
    .superRefine((author, ctx) => {
      const orcid = author.ORCID;
      if (orcid === undefined) return;
      if (!isOrcidFormat(orcid)) {
        reportStructural(
          ctx,
          "orcid_format",
          `ORCID "${orcid}" must look like 0000-0000-0000-0000`,
          ["ORCID"]
        );
      } else if (!isValidOrcidChecksum(orcid)) {
        reportSemantic(ctx, options, "orcid_checksum", `ORCID "${orcid}" has an invalid checksum`, [
          "ORCID",
        ]);
      }
    })
    .transform((author): Author =>
      author.ORCID === undefined ? { name: author.name } : { name: author.name, orcid: author.ORCID }
    );
}

export interface Reference {
  readonly doi?: string;
  readonly journal?: string;
  readonly year: number;
  readonly volume?: number;
  readonly pages?: string;
  readonly detail?: string;
  readonly authors: readonly Author[];
}

export function defaultMaxYear(): number {
  return new Date().getFullYear() + 1;
}

export function referenceSchema(options: SchemaOptions) {
  const maxYear = options.maxYear ?? defaultMaxYear();
  return z
    .object({
      doi: z.string().min(1).optional(),
      journal: z.string().optional(),
      year: z.number().int().gt(1600),
      volume: z.number().int().positive().optional(),
      pages: z.union([z.string(), z.number()]).optional(),
      detail: z.string().optional(),
      authors: z.array(authorSchema(options)).nonempty(),
    })
    .strict()
    .superRefine((reference, ctx) => {
      if (reference.year > maxYear) {
        reportSemantic(
          ctx,
          options,
          "year_range",
          `Year ${reference.year} is later than ${maxYear}`,
          ["year"]
        );
      }
    })
    .transform(
      (reference): Reference => ({
        ...(reference.doi !== undefined && { doi: reference.doi }),
        ...(reference.journal !== undefined && { journal: reference.journal }),
        year: reference.year,
        ...(reference.volume !== undefined && { volume: reference.volume }),
        ...(reference.pages !== undefined && { pages: String(reference.pages) }),
        ...(reference.detail !== undefined && { detail: reference.detail }),
        authors: reference.authors,
      })
    );
}

export interface Apparatus {
  readonly kind: z.infer<typeof ApparatusKindSchema>;
  readonly institution?: string;
  readonly facility?: string;
}

export const ApparatusSchema = z
  .object({
    kind: ApparatusKindSchema,
    institution: z.string().optional(),
    facility: z.string().optional(),
  })
  .strict()
  .transform(
    (apparatus): Apparatus => ({
      kind: apparatus.kind,
      ...(apparatus.institution !== undefined && { institution: apparatus.institution }),
      ...(apparatus.facility !== undefined && { facility: apparatus.facility }),
    })
  );
