/**
 * Mixture composition: a kind plus an ordered list of species.
 */

import { z } from "zod";

import { reportSemantic, reportStructural, type SchemaOptions } from "./context.js";
import { CompositionKindSchema, type CompositionKind } from "./enums.js";
import { valueField, type ValueNode } from "./values.js";

export interface ElementAmount {
  readonly element: string;
  readonly amount: number;
}

/** Exactly one way of identifying a species. */
export type SpeciesIdentity =
  | { readonly kind: "InChI"; readonly value: string }
  | { readonly kind: "SMILES"; readonly value: string }
  | { readonly kind: "atomic-composition"; readonly elements: readonly ElementAmount[] };

export interface SpeciesEntry {
  readonly name: string;
  readonly identity: SpeciesIdentity;
  readonly amount: ValueNode;
}

export interface CompositionData {
  readonly kind: CompositionKind;
  readonly species: readonly SpeciesEntry[];
}

const IDENTITY_KEYS = ["InChI", "SMILES", "atomic-composition"] as const;

const ElementAmountSchema = z
  .object({
    element: z.string().min(1),
    amount: z.number().positive(),
  })
  .strict();

/** numpy-style closeness: |a - b| <= atol + rtol * |b| */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
  return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/** Value the amounts of a composition of this kind must add up to. */
export function compositionTotal(kind: CompositionKind): number {
  return kind === "mole percent" ? 100 : 1;
}

function speciesSchema(options: SchemaOptions) {
  return z
    .object({
      "species-name": z.string().min(1),
      InChI: z.string().min(1).optional(),
      SMILES: z.string().min(1).optional(),
      "atomic-composition": z.array(ElementAmountSchema).nonempty().optional(),
      amount: valueField(options, { kind: "dimensionless" }),
    })
    .strict()
    .transform((species, ctx): SpeciesEntry => {
      const given = IDENTITY_KEYS.filter((key) => species[key] !== undefined);
      if (given.length !== 1) {
        reportStructural(
          ctx,
          "species_identity",
          given.length === 0
            ? "One of InChI, SMILES or atomic-composition is required"
            : `Only one of InChI, SMILES or atomic-composition may be given, found ${given.join(" and ")}`,
          given.length === 0 ? [] : [given[1] ?? given[0] ?? ""]
        );
        return z.NEVER;
      }

      let identity: SpeciesIdentity;
      if (species.InChI !== undefined) {
        identity = { kind: "InChI", value: species.InChI };
      } else if (species.SMILES !== undefined) {
        identity = { kind: "SMILES", value: species.SMILES };
      } else {
        identity = { kind: "atomic-composition", elements: species["atomic-composition"] ?? [] };
      }
      return { name: species["species-name"], identity, amount: species.amount };
    });
}

export function compositionSchema(options: SchemaOptions) {
  return z
    .object({
      kind: CompositionKindSchema,
      species: z.array(speciesSchema(options)).nonempty(),
    })
    .strict()
    .superRefine((composition, ctx) => {
      const total = compositionTotal(composition.kind);
      let sum = 0;
      composition.species.forEach((species, index) => {
        const amount = species.amount.value.magnitude;
        sum += amount;
        if (amount < 0 || amount > total) {
          reportSemantic(
            ctx,
            options,
            "composition_bounds",
            `${composition.kind} of ${species.name} must be between 0 and ${total}, got ${amount}`,
            ["species", index, "amount"]
          );
        }
      });
      if (!isClose(sum, total)) {
        reportSemantic(
          ctx,
          options,
          "composition_sum",
          `Species amounts for ${composition.kind} must sum to ${total}, got ${sum}`,
          ["species"]
        );
      }
    })
    .transform(
      (composition): CompositionData => ({ kind: composition.kind, species: composition.species })
    );
}
