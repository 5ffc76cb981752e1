/**
 * ═══════════════════════════════════════════════════════════════════════════
 * REGISTRY CHECKS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Identity checks that need an external registry:
 *
 *   ORCID  → the registered name must match the author name given, unless
 *            the record keeps its name private
 *   DOI    → must resolve; journal, year, volume, pages and the author list
 *            must agree with what the registry holds
 *
 * Lookups run one after another and each identifier is looked up once per
 * validation run. A registry that cannot be reached, or a lookup that
 * rejects, produces a warning, never an error.
 */

import { isMapping } from "../document/index.js";
import {
  fullName,
  type BibliographicWork,
  type DoiLookupResult,
  type OrcidLookupResult,
  type RegistryLookup,
} from "../lookup/index.js";
import { normalizeDoi } from "./doi.js";
import { joinPath, type LookupWarning, type ValidationIssue } from "./issues.js";
import { compareName } from "./names.js";
import { isValidOrcidChecksum } from "./orcid.js";

interface RawAuthor {
  name: string;
  orcid?: string;
  path: Array<string | number>;
}

export interface RegistryCheckResult {
  errors: ValidationIssue[];
  warnings: LookupWarning[];
}

function readAuthors(value: unknown, path: Array<string | number>): RawAuthor[] {
  if (!Array.isArray(value)) return [];
  const authors: RawAuthor[] = [];
  value.forEach((author, index) => {
    if (!isMapping(author) || typeof author.name !== "string") return;
    const orcid = typeof author.ORCID === "string" ? author.ORCID : undefined;
    authors.push({ name: author.name, ...(orcid !== undefined && { orcid }), path: [...path, index] });
  });
  return authors;
}

function semantic(path: Array<string | number>, rule: string, message: string): ValidationIssue {
  return { path: joinPath(path), message, kind: "semantic", rule };
}

function normalizePages(pages: string): string {
  return pages.replace(/[‐-―]/g, "-").replace(/\s+/g, "");
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * One validation run's worth of registry checks.
 */
export class RegistryChecker {
  private readonly orcidCache = new Map<string, OrcidLookupResult>();
  private readonly doiCache = new Map<string, DoiLookupResult>();
  private readonly errors: ValidationIssue[] = [];
  private readonly warnings: LookupWarning[] = [];

  constructor(private readonly lookup: RegistryLookup) {}

  async check(document: unknown): Promise<RegistryCheckResult> {
    if (!isMapping(document)) return { errors: [], warnings: [] };

    const reference: Record<string, unknown> = isMapping(document.reference)
      ? document.reference
      : {};
    const authors = [
      ...readAuthors(document["file-authors"], ["file-authors"]),
      ...readAuthors(reference.authors, ["reference", "authors"]),
    ];
    for (const author of authors) {
      await this.checkAuthor(author);
    }

    if (typeof reference.doi === "string") {
      await this.checkReference(reference, readAuthors(reference.authors, ["reference", "authors"]));
    }

    return { errors: [...this.errors], warnings: [...this.warnings] };
  }

  private async lookupOrcid(orcid: string): Promise<OrcidLookupResult> {
    const cached = this.orcidCache.get(orcid);
    if (cached) return cached;
    let result: OrcidLookupResult;
    try {
      result = await this.lookup.lookupOrcid(orcid);
    } catch (err) {
      result = { status: "unavailable", reason: describeFailure(err) };
    }
    this.orcidCache.set(orcid, result);
    return result;
  }

  private async lookupDoi(doi: string): Promise<DoiLookupResult> {
    const cached = this.doiCache.get(doi);
    if (cached) return cached;
    let result: DoiLookupResult;
    try {
      result = await this.lookup.lookupDoi(doi);
    } catch (err) {
      result = { status: "unavailable", reason: describeFailure(err) };
    }
    this.doiCache.set(doi, result);
    return result;
  }

  private warnUnavailable(path: Array<string | number>, what: string, reason: string): void {
    this.warnings.push({
      code: "registry_unavailable",
      path: joinPath(path),
      message: `Could not check ${what}: ${reason}`,
    });
  }

  private async checkAuthor(author: RawAuthor): Promise<void> {
    // Malformed identifiers are already reported by the schema
    if (author.orcid === undefined || !isValidOrcidChecksum(author.orcid)) return;
    const path = [...author.path, "ORCID"];
    const result = await this.lookupOrcid(author.orcid);

    switch (result.status) {
      case "unavailable":
        this.warnUnavailable(path, `ORCID ${author.orcid}`, result.reason);
        return;
      case "name-withheld":
        this.warnings.push({
          code: "orcid_name_unavailable",
          path: joinPath(path),
          message: `ORCID ${author.orcid} has no public name; could not check it against ${author.name}`,
        });
        return;
      case "not-found":
        this.errors.push(
          semantic(path, "orcid_not_found", `ORCID incorrect or invalid for ${author.name}`)
        );
        return;
      case "found":
        if (!compareName(result.givenNames, result.familyName, author.name)) {
          this.errors.push(
            semantic(
              path,
              "orcid_name_mismatch",
              `Name and ORCID do not match. Name supplied: ${author.name}. Name associated with ORCID: ${fullName(result)}`
            )
          );
        }
        return;
    }
  }

  private async checkReference(reference: Record<string, unknown>, authors: RawAuthor[]): Promise<void> {
    const doi = normalizeDoi(String(reference.doi));
    const path = ["reference", "doi"];
    const result = await this.lookupDoi(doi);

    switch (result.status) {
      case "unavailable":
        this.warnUnavailable(path, `DOI ${doi}`, result.reason);
        return;
      case "not-found":
        this.errors.push(semantic(path, "doi_not_found", `DOI not found: ${doi}`));
        return;
      case "found":
        this.compareMetadata(reference, result.work);
        this.compareAuthors(authors, result.work);
        return;
    }
  }

  private compareMetadata(reference: Record<string, unknown>, work: BibliographicWork): void {
    const mismatch = (key: string, expected: string | number): void => {
      this.errors.push(
        semantic(["reference", key], "reference_mismatch", `${key} should be ${expected}`)
      );
    };

    if (typeof reference.journal === "string" && work.journal !== undefined) {
      if (!sameText(reference.journal, work.journal)) mismatch("journal", work.journal);
    }
    if (typeof reference.year === "number" && work.year !== undefined) {
      if (reference.year !== work.year) mismatch("year", work.year);
    }
    if (typeof reference.volume === "number" && work.volume !== undefined) {
      if (reference.volume !== work.volume) mismatch("volume", work.volume);
    }
    if (
      (typeof reference.pages === "string" || typeof reference.pages === "number") &&
      work.pages !== undefined
    ) {
      if (normalizePages(String(reference.pages)) !== normalizePages(work.pages)) {
        mismatch("pages", work.pages);
      }
    }
  }

  private compareAuthors(authors: RawAuthor[], work: BibliographicWork): void {
    if (work.authors.length === 0) return;

    const matched = new Set<RawAuthor>();
    const missing: string[] = [];
    for (const registered of work.authors) {
      const author = authors.find(
        (candidate) =>
          !matched.has(candidate) &&
          compareName(registered.givenNames, registered.familyName, candidate.name)
      );
      if (!author) {
        missing.push(fullName(registered));
        continue;
      }
      matched.add(author);

      if (registered.orcid === undefined) continue;
      if (author.orcid === undefined) {
        this.warnings.push({
          code: "orcid_suggestion",
          path: joinPath(author.path),
          message: `${author.name} has ORCID ${registered.orcid} in the registry; consider adding it`,
        });
      } else if (author.orcid !== registered.orcid) {
        this.errors.push(
          semantic(
            [...author.path, "ORCID"],
            "orcid_mismatch",
            `ORCID ${author.orcid} for ${author.name} does not match the registry (${registered.orcid})`
          )
        );
      }
    }

    if (missing.length > 0) {
      this.errors.push(
        semantic(["reference", "authors"], "author_mismatch", `Missing author: ${missing.join(", ")}`)
      );
    }
    const extra = authors.filter((author) => !matched.has(author)).map((author) => author.name);
    if (extra.length > 0) {
      this.errors.push(
        semantic(["reference", "authors"], "author_mismatch", `Extra author(s) given: ${extra.join(", ")}`)
      );
    }
  }
}
