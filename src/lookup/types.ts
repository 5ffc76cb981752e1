/**
 * Contract of the identity and bibliographic registry collaborator.
 *
 * Every lookup resolves; transport failures come back as `unavailable`
 * so validation keeps working offline.
 */

export interface RegisteredPerson {
  givenNames: string;
  familyName: string;
}

export type OrcidLookupResult =
  | ({ status: "found" } & RegisteredPerson)
  /** The identifier exists but its record has no public name */
  | { status: "name-withheld" }
  | { status: "not-found" }
  | { status: "unavailable"; reason: string };

export interface WorkAuthor {
  givenNames: string;
  familyName: string;
  orcid?: string;
}

export interface BibliographicWork {
  doi: string;
  title?: string;
  journal?: string;
  year?: number;
  volume?: number;
  pages?: string;
  authors: WorkAuthor[];
}

export type DoiLookupResult =
  | { status: "found"; work: BibliographicWork }
  | { status: "not-found" }
  | { status: "unavailable"; reason: string };

export interface RegistryLookup {
  lookupOrcid(orcid: string): Promise<OrcidLookupResult>;
  lookupDoi(doi: string): Promise<DoiLookupResult>;
}

/** "Josiah E. Carberry" */
export function fullName(person: { givenNames: string; familyName: string }): string {
  return `${person.givenNames} ${person.familyName}`.trim();
}
