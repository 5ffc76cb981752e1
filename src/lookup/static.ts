import type {
  BibliographicWork,
  DoiLookupResult,
  OrcidLookupResult,
  RegisteredPerson,
  RegistryLookup,
} from "./types.js";

export interface StaticRegistryData {
  /** `null` marks a person whose record has no public name */
  people?: Record<string, RegisteredPerson | null>;
  works?: BibliographicWork[];
  /** Identifiers that behave as if the registry could not be reached */
  unavailable?: string[];
}

/**
 * In-memory registry, for tests and for pre-resolved identities.
 * Unknown identifiers are reported as not found.
 */
export class StaticRegistry implements RegistryLookup {
  private readonly people: Map<string, RegisteredPerson | null>;
  private readonly works: Map<string, BibliographicWork>;
  private readonly unavailable: Set<string>;
  /** Every identifier asked for, in order */
  readonly requests: string[] = [];

  constructor(data: StaticRegistryData = {}) {
    this.people = new Map(Object.entries(data.people ?? {}));
    this.works = new Map((data.works ?? []).map((work) => [work.doi.toLowerCase(), work]));
    this.unavailable = new Set(data.unavailable ?? []);
  }

  async lookupOrcid(orcid: string): Promise<OrcidLookupResult> {
    this.requests.push(orcid);
    if (this.unavailable.has(orcid)) {
      return { status: "unavailable", reason: "registry unreachable" };
    }
    const person = this.people.get(orcid);
    if (person === undefined) return { status: "not-found" };
    return person ? { status: "found", ...person } : { status: "name-withheld" };
  }

  async lookupDoi(doi: string): Promise<DoiLookupResult> {
    this.requests.push(doi);
    if (this.unavailable.has(doi)) {
      return { status: "unavailable", reason: "registry unreachable" };
    }
    const work = this.works.get(doi.toLowerCase());
    return work ? { status: "found", work } : { status: "not-found" };
  }
}
