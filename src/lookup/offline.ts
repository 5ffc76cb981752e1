import type { DoiLookupResult, OrcidLookupResult, RegistryLookup } from "./types.js";

/**
 * Lookup that never reaches a registry. Identity checks degrade to warnings.
 */
export class OfflineRegistry implements RegistryLookup {
  constructor(private readonly reason = "registry lookups are disabled (offline mode)") {}

  async lookupOrcid(_orcid: string): Promise<OrcidLookupResult> {
    return { status: "unavailable", reason: this.reason };
  }

  async lookupDoi(_doi: string): Promise<DoiLookupResult> {
    return { status: "unavailable", reason: this.reason };
  }
}
