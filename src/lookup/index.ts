/**
 * Registry lookup collaborator and its implementations.
 */

import type { AppConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { HttpRegistryClient } from "./http-client.js";
import { OfflineRegistry } from "./offline.js";
import type { RegistryLookup } from "./types.js";

export { HttpRegistryClient, type HttpRegistryClientOptions } from "./http-client.js";
export { OfflineRegistry } from "./offline.js";
export { StaticRegistry, type StaticRegistryData } from "./static.js";
export {
  fullName,
  type BibliographicWork,
  type DoiLookupResult,
  type OrcidLookupResult,
  type RegisteredPerson,
  type RegistryLookup,
  type WorkAuthor,
} from "./types.js";

/**
 * The lookup the configuration asks for: offline, or the HTTP registries.
 */
export function createRegistryLookup(
  appConfig: Pick<
    AppConfig,
    "appName" | "offline" | "orcidApiUrl" | "crossrefApiUrl" | "crossrefMailto"
  >,
  logger?: Logger
): RegistryLookup {
  if (appConfig.offline) {
    return new OfflineRegistry();
  }
  return new HttpRegistryClient({
    orcidApiUrl: appConfig.orcidApiUrl,
    crossrefApiUrl: appConfig.crossrefApiUrl,
    userAgent: appConfig.appName,
    ...(appConfig.crossrefMailto !== "" && { mailto: appConfig.crossrefMailto }),
    ...(logger && { logger }),
  });
}
