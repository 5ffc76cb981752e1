/**
 * Registry lookups over HTTP: the ORCID public API for people and the
 * Crossref REST API for DOIs.
 *
 * No retries and no timeout beyond what `fetch` does by default. Anything
 * other than a clean answer or a 404 is reported as `unavailable`.
 */

import { z } from "zod";

import { DEFAULT_CROSSREF_API_URL, DEFAULT_ORCID_API_URL } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type {
  BibliographicWork,
  DoiLookupResult,
  OrcidLookupResult,
  RegistryLookup,
  WorkAuthor,
} from "./types.js";

export interface HttpRegistryClientOptions {
  orcidApiUrl?: string;
  crossrefApiUrl?: string;
  /** Contact address sent to Crossref for its polite pool */
  mailto?: string;
  userAgent?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

const NamePartSchema = z.object({ value: z.string() }).nullable().optional();

const OrcidPersonSchema = z.object({
  name: z
    .object({
      "given-names": NamePartSchema,
      "family-name": NamePartSchema,
    })
    .nullable()
    .optional(),
});

const CrossrefAuthorSchema = z.object({
  given: z.string().optional(),
  family: z.string().optional(),
  name: z.string().optional(),
  ORCID: z.string().optional(),
});

const CrossrefWorkSchema = z.object({
  message: z.object({
    DOI: z.string(),
    title: z.array(z.string()).optional(),
    "container-title": z.array(z.string()).optional(),
    issued: z
      .object({ "date-parts": z.array(z.array(z.number().nullable())) })
      .optional(),
    volume: z.string().optional(),
    page: z.string().optional(),
    author: z.array(CrossrefAuthorSchema).optional(),
  }),
});

const ORCID_IN_URL = /(\d{4}-\d{4}-\d{4}-\d{3}[\dX])\/?$/;

type FetchOutcome =
  | { status: "ok"; body: unknown }
  | { status: "not-found" }
  | { status: "unavailable"; reason: string };

function toWork(message: z.infer<typeof CrossrefWorkSchema>["message"]): BibliographicWork {
  const year = message.issued?.["date-parts"][0]?.[0];
  const volume = message.volume !== undefined ? Number(message.volume) : NaN;
  const authors = (message.author ?? []).map((author): WorkAuthor => {
    const orcid = author.ORCID ? ORCID_IN_URL.exec(author.ORCID)?.[1] : undefined;
    return {
      givenNames: author.given ?? "",
      familyName: author.family ?? author.name ?? "",
      ...(orcid !== undefined && { orcid }),
    };
  });

  return {
    doi: message.DOI,
    ...(message.title?.[0] !== undefined && { title: message.title[0] }),
    ...(message["container-title"]?.[0] !== undefined && {
      journal: message["container-title"][0],
    }),
    ...(typeof year === "number" && { year }),
    ...(Number.isInteger(volume) && { volume }),
    ...(message.page !== undefined && { pages: message.page }),
    authors,
  };
}

export class HttpRegistryClient implements RegistryLookup {
  private readonly orcidApiUrl: string;
  private readonly crossrefApiUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpRegistryClientOptions = {}) {
    this.orcidApiUrl = (options.orcidApiUrl ?? DEFAULT_ORCID_API_URL).replace(/\/+$/, "");
    this.crossrefApiUrl = (options.crossrefApiUrl ?? DEFAULT_CROSSREF_API_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;

    const agent = options.userAgent ?? "chemked-toolkit";
    this.headers = {
      accept: "application/json",
      "user-agent": options.mailto ? `${agent} (mailto:${options.mailto})` : agent,
    };
  }

  async lookupOrcid(orcid: string): Promise<OrcidLookupResult> {
    const outcome = await this.getJson(`${this.orcidApiUrl}/${encodeURIComponent(orcid)}/person`);
    if (outcome.status !== "ok") return outcome;

    const parsed = OrcidPersonSchema.safeParse(outcome.body);
    if (!parsed.success) {
      return { status: "unavailable", reason: "unexpected response from the ORCID registry" };
    }
    const name = parsed.data.name;
    const givenNames = name?.["given-names"]?.value ?? "";
    const familyName = name?.["family-name"]?.value ?? "";
    if (givenNames.trim() === "" && familyName.trim() === "") {
      return { status: "name-withheld" };
    }
    return { status: "found", givenNames, familyName };
  }

  async lookupDoi(doi: string): Promise<DoiLookupResult> {
    // DOI suffixes may contain "/", which Crossref expects unescaped
    const path = doi.split("/").map(encodeURIComponent).join("/");
    const outcome = await this.getJson(`${this.crossrefApiUrl}/works/${path}`);
    if (outcome.status !== "ok") return outcome;

    const parsed = CrossrefWorkSchema.safeParse(outcome.body);
    if (!parsed.success) {
      return { status: "unavailable", reason: "unexpected response from Crossref" };
    }
    return { status: "found", work: toWork(parsed.data.message) };
  }

  private async getJson(url: string): Promise<FetchOutcome> {
    this.logger.debug("Registry request", { url });
    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: "GET", headers: this.headers });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn("Registry request failed", { url, reason });
      return { status: "unavailable", reason };
    }

    if (response.status === 404) {
      return { status: "not-found" };
    }
    if (!response.ok) {
      const reason = `HTTP ${response.status} for ${url}`;
      this.logger.warn("Registry request failed", { url, reason });
      return { status: "unavailable", reason };
    }

    try {
      const body: unknown = await response.json();
      return { status: "ok", body };
    } catch (err) {
      const reason = `invalid JSON from ${url}: ${err instanceof Error ? err.message : String(err)}`;
      return { status: "unavailable", reason };
    }
  }
}
