/**
 * DOI clean-up before lookup: whitespace, a `doi:` label, resolver URLs and
 * trailing punctuation picked up from citations are removed.
 */
export function normalizeDoi(doi: string): string {
  return doi
    .trim()
    .replace(/^doi:\s*/i, "")
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, "")
    .replace(/[.,;:]+$/, "");
}
