/**
 * ORCID identifier format and checksum (ISO 7064 MOD 11-2).
 */

export const ORCID_PATTERN = /^\d{4}-\d{4}-\d{4}-\d{3}[\dX]$/;

export function isOrcidFormat(orcid: string): boolean {
  return ORCID_PATTERN.test(orcid);
}

/**
 * Check digit for the first fifteen digits of an ORCID; 10 is written "X".
 */
export function orcidCheckDigit(baseDigits: string): string {
  let total = 0;
  for (const char of baseDigits) {
    total = (total + Number(char)) * 2;
  }
  const check = (12 - (total % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

export function isValidOrcidChecksum(orcid: string): boolean {
  if (!isOrcidFormat(orcid)) return false;
  const digits = orcid.replace(/-/g, "");
  return orcidCheckDigit(digits.slice(0, 15)) === digits.slice(15);
}
