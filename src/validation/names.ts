/**
 * Heuristic comparison of an author name against the given and family
 * names a registry holds for that person.
 *
 * Accepted variants of "Josiah Carberry": "Josiah E. Carberry", "J. E. Carberry",
 * "JE Carberry", "J Carberry", "Carberry, Josiah E". Hyphenated given names
 * split into initials ("Mei-Ling Tan", "M.-L. Tan", "ML Tan").
 */

const GIVEN_SEPARATORS = /[, \-.]+/;
const FAMILY_SEPARATORS = /[, .]+/;

function splitOn(text: string, separators: RegExp): string[] {
  return text.split(separators).filter((part) => part !== "");
}

/** "family, given middle" → "given middle family" */
function reorder(name: string): string {
  if (!name.includes(",")) return name;
  return name.split(",").reverse().join(" ").trim();
}

function initial(part: string): string {
  return part.charAt(0);
}

export function compareName(givenName: string, familyName: string, questionName: string): boolean {
  const given = givenName.toLowerCase().replace(/\./g, "");
  const family = familyName.toLowerCase().replace(/\./g, "").trim();
  const question = reorder(questionName.toLowerCase()).replace(/\./g, "");

  const givenParts = splitOn(given, GIVEN_SEPARATORS);
  const familyCount = splitOn(family, FAMILY_SEPARATORS).length;
  const questionParts = splitOn(question, GIVEN_SEPARATORS);
  if (givenParts.length === 0 || questionParts.length === 0) return false;

  const firstNames = [
    questionParts[0] ?? "",
    ...(questionParts.length > 2 ? questionParts.slice(1, -familyCount) : []),
  ];

  // Only as many given names as both sides supply are compared, by initial
  const count = Math.min(firstNames.length, givenParts.length);
  for (let i = 0; i < count; i++) {
    if (initial(firstNames[i] ?? "") !== initial(givenParts[i] ?? "")) {
      return false;
    }
  }

  // Hyphenated family names were split above and are joined back
  const familyCompare =
    familyCount === 1 && family.includes("-")
      ? questionParts.slice(-(family.split("-").length)).join("-")
      : questionParts.slice(-familyCount).join(" ");

  return family === familyCompare;
}
