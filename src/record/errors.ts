/**
 * Raised when a species' molecular weight cannot be determined.
 */
export class MolecularWeightError extends Error {
  constructor(
    message: string,
    public readonly species: string
  ) {
    super(message);
    this.name = "MolecularWeightError";
  }
}
