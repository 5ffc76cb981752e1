/**
 * Errors raised while converting between ChemKED and ReSpecTh.
 */

export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

/** A required XML element is absent or empty. */
export class MissingElementError extends ConversionError {
  constructor(public readonly element: string) {
    super(`Required element ${element} is missing`);
    this.name = "MissingElementError";
  }
}

export class MissingAttributeError extends ConversionError {
  constructor(
    public readonly attribute: string,
    public readonly element: string
  ) {
    super(`Required attribute ${attribute} of ${element} is missing`);
    this.name = "MissingAttributeError";
  }
}

/** A value has no entry in the fixed vocabulary tables. */
export class UnmappedVocabularyError extends ConversionError {
  constructor(
    public readonly vocabulary: string,
    public readonly value: string
  ) {
    super(`No ${vocabulary} mapping for "${value}"`);
    this.name = "UnmappedVocabularyError";
  }
}
