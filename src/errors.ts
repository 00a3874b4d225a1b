export class CatalogFormatError extends Error {
  readonly missingFields: string[];

  constructor(message: string, missingFields: string[] = []) {
    super(message);
    this.name = "CatalogFormatError";
    this.missingFields = missingFields;
  }
}

export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputFormatError";
  }
}
