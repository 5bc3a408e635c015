// Error types for CityJSON / CityJSONSeq processing
// Library code throws these; only the CLI turns them into an exit code

export class CjseqError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CjseqError';
  }
}

// Wrong document type tag, unsupported version, or a shape that does not match the format
export class CityJsonError extends CjseqError {
  constructor(message: string) {
    super(`CityJSON error: ${message}`);
    this.name = 'CityJsonError';
  }
}

export class JsonParseError extends CjseqError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(
      line === undefined
        ? `Failed to parse JSON: ${message}`
        : `Failed to parse JSON on line ${line}: ${message}`
    );
    this.name = 'JsonParseError';
    this.line = line;
  }
}

// A child/parent id, material, texture or texture vertex that is referenced but absent
export class MissingReferenceError extends CjseqError {
  readonly reference: string;

  constructor(reference: string, referencedBy: string) {
    super(`Missing reference: ${reference} (referenced by ${referencedBy})`);
    this.name = 'MissingReferenceError';
    this.reference = reference;
  }
}

export class InvalidValueError extends CjseqError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid value for ${field}: ${reason}`);
    this.name = 'InvalidValueError';
    this.field = field;
  }
}
