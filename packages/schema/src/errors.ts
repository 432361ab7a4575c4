export type BindgenErrorCode =
  | "PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "MAPPING_ERROR"
  | "LOWERING_ERROR"
  | "INTERNAL_ERROR";

export class BindgenError extends Error {
  readonly code: BindgenErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: BindgenErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

export class SchemaParseError extends BindgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_ERROR", message, details);
  }
}

export class SchemaValidationError extends BindgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
  }
}

/** A native type reached an emitter without an entry in the table it was looked up in. */
export class UnmappedTypeError extends BindgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MAPPING_ERROR", message, details);
  }
}

export class LoweringError extends BindgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("LOWERING_ERROR", message, details);
  }
}

/** Broken generator invariant; a well-formed schema never triggers it. */
export class InternalError extends BindgenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INTERNAL_ERROR", message, details);
  }
}
