//==============================================================================
// Schema Error Codes
//==============================================================================

export const SchemaErrorCode = {
  // Stream errors: the input could not be read at all
  STREAM_UNAVAILABLE: "STREAM_UNAVAILABLE",
  INVALID_JSON: "INVALID_JSON",

  // Structural-invariant errors
  MISSING_NAME: "MISSING_NAME",
  EMPTY_RECORD: "EMPTY_RECORD",
  FIELD_COUNT_MISMATCH: "FIELD_COUNT_MISMATCH",
  DUPLICATE_FIELD: "DUPLICATE_FIELD",
  EMPTY_ENUM: "EMPTY_ENUM",
  DUPLICATE_SYMBOL: "DUPLICATE_SYMBOL",
  ARRAY_ARITY: "ARRAY_ARITY",
  MAP_ARITY: "MAP_ARITY",
  MAP_KEY: "MAP_KEY",
  EMPTY_UNION: "EMPTY_UNION",
  DUPLICATE_BRANCH: "DUPLICATE_BRANCH",
  NESTED_UNION: "NESTED_UNION",
  MISSING_SIZE: "MISSING_SIZE",
  INVALID_SIZE: "INVALID_SIZE",
  DUPLICATE_TYPE: "DUPLICATE_TYPE",
  UNKNOWN_KIND: "UNKNOWN_KIND",
  INVALID_SCHEMA: "INVALID_SCHEMA",

  // Reference errors
  UNDEFINED_TYPE: "UNDEFINED_TYPE",
  SYMBOLIC_NAME_MISMATCH: "SYMBOLIC_NAME_MISMATCH",
  BROKEN_REFERENCE: "BROKEN_REFERENCE",
  UNBOUND_REFERENCE: "UNBOUND_REFERENCE",

  // Event ordering broken by the caller
  INTERNAL: "INTERNAL",
} as const;

export type SchemaErrorCodeType =
  (typeof SchemaErrorCode)[keyof typeof SchemaErrorCode];

export type SchemaErrorKind = "stream" | "structural" | "reference" | "internal";

//==============================================================================
// Schema Error Classes
//==============================================================================

/** Base class for every error raised while compiling or generating */
export class SchemaError extends Error {
  constructor(
    message: string,
    public readonly code: SchemaErrorCodeType,
    public readonly kind: SchemaErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SchemaError";
  }
}

/** The schema input could not be read or decoded */
export class StreamError extends SchemaError {
  constructor(
    message: string,
    code: SchemaErrorCodeType = SchemaErrorCode.STREAM_UNAVAILABLE,
    options?: { cause?: unknown },
  ) {
    super(message, code, "stream", options);
    this.name = "StreamError";
  }
}

/** A finished type breaks one of its kind's invariants */
export class StructuralError extends SchemaError {
  constructor(message: string, code: SchemaErrorCodeType) {
    super(message, code, "structural");
    this.name = "StructuralError";
  }
}

/** A named reference could not be matched or followed */
export class SchemaReferenceError extends SchemaError {
  constructor(
    message: string,
    code: SchemaErrorCodeType,
    public readonly reference: string,
  ) {
    super(message, code, "reference");
    this.name = "SchemaReferenceError";
  }
}

/** The event stream broke the builder's calling contract */
export class InternalSchemaError extends SchemaError {
  constructor(message: string) {
    super(message, SchemaErrorCode.INTERNAL, "internal");
    this.name = "InternalSchemaError";
  }
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}

/** Options or a config file failed validation */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
