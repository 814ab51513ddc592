/**
 * Error classes for the tjson parser and decoder
 */

export type ParseErrorCode =
  | "UnexpectedCharacter"
  | "InvalidHexDigit"
  | "InvalidSurrogatePair"
  | "UnexpectedEndOfInput"
  | "UnexpectedToken"
  | "ObjectKeyExpected"
  | "ColonExpected"
  | "UndefinedKeyword"
  | "InvalidNumber"
  | "MaxDepthExceeded"
  | "TrailingData"
  | "InputTooLarge";

export type DecodeErrorCode =
  | "PointerExpected"
  | "NilDestination"
  | "CannotConvertNumber"
  | "CannotConvertString"
  | "CannotConvertBoolean"
  | "StructOrMapExpected"
  | "SequenceExpected"
  | "MapKeyMustBeString"
  | "IncompatibleTypes"
  | "UndefinedField"
  | "InvalidSyntax"
  | "OutOfRange"
  | "UnknownEncoding"
  | "EncodingFailed"
  | "ConstructorFailed"
  | "DecodeHookFailed"
  | "TextUnmarshalFailed"
  | "MaxDepthExceeded";

export class TJSONParseError extends Error {
  readonly code: ParseErrorCode;
  readonly offset: number;
  readonly token?: string;
  cause?: unknown;

  constructor(
    code: ParseErrorCode,
    message: string,
    offset: number,
    token?: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "TJSONParseError";
    this.code = code;
    this.offset = offset;
    this.token = token;
    this.cause = cause;
  }
}

export class TJSONDecodeError extends Error {
  readonly code: DecodeErrorCode;
  /** Source node kind, when the failure concerns a node */
  readonly source?: string;
  /** Destination type name */
  readonly destination?: string;
  cause?: unknown;

  constructor(
    code: DecodeErrorCode,
    message: string,
    details: { source?: string; destination?: string; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "TJSONDecodeError";
    this.code = code;
    this.source = details.source;
    this.destination = details.destination;
    this.cause = details.cause;
  }
}

export class TJSONEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TJSONEncodingError";
  }
}

export class TJSONRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TJSONRegistryError";
  }
}

export class TJSONConfigError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "TJSONConfigError";
    this.cause = cause;
  }
}

export class TJSONStreamError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "TJSONStreamError";
    this.cause = cause;
  }
}

export function isTJSONError(
  error: unknown
): error is TJSONParseError | TJSONDecodeError | TJSONEncodingError {
  return (
    error instanceof TJSONParseError ||
    error instanceof TJSONDecodeError ||
    error instanceof TJSONEncodingError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
