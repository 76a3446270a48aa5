export enum ErrorCode {
  PARSE_ERROR = "PARSE_ERROR",
  UNSUPPORTED_OPERATION = "UNSUPPORTED_OPERATION",
  SIGNATURE_MISMATCH = "SIGNATURE_MISMATCH",
  METADATA_UNAVAILABLE = "METADATA_UNAVAILABLE",
  TRANSACTION_FAILED = "TRANSACTION_FAILED",
  ROUTE_NOT_FOUND = "ROUTE_NOT_FOUND",
}

export class TokenError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ParseError extends TokenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.PARSE_ERROR, message, options);
  }
}

export class UnsupportedOperationError extends TokenError {
  constructor(message: string) {
    super(ErrorCode.UNSUPPORTED_OPERATION, message);
  }
}

export class SignatureMismatchError extends TokenError {
  constructor(message: string) {
    super(ErrorCode.SIGNATURE_MISMATCH, message);
  }
}

/** Never thrown past the claim-condition resolver; only logged. */
export class MetadataUnavailableError extends TokenError {
  constructor(currencyAddress: string, options?: { cause?: unknown }) {
    super(ErrorCode.METADATA_UNAVAILABLE, `Could not fetch currency metadata for ${currencyAddress}`, options);
  }
}

export class TransactionFailedError extends TokenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.TRANSACTION_FAILED, message, options);
  }
}

export class RouteNotFoundError extends TokenError {
  constructor(route: string) {
    super(ErrorCode.ROUTE_NOT_FOUND, `No bridge route for '${route}'`);
  }
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.values<string>(ErrorCode).includes(value);
}

export function errorFromCode(code: ErrorCode, message: string): TokenError {
  switch (code) {
    case ErrorCode.PARSE_ERROR:
      return new ParseError(message);
    case ErrorCode.UNSUPPORTED_OPERATION:
      return new UnsupportedOperationError(message);
    case ErrorCode.SIGNATURE_MISMATCH:
      return new SignatureMismatchError(message);
    case ErrorCode.TRANSACTION_FAILED:
      return new TransactionFailedError(message);
    default:
      return new TokenError(code, message);
  }
}
