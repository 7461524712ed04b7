// Domain errors. Every error carries a stable `code` so the HTTP layers can map
// it to a status without string matching on messages.

export type AeroDataErrorCode =
  | "format_error"
  | "validation_error"
  | "codec_error"
  | "query_error"
  | "application_error";

export abstract class AeroDataError extends Error {
  abstract readonly code: AeroDataErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A coordinate or notation string could not be parsed. */
export class FormatError extends AeroDataError {
  readonly code = "format_error";

  constructor(message: string, readonly text: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A waypoint field failed its invariant. */
export class ValidationError extends AeroDataError {
  readonly code = "validation_error";

  constructor(
    readonly field: string,
    readonly value: unknown,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `Value '${String(value)}' is invalid for '${field}'`, options);
  }
}

/** The CUP file header is unusable or a data line failed to build a waypoint. */
export class CodecError extends AeroDataError {
  readonly code = "codec_error";

  constructor(message: string, readonly line?: number, options?: { cause?: unknown }) {
    super(line != null ? `Line ${line}: ${message}` : message, options);
  }
}

/** The airport directory query failed or returned something unusable. */
export class QueryError extends AeroDataError {
  readonly code = "query_error";

  constructor(message: string, readonly operation: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
  }
}

/** Reconciliation called with options that cannot produce a meaningful result. */
export class ApplicationError extends AeroDataError {
  readonly code = "application_error";
}

export function isAeroDataError(e: unknown): e is AeroDataError {
  return e instanceof AeroDataError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

const HTTP_STATUS: Record<AeroDataErrorCode, number> = {
  format_error: 400,
  validation_error: 422,
  codec_error: 422,
  application_error: 400,
  query_error: 502,
};

/** Status code both HTTP services answer with for a domain error. */
export function httpStatusFor(error: AeroDataError): number {
  return HTTP_STATUS[error.code];
}
