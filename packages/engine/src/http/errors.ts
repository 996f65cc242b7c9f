export type ParsingErrorCode =
  | "INVALID_UTF8"
  | "MISSING_DELIMITER"
  | "LINE_TOO_LONG"
  | "TOO_MANY_HEADERS"
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE";

/** Raised while turning socket bytes (or a key-value line) into a request. */
export class ParsingError extends Error {
  constructor(
    readonly code: ParsingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ParsingError";
  }
}

export type RouteErrorCode =
  | "REQUIRED_HEADERS_MISSING"
  | "REQUIRED_QUERIES_MISSING"
  | "FILE_OPEN"
  | "FILE_READ"
  | "INVALID_RESULT_HEADER";

/** Raised when a matched route cannot be turned into a response. */
export class RouteError extends Error {
  constructor(
    readonly code: RouteErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RouteError";
  }
}

/**
 * Only connection-level failures: the peer went away or never
 * finished sending. Nothing is written back for these.
 */
export function isConnectionFailure(err: unknown): boolean {
  return (
    err instanceof ParsingError &&
    (err.code === "IDLE_TIMEOUT" ||
      err.code === "REQUEST_TIMEOUT" ||
      err.code === "CONNECTION_CLOSED" ||
      err.code === "CONNECTION_CLOSED_INCOMPLETE")
  );
}
