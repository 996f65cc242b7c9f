import type { Status } from "./status.js";

export const METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "OPTION",
  "DELETE",
] as const;

export type Method = (typeof METHODS)[number];

/**
 * Result of reading the method token off the request line. Unrecognized
 * tokens are kept as-is so the resolver can decide what to do with them.
 */
export type MethodToken =
  | { kind: "known"; method: Method }
  | { kind: "unknown"; raw: string };

export function isMethod(token: string): token is Method {
  return METHODS.some((method) => method === token);
}

export function parseMethod(token: string): MethodToken {
  if (isMethod(token)) {
    return { kind: "known", method: token };
  }
  return { kind: "unknown", raw: token };
}

export function formatMethod(token: MethodToken): string {
  return token.kind === "known" ? token.method : token.raw;
}

export interface HttpRequest {
  readonly method: MethodToken;
  /** Path only; the query component is stripped. */
  readonly uri: string;
  readonly version: string;
  readonly headers: ReadonlyMap<string, string>;
  readonly queryStrings: ReadonlyMap<string, string>;
}

export interface HttpResponse {
  status: Status;
  headers: Map<string, string>;
  body: Uint8Array;
}
