import type { Method } from "../http/types.js";

/** Tags the resolver knows how to turn into a body. */
export const RESULT_TYPES = ["direct", "file", "dl"] as const;

export type ResultType = (typeof RESULT_TYPES)[number];

export function isResultType(value: string): value is ResultType {
  return RESULT_TYPES.some((type) => type === value);
}

export interface RouteEntry {
  /** Compared to the request path byte-for-byte. */
  readonly path: string;
  readonly method: Method;
  /** Header names the request must carry (case-sensitive). */
  readonly headers?: readonly string[];
  /** Query parameter names the request must carry. */
  readonly queries?: readonly string[];
  /** Defaults to 200 when absent. */
  readonly statusCode?: number;
  /**
   * One of {@link RESULT_TYPES}. Any other tag is carried through and
   * produces an empty body.
   */
  readonly resultType: string;
  /** Literal body for `direct`, a filesystem path for `file` and `dl`. */
  readonly result: string;
  /** `"Key: Value"` lines applied last, overriding computed headers. */
  readonly resultHeaders?: readonly string[];
}

export type RouteTable = readonly RouteEntry[];

/**
 * Freeze a route list into the table shared by every connection.
 * Entries are copied first so later edits to the input cannot leak in.
 */
export function createRouteTable(entries: readonly RouteEntry[]): RouteTable {
  return Object.freeze(
    entries.map((entry) =>
      Object.freeze({
        ...entry,
        headers: entry.headers && Object.freeze([...entry.headers]),
        queries: entry.queries && Object.freeze([...entry.queries]),
        resultHeaders:
          entry.resultHeaders && Object.freeze([...entry.resultHeaders]),
      }),
    ),
  );
}
