import * as path from "node:path";
import type { ErrorMode } from "../config/server-config.js";
import { ParsingError, RouteError } from "../http/errors.js";
import { splitKeyValue } from "../http/key-value.js";
import { Status, statusFromCode } from "../http/status.js";
import type { HttpRequest, HttpResponse, Method } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { decodeUtf8Strict, fromString } from "../utils/buffer.js";
import { extensionOf, getContentType } from "./content-types.js";
import type { RouteEntry, RouteTable } from "./types.js";

export interface ResolveOptions {
  fileSystem: IFileSystem;
  /**
   * `abort` keeps the legacy behaviour: unknown methods count as GET and
   * route errors are thrown. `respond` turns both into HTTP responses.
   */
  errorMode: ErrorMode;
}

export type ResolveOutcome =
  | { kind: "matched"; route: RouteEntry; response: HttpResponse }
  | { kind: "no-route" }
  | { kind: "unknown-method"; route: RouteEntry; raw: string }
  | { kind: "method-mismatch"; route: RouteEntry }
  | { kind: "precondition-failed"; route: RouteEntry; error: RouteError }
  | { kind: "body-source-error"; route: RouteEntry; error: RouteError };

export const NOT_FOUND_BODY = "Path not found";
export const METHOD_NOT_ALLOWED_BODY = "Method Not Allowed";

interface ResolvedBody {
  body: Uint8Array;
  headers: Map<string, string>;
}

/** First entry whose path equals `uri` exactly. */
export function findRoute(
  routes: RouteTable,
  uri: string,
): RouteEntry | undefined {
  return routes.find((route) => route.path === uri);
}

export function checkPreconditions(
  route: RouteEntry,
  request: HttpRequest,
): RouteError | null {
  const missingHeaders = (route.headers ?? []).filter(
    (name) => !request.headers.has(name),
  );
  if (missingHeaders.length > 0) {
    return new RouteError(
      "REQUIRED_HEADERS_MISSING",
      `Required headers missing: ${missingHeaders.join(", ")}`,
    );
  }

  const missingQueries = (route.queries ?? []).filter(
    (name) => !request.queryStrings.has(name),
  );
  if (missingQueries.length > 0) {
    return new RouteError(
      "REQUIRED_QUERIES_MISSING",
      `Required query parameters missing: ${missingQueries.join(", ")}`,
    );
  }

  return null;
}

async function ensureRegularFile(
  fileSystem: IFileSystem,
  filePath: string,
): Promise<void> {
  const isFile = await fileSystem
    .stat(filePath)
    .then((stat) => stat.isFile)
    .catch(() => false);
  if (!isFile) {
    throw new RouteError("FILE_OPEN", `Cannot open ${filePath}: not a file`);
  }
}

async function readRouteFile(
  fileSystem: IFileSystem,
  filePath: string,
): Promise<Uint8Array> {
  await ensureRegularFile(fileSystem, filePath);
  try {
    return await fileSystem.readFile(filePath);
  } catch (err) {
    throw new RouteError("FILE_READ", `Cannot read ${filePath}`, {
      cause: err,
    });
  }
}

export async function resolveBody(
  route: RouteEntry,
  fileSystem: IFileSystem,
): Promise<ResolvedBody> {
  const headers = new Map<string, string>();

  switch (route.resultType) {
    case "direct":
      return { body: fromString(route.result), headers };

    case "file": {
      const body = await readRouteFile(fileSystem, route.result);
      if (decodeUtf8Strict(body) === null) {
        throw new RouteError(
          "FILE_READ",
          `${route.result} is not valid UTF-8 text`,
        );
      }
      return { body, headers };
    }

    case "dl": {
      const body = await readRouteFile(fileSystem, route.result);
      headers.set("Content-Type", getContentType(extensionOf(route.result)));
      headers.set("Accept-Ranges", "None");
      headers.set(
        "Content-Disposition",
        `attachment; filename=${path.basename(route.result)}`,
      );
      return { body, headers };
    }

    default:
      return { body: new Uint8Array(0), headers };
  }
}

/**
 * Apply configured `"Key: Value"` lines over `headers`; they always win.
 * A configured name replaces any existing header that differs only in case.
 */
export function applyResultHeaders(
  headers: Map<string, string>,
  resultHeaders: readonly string[],
): void {
  for (const line of resultHeaders) {
    try {
      const [key, value] = splitKeyValue(line, ":");
      const lower = key.toLowerCase();
      for (const existing of [...headers.keys()]) {
        if (existing.toLowerCase() === lower) headers.delete(existing);
      }
      headers.set(key, value);
    } catch (err) {
      if (err instanceof ParsingError) {
        throw new RouteError(
          "INVALID_RESULT_HEADER",
          `Invalid result header "${line}"`,
          { cause: err },
        );
      }
      throw err;
    }
  }
}

async function buildResponse(
  route: RouteEntry,
  request: HttpRequest,
  fileSystem: IFileSystem,
): Promise<HttpResponse> {
  const status =
    route.statusCode !== undefined
      ? statusFromCode(route.statusCode)
      : Status.ok();

  const { body, headers } = await resolveBody(route, fileSystem);

  headers.set("Content-Length", String(body.length));
  const host = request.headers.get("Host");
  if (host !== undefined) {
    headers.set("Host", host);
  }
  if (route.resultHeaders) {
    applyResultHeaders(headers, route.resultHeaders);
  }

  return { status, headers, body };
}

/**
 * Match `request` against `routes` and describe what should happen.
 * Only unexpected failures reject; route problems come back as outcomes.
 */
export async function resolveRoute(
  request: HttpRequest,
  routes: RouteTable,
  options: ResolveOptions,
): Promise<ResolveOutcome> {
  const route = findRoute(routes, request.uri);
  if (!route) {
    return { kind: "no-route" };
  }

  let method: Method;
  if (request.method.kind === "known") {
    method = request.method.method;
  } else if (options.errorMode === "abort") {
    method = "GET";
  } else {
    return { kind: "unknown-method", route, raw: request.method.raw };
  }

  if (method !== route.method) {
    return { kind: "method-mismatch", route };
  }

  const preconditionError = checkPreconditions(route, request);
  if (preconditionError) {
    return { kind: "precondition-failed", route, error: preconditionError };
  }

  try {
    const response = await buildResponse(route, request, options.fileSystem);
    return { kind: "matched", route, response };
  } catch (err) {
    if (err instanceof RouteError) {
      return { kind: "body-source-error", route, error: err };
    }
    throw err;
  }
}

function plainResponse(status: Status, text: string): HttpResponse {
  return { status, headers: new Map(), body: fromString(text) };
}

export function outcomeToResponse(
  outcome: ResolveOutcome,
  errorMode: ErrorMode,
): HttpResponse {
  switch (outcome.kind) {
    case "matched":
      return outcome.response;
    case "no-route":
      return plainResponse(Status.notFound(), NOT_FOUND_BODY);
    case "method-mismatch":
      return plainResponse(Status.methodNotAllowed(), METHOD_NOT_ALLOWED_BODY);
    case "unknown-method":
      return plainResponse(
        Status.badRequest(),
        `Unrecognized method: ${outcome.raw}`,
      );
    case "precondition-failed":
      if (errorMode === "abort") throw outcome.error;
      return plainResponse(Status.badRequest(), outcome.error.message);
    case "body-source-error":
      if (errorMode === "abort") throw outcome.error;
      return plainResponse(Status.internalServerError(), outcome.error.message);
  }
}

/**
 * Resolve a request straight to a response. Under `abort`, route errors
 * reject with the underlying {@link RouteError}.
 */
export async function resolveResponse(
  request: HttpRequest,
  routes: RouteTable,
  options: ResolveOptions,
): Promise<HttpResponse> {
  const outcome = await resolveRoute(request, routes, options);
  return outcomeToResponse(outcome, options.errorMode);
}
