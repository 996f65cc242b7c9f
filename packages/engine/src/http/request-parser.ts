import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeUtf8Strict, indexOfSequence } from "../utils/buffer.js";
import { ParsingError } from "./errors.js";
import { splitKeyValue } from "./key-value.js";
import { type HttpRequest, parseMethod } from "./types.js";

const CRLF = new Uint8Array([13, 10]); // \r\n
const DEFAULT_MAX_LINE_LENGTH = 8 * 1024; // 8KB
const DEFAULT_MAX_HEADER_COUNT = 100;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ParseHttpRequestOptions {
  /** Longest accepted line in bytes, CRLF excluded. */
  maxLineLength?: number;
  maxHeaderCount?: number;
  timeoutMs?: number;
}

interface RequestLine {
  method: string;
  target: string;
  version: string;
}

type ParserState =
  | { phase: "request-line" }
  | { phase: "headers"; requestLine: RequestLine; headers: Map<string, string> };

export function parseRequestLine(line: string): RequestLine {
  const [method = "", target = "", version = ""] = line.split(" ");
  return { method, target, version };
}

/**
 * Split a request-target into its path and query parameters.
 * Everything after the first `?` is read as `&`-separated `key=value` pairs.
 */
export function parseRequestTarget(target: string): {
  uri: string;
  queryStrings: Map<string, string>;
} {
  const queryStrings = new Map<string, string>();
  const questionIdx = target.indexOf("?");
  if (questionIdx === -1) {
    return { uri: target, queryStrings };
  }

  for (const segment of target.substring(questionIdx + 1).split("&")) {
    const [key, value] = splitKeyValue(segment, "=");
    queryStrings.set(key, value);
  }
  return { uri: target.substring(0, questionIdx), queryStrings };
}

function decodeLine(bytes: Uint8Array): string {
  const line = decodeUtf8Strict(bytes);
  if (line === null) {
    throw new ParsingError("INVALID_UTF8", "Request line is not valid UTF-8");
  }
  return line;
}

export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private received = false;
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      if (data.length > 0) this.received = true;
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /**
   * Read the request line and headers, stopping at the blank line.
   * Nothing after it is consumed.
   */
  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    const maxHeaderCount = options?.maxHeaderCount ?? DEFAULT_MAX_HEADER_COUNT;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    let state: ParserState = { phase: "request-line" };
    let headerLines = 0;

    while (true) {
      const lineBytes = await this.readLine(maxLineLength, deadline);
      const line = decodeLine(lineBytes);

      if (state.phase === "request-line") {
        // Blank lines before the request line are skipped.
        if (line.length === 0) continue;
        state = {
          phase: "headers",
          requestLine: parseRequestLine(line),
          headers: new Map(),
        };
        continue;
      }

      if (line.length === 0) {
        const { method, target, version } = state.requestLine;
        const { uri, queryStrings } = parseRequestTarget(target);
        return {
          method: parseMethod(method),
          uri,
          version,
          headers: state.headers,
          queryStrings,
        };
      }

      if (++headerLines > maxHeaderCount) {
        throw new ParsingError(
          "TOO_MANY_HEADERS",
          `More than ${maxHeaderCount} request headers`,
        );
      }
      const [key, value] = splitKeyValue(line, ":");
      state.headers.set(key, value);
    }
  }

  private async readLine(
    maxLineLength: number,
    deadline: number,
  ): Promise<Uint8Array> {
    while (true) {
      const crlfIdx = indexOfSequence(this.buffer, CRLF);
      if (crlfIdx !== -1) {
        if (crlfIdx > maxLineLength) {
          throw lineTooLong(maxLineLength);
        }
        const line = this.buffer.slice(0, crlfIdx);
        this.buffer = this.buffer.slice(crlfIdx + CRLF.length);
        return line;
      }

      // A trailing \r may still be completed by the next chunk.
      if (this.buffer.length > maxLineLength + 1) {
        throw lineTooLong(maxLineLength);
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (!this.received) {
          throw new ParsingError("CONNECTION_CLOSED", "Connection closed");
        }

        throw new ParsingError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (!this.received) {
          throw new ParsingError("IDLE_TIMEOUT", "Connection idle timed out");
        }

        throw new ParsingError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

function lineTooLong(maxLineLength: number): ParsingError {
  return new ParsingError(
    "LINE_TOO_LONG",
    `Request line exceeds ${maxLineLength} bytes`,
  );
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Parse a single HTTP/1.1 request head from a TCP socket stream.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}
