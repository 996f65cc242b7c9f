import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { ParsingError } from "./errors.js";
import {
  createHttpRequestParser,
  parseHttpRequest,
  parseRequestLine,
  parseRequestTarget,
} from "./request-parser.js";

/** Create a mock socket that delivers data and then closes */
function mockSocket(rawRequest: string | Uint8Array): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;
  const payload =
    typeof rawRequest === "string" ? fromString(rawRequest) : rawRequest;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      // Deliver data on next tick
      queueMicrotask(() => {
        dataCallback?.(payload);
      });
    },
    onClose(cb) {
      closeCallback = cb;
      // Close after data is delivered
      queueMicrotask(() => {
        queueMicrotask(() => {
          closeCallback?.(false);
        });
      });
    },
    onError() {},
    close() {},
  };
}

/** Create a mock socket that delivers data in multiple chunks */
function chunkedMockSocket(chunks: string[]): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      let delay = 0;
      for (const chunk of chunks) {
        const c = chunk;
        setTimeout(() => dataCallback?.(fromString(c)), delay);
        delay += 5;
      }
    },
    onClose(cb) {
      closeCallback = cb;
      setTimeout(() => closeCallback?.(false), chunks.length * 5 + 10);
    },
    onError() {},
    close() {},
  };
}

/** A socket that never delivers anything on its own. */
function silentSocket(): ITcpSocket & {
  emitData(text: string): void;
  emitError(err: Error): void;
} {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let errorCallback: ((err: Error) => void) | null = null;
  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
    },
    onClose() {},
    onError(cb) {
      errorCallback = cb;
    },
    close() {},
    emitData(text) {
      dataCallback?.(fromString(text));
    },
    emitError(err) {
      errorCallback?.(err);
    },
  };
}

describe("parseRequestLine", () => {
  it("splits on single spaces", () => {
    expect(parseRequestLine("GET /a HTTP/1.1")).toEqual({
      method: "GET",
      target: "/a",
      version: "HTTP/1.1",
    });
  });

  it("defaults missing tokens to empty strings", () => {
    expect(parseRequestLine("GET")).toEqual({
      method: "GET",
      target: "",
      version: "",
    });
    expect(parseRequestLine("")).toEqual({
      method: "",
      target: "",
      version: "",
    });
  });

  it("ignores tokens past the third", () => {
    expect(parseRequestLine("GET /a HTTP/1.1 extra").version).toBe("HTTP/1.1");
  });
});

describe("parseRequestTarget", () => {
  it("separates path and query parameters", () => {
    const { uri, queryStrings } = parseRequestTarget("path?a=1&b=2");
    expect(uri).toBe("path");
    expect(Object.fromEntries(queryStrings)).toEqual({ a: "1", b: "2" });
  });

  it("yields no query parameters without a question mark", () => {
    const { uri, queryStrings } = parseRequestTarget("/plain");
    expect(uri).toBe("/plain");
    expect(queryStrings.size).toBe(0);
  });

  it("keeps the last value for duplicate keys", () => {
    const { queryStrings } = parseRequestTarget("/q?id=1&id=2");
    expect(queryStrings.get("id")).toBe("2");
  });

  it("splits only on the first equals sign of a segment", () => {
    const { queryStrings } = parseRequestTarget("/q?expr=a=b");
    expect(queryStrings.get("expr")).toBe("a=b");
  });

  it("treats everything after the first question mark as the query", () => {
    const { uri, queryStrings } = parseRequestTarget("/q?a=1?b=2");
    expect(uri).toBe("/q");
    expect(queryStrings.get("a")).toBe("1?b=2");
  });

  it("rejects a segment without an equals sign", () => {
    expect(() => parseRequestTarget("/q?flag")).toThrow(ParsingError);
    expect(() => parseRequestTarget("/q?")).toThrow(ParsingError);
    expect(() => parseRequestTarget("/q?a=1&")).toThrow(ParsingError);
  });
});

describe("parseHttpRequest", () => {
  it("parses a simple GET request", async () => {
    const socket = mockSocket("GET /hello HTTP/1.1\r\nHost: localhost\r\n\r\n");
    const req = await parseHttpRequest(socket);

    expect(req.method).toEqual({ kind: "known", method: "GET" });
    expect(req.uri).toBe("/hello");
    expect(req.version).toBe("HTTP/1.1");
    expect(req.headers.get("Host")).toBe("localhost");
    expect(req.queryStrings.size).toBe(0);
  });

  it("keeps header names as received and trims values", async () => {
    const raw = [
      "GET /api/data HTTP/1.1",
      "X-Custom-Header :   spaced value  ",
      "Accept: application/json",
      "",
      "",
    ].join("\r\n");

    const req = await parseHttpRequest(mockSocket(raw));

    expect(req.headers.get("X-Custom-Header")).toBe("spaced value");
    expect(req.headers.get("Accept")).toBe("application/json");
    expect(req.headers.has("accept")).toBe(false);
  });

  it("keeps the last value of a repeated header", async () => {
    const req = await parseHttpRequest(
      mockSocket("GET / HTTP/1.1\r\nX-Id: 1\r\nX-Id: 2\r\n\r\n"),
    );
    expect(req.headers.get("X-Id")).toBe("2");
  });

  it("splits header lines on the first colon only", async () => {
    const req = await parseHttpRequest(
      mockSocket("GET / HTTP/1.1\r\nHost: localhost:8080\r\n\r\n"),
    );
    expect(req.headers.get("Host")).toBe("localhost:8080");
  });

  it("parses query parameters from the request-target", async () => {
    const req = await parseHttpRequest(
      mockSocket("GET /item?id=7&sort=desc HTTP/1.1\r\n\r\n"),
    );
    expect(req.uri).toBe("/item");
    expect(req.queryStrings.get("id")).toBe("7");
    expect(req.queryStrings.get("sort")).toBe("desc");
  });

  it("does not read a body even when Content-Length is set", async () => {
    const raw =
      "POST /submit HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello";
    const req = await parseHttpRequest(mockSocket(raw));

    expect(req.method).toEqual({ kind: "known", method: "POST" });
    expect(req.headers.get("Content-Length")).toBe("5");
  });

  it("handles chunked delivery", async () => {
    const socket = chunkedMockSocket([
      "GET /file.txt",
      " HTTP/1.1\r",
      "\nHost: loc",
      "alhost\r\n\r\n",
    ]);

    const req = await parseHttpRequest(socket);
    expect(req.uri).toBe("/file.txt");
    expect(req.headers.get("Host")).toBe("localhost");
  });

  it("keeps unrecognized methods as raw tokens", async () => {
    const req = await parseHttpRequest(mockSocket("OPTIONS / HTTP/1.1\r\n\r\n"));
    expect(req.method).toEqual({ kind: "unknown", raw: "OPTIONS" });
  });

  it("skips blank lines before the request line", async () => {
    const req = await parseHttpRequest(
      mockSocket("\r\n\r\nGET /hello HTTP/1.1\r\nHost: x\r\n\r\n"),
    );
    expect(req.method).toEqual({ kind: "known", method: "GET" });
    expect(req.uri).toBe("/hello");
    expect(req.headers.get("Host")).toBe("x");
  });

  it("keeps waiting when only blank lines arrive", async () => {
    await expect(parseHttpRequest(mockSocket("\r\n\r\n"))).rejects.toMatchObject(
      { code: "CONNECTION_CLOSED_INCOMPLETE" },
    );
  });

  it("accepts a request line without a target", async () => {
    const req = await parseHttpRequest(mockSocket("GET\r\n\r\n"));
    expect(req.method).toEqual({ kind: "known", method: "GET" });
    expect(req.uri).toBe("");
    expect(req.version).toBe("");
  });

  it("rejects a header line without a colon", async () => {
    await expect(
      parseHttpRequest(mockSocket("GET / HTTP/1.1\r\nX-Test\r\n\r\n")),
    ).rejects.toMatchObject({ name: "ParsingError", code: "MISSING_DELIMITER" });
  });

  it("keeps a leading byte order mark in the method token", async () => {
    const raw = concat([
      new Uint8Array([0xef, 0xbb, 0xbf]),
      fromString("GET / HTTP/1.1\r\n\r\n"),
    ]);
    const req = await parseHttpRequest(mockSocket(raw));
    expect(req.method).toEqual({ kind: "unknown", raw: "\uFEFFGET" });
  });

  it("rejects invalid UTF-8", async () => {
    const raw = concat([
      fromString("GET /"),
      new Uint8Array([0xff, 0xfe]),
      fromString(" HTTP/1.1\r\n\r\n"),
    ]);
    await expect(parseHttpRequest(mockSocket(raw))).rejects.toMatchObject({
      code: "INVALID_UTF8",
    });
  });

  it("rejects lines longer than the limit", async () => {
    const raw = `GET /${"a".repeat(64)} HTTP/1.1\r\n\r\n`;
    await expect(
      parseHttpRequest(mockSocket(raw), { maxLineLength: 32 }),
    ).rejects.toMatchObject({ code: "LINE_TOO_LONG" });
  });

  it("rejects an unterminated line once it passes the limit", async () => {
    const socket = silentSocket();
    const pending = parseHttpRequest(socket, { maxLineLength: 8 });
    socket.emitData("GET /way-too-long-without-crlf");

    await expect(pending).rejects.toMatchObject({ code: "LINE_TOO_LONG" });
  });

  it("rejects too many header lines", async () => {
    const raw = "GET / HTTP/1.1\r\nA: 1\r\nB: 2\r\nC: 3\r\n\r\n";
    await expect(
      parseHttpRequest(mockSocket(raw), { maxHeaderCount: 2 }),
    ).rejects.toMatchObject({ code: "TOO_MANY_HEADERS" });
  });

  it("reports a connection closed before the blank line", async () => {
    await expect(
      parseHttpRequest(mockSocket("GET / HTTP/1.1\r\nHost: x\r\n")),
    ).rejects.toMatchObject({ code: "CONNECTION_CLOSED_INCOMPLETE" });
    await expect(parseHttpRequest(mockSocket(""))).rejects.toMatchObject({
      code: "CONNECTION_CLOSED",
    });
  });

  it("propagates socket errors unchanged", async () => {
    const socket = silentSocket();
    const pending = parseHttpRequest(socket);
    const reset = new Error("ECONNRESET");
    socket.emitError(reset);

    await expect(pending).rejects.toBe(reset);
  });

  it("times out idle connections", async () => {
    await expect(
      parseHttpRequest(silentSocket(), { timeoutMs: 20 }),
    ).rejects.toMatchObject({ code: "IDLE_TIMEOUT" });
  });

  it("times out partially received requests", async () => {
    const socket = silentSocket();
    const pending = parseHttpRequest(socket, { timeoutMs: 20 });
    socket.emitData("GET / HTTP/1.1\r\n");

    await expect(pending).rejects.toMatchObject({ code: "REQUEST_TIMEOUT" });
  });

  it("reads a request through an explicit parser instance", async () => {
    const parser = createHttpRequestParser(
      mockSocket("DELETE /items?id=3 HTTP/1.0\r\n\r\n"),
    );
    const req = await parser.readRequest();

    expect(req.method).toEqual({ kind: "known", method: "DELETE" });
    expect(req.version).toBe("HTTP/1.0");
    expect(req.queryStrings.get("id")).toBe("3");
  });
});
