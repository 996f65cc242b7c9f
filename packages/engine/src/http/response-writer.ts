import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./types.js";

function hasHeader(headers: ReadonlyMap<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  for (const key of headers.keys()) {
    if (key.toLowerCase() === lower) return true;
  }
  return false;
}

/**
 * Serialize a buffered response. A missing `Content-Length` is filled in
 * from the body and the connection is always marked for closing.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const headers = new Map(response.headers);

  if (!hasHeader(headers, "Content-Length")) {
    headers.set("Content-Length", String(response.body.length));
  }
  if (!hasHeader(headers, "Connection")) {
    headers.set("Connection", "close");
  }

  const lines: string[] = [
    `HTTP/1.1 ${response.status.code} ${response.status.message}`,
  ];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

/**
 * Send a complete HTTP response (headers + body) over a socket.
 */
export function sendResponse(socket: ITcpSocket, response: HttpResponse): void {
  socket.send(serializeResponse(response));
}
