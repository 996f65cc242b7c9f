/**
 * How route failures reach the client.
 * - `abort`: close the connection without a response (legacy behaviour).
 * - `respond`: answer with 400/500 instead.
 */
export type ErrorMode = "abort" | "respond";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full request head. Default: 5000ms */
  requestTimeoutMs: number;
  /** Longest accepted request or header line. Default: 8KB */
  maxLineLength: number;
  /** Max header lines per request. Default: 100 */
  maxHeaderCount: number;
  /** Default: 'abort' */
  errorMode: ErrorMode;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    requestTimeoutMs: 5000,
    maxLineLength: 8 * 1024,
    maxHeaderCount: 100,
    errorMode: "abort",
  };
}
