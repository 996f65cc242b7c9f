import {
  defaultConfig,
  isLogLevel,
  type LogLevel,
  type ServerConfig,
} from "@mockwire/engine";

export interface CliOptions {
  routesPath: string;
  port?: number;
  host?: string;
  quiet: boolean;
  logLevel: LogLevel;
  timeoutMs?: number;
  respondErrors: boolean;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
mockwire - serve canned HTTP responses from a route file

Usage: mockwire <routes.json> [options]

Options:
  --port, -p <port>      Port to listen on (default: routes file, then 8080)
  --host, -H <host>      Host to bind (default: routes file, then 127.0.0.1)
  --quiet, -q            Suppress request logging
  --log-level <level>    debug, info, warn or error (default: info)
  --timeout <ms>         Time allowed to receive a request head (default: 5000)
  --respond-errors       Answer route failures with 400/500 instead of closing
  --version, -v          Show version
  --help, -h             Show this help
`;

function parseInteger(value: string, min: number, max: number): number | null {
  if (!/^\d+$/.test(value)) return null;
  const n = parseInt(value, 10);
  return n >= min && n <= max ? n : null;
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  let routesPath: string | undefined;
  let port: number | undefined;
  let host: string | undefined;
  let quiet = false;
  let logLevel: LogLevel = "info";
  let timeoutMs: number | undefined;
  let respondErrors = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? "";

    const takesValue =
      arg === "--port" ||
      arg === "-p" ||
      arg === "--host" ||
      arg === "-H" ||
      arg === "--log-level" ||
      arg === "--timeout";
    const value = takesValue ? args[++i] : undefined;
    if (takesValue && value === undefined) {
      return { kind: "error", message: `Missing value for ${arg}` };
    }

    if (arg === "--port" || arg === "-p") {
      const parsed = parseInteger(value ?? "", 0, 65535);
      if (parsed === null) {
        return { kind: "error", message: `Invalid port number: ${value}` };
      }
      port = parsed;
    } else if (arg === "--host" || arg === "-H") {
      if (!value) {
        return { kind: "error", message: "Host must not be empty" };
      }
      host = value;
    } else if (arg === "--log-level") {
      if (value === undefined || !isLogLevel(value)) {
        return { kind: "error", message: `Invalid log level: ${value}` };
      }
      logLevel = value;
    } else if (arg === "--timeout") {
      const parsed = parseInteger(value ?? "", 1, Number.MAX_SAFE_INTEGER);
      if (parsed === null) {
        return { kind: "error", message: `Invalid timeout: ${value}` };
      }
      timeoutMs = parsed;
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--respond-errors") {
      respondErrors = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else if (routesPath !== undefined) {
      return { kind: "error", message: `Unexpected argument: ${arg}` };
    } else {
      routesPath = arg;
    }
    i++;
  }

  if (routesPath === undefined) {
    return { kind: "error", message: "Missing routes file" };
  }

  return {
    kind: "run",
    options: {
      routesPath,
      port,
      host,
      quiet,
      logLevel,
      timeoutMs,
      respondErrors,
    },
  };
}

/**
 * Command-line flags win over the routes file, which wins over defaults.
 */
export function buildServerConfig(
  options: CliOptions,
  file: { host?: string; port?: number },
): ServerConfig {
  const defaults = defaultConfig();
  return {
    ...defaults,
    port: options.port ?? file.port ?? defaults.port,
    host: options.host ?? file.host ?? defaults.host,
    quiet: options.quiet,
    requestTimeoutMs: options.timeoutMs ?? defaults.requestTimeoutMs,
    errorMode: options.respondErrors ? "respond" : defaults.errorMode,
  };
}
