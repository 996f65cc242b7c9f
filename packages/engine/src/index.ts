// Node adapters
export { NodeFileSystem } from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ErrorMode, ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type { ParsingErrorCode, RouteErrorCode } from "./http/errors.js";
export { isConnectionFailure, ParsingError, RouteError } from "./http/errors.js";
export { splitKeyValue } from "./http/key-value.js";
export type { ParseHttpRequestOptions } from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestStreamParser,
  parseHttpRequest,
} from "./http/request-parser.js";
export { sendResponse, serializeResponse } from "./http/response-writer.js";
export { STATUS_TEXT, Status, statusFromCode } from "./http/status.js";
export type {
  HttpRequest,
  HttpResponse,
  Method,
  MethodToken,
} from "./http/types.js";
export { formatMethod, isMethod, METHODS, parseMethod } from "./http/types.js";
export type { IFileStat, IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Routes
export { extensionOf, getContentType } from "./routes/content-types.js";
export type { RouteConfig, RouteConfigFile } from "./routes/loader.js";
export {
  loadRouteConfig,
  parseRouteConfig,
  RouteConfigError,
  RouteConfigSchema,
} from "./routes/loader.js";
export type { ResolveOptions, ResolveOutcome } from "./routes/resolver.js";
export {
  outcomeToResponse,
  resolveResponse,
  resolveRoute,
} from "./routes/resolver.js";
export type { ResultType, RouteEntry, RouteTable } from "./routes/types.js";
export {
  createRouteTable,
  isResultType,
  RESULT_TYPES,
} from "./routes/types.js";
// Server
export type {
  MockServerEvents,
  MockServerOptions,
} from "./server/mock-server.js";
export { MockServer } from "./server/mock-server.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
