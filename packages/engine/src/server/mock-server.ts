import type { ServerConfig } from "../config/server-config.js";
import { isConnectionFailure, ParsingError, RouteError } from "../http/errors.js";
import { createHttpRequestParser } from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import { Status } from "../http/status.js";
import { formatMethod, type HttpRequest } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { outcomeToResponse, resolveRoute } from "../routes/resolver.js";
import type { RouteTable } from "../routes/types.js";
import { fromString } from "../utils/buffer.js";
import { EventEmitter } from "../utils/event-emitter.js";

export interface MockServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  /** Shared by every connection; never modified after startup. */
  routes: RouteTable;
  logger?: Logger;
}

export type MockServerEvents = {
  listening: [port: number];
  request: [request: HttpRequest, statusCode: number];
  error: [err: unknown];
  close: [];
};

/** Serves one request per connection from a fixed route table. */
export class MockServer extends EventEmitter<MockServerEvents> {
  private socketFactory: ISocketFactory;
  private fileSystem: IFileSystem;
  private config: ServerConfig;
  private routes: RouteTable;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: MockServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.fileSystem = options.fileSystem;
    this.config = options.config;
    this.routes = options.routes;
    this.logger = options.logger ?? basicLogger();
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
          this.emit("error", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const parser = createHttpRequestParser(socket);
    const addr = socket.remoteAddress ?? "?";

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest({
          timeoutMs: this.config.requestTimeoutMs,
          maxLineLength: this.config.maxLineLength,
          maxHeaderCount: this.config.maxHeaderCount,
        });
      } catch (err) {
        this.handleParseFailure(socket, err, addr);
        return;
      }

      if (!this.config.quiet) {
        this.logger.info(`${formatMethod(request.method)} ${request.uri} - ${addr}`);
      }

      try {
        const outcome = await resolveRoute(request, this.routes, {
          fileSystem: this.fileSystem,
          errorMode: this.config.errorMode,
        });
        const response = outcomeToResponse(outcome, this.config.errorMode);
        sendResponse(socket, response);
        this.emit("request", request, response.status.code);
      } catch (err) {
        if (!(err instanceof RouteError)) {
          throw err;
        }
        // Route errors abort the connection without a response.
        this.logger.warn(
          `${formatMethod(request.method)} ${request.uri} - ${addr}: ${err.message}`,
        );
      }
    } finally {
      // One request per connection.
      socket.close();
    }
  }

  private handleParseFailure(
    socket: ITcpSocket,
    err: unknown,
    addr: string,
  ): void {
    if (isConnectionFailure(err)) {
      this.logger.debug(`Connection from ${addr} ended: ${String(err)}`);
      return;
    }

    if (!(err instanceof ParsingError)) {
      // Socket errors end the connection; there is no one left to answer.
      this.logger.debug(`Socket error from ${addr}:`, err);
      return;
    }

    this.logger.warn(`Malformed request from ${addr}: ${err.message}`);
    if (this.config.errorMode === "respond") {
      const status = Status.badRequest();
      sendResponse(socket, {
        status,
        headers: new Map(),
        body: fromString(status.message),
      });
    }
  }
}
