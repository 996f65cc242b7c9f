import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { RouteTable } from "../routes/types.js";
import { MockServer } from "../server/mock-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  routes: RouteTable;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): MockServer {
  return new MockServer({
    socketFactory: new NodeSocketFactory(),
    fileSystem: new NodeFileSystem(),
    config: options.config,
    routes: options.routes,
    logger: options.logger,
  });
}
