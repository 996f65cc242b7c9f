#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  loadRouteConfig,
  prefixedLogger,
  RouteConfigError,
} from "@mockwire/engine";
import { buildServerConfig, HELP_TEXT, parseArgs } from "./args.js";

function readVersion(): string {
  const pkgPath = new URL("../package.json", import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  switch (parsed.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(readVersion());
      return;
    case "error":
      console.error(parsed.message);
      console.log(HELP_TEXT);
      process.exitCode = 1;
      return;
    case "run":
      break;
  }

  const options = parsed.options;
  const logger = prefixedLogger(
    "mockwire",
    filteredLogger(options.logLevel, basicLogger()),
  );

  const routesPath = path.resolve(options.routesPath);
  const routeConfig = await loadRouteConfig(routesPath).catch((err: unknown) => {
    if (err instanceof RouteConfigError) {
      console.error(err.message);
      return null;
    }
    throw err;
  });
  if (!routeConfig) {
    process.exitCode = 1;
    return;
  }

  for (const warning of routeConfig.warnings) {
    logger.warn(warning);
  }

  const config = buildServerConfig(options, routeConfig);
  const server = createNodeServer({
    config,
    routes: routeConfig.routes,
    logger,
  });

  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  mockwire serving ${routeConfig.routes.length} routes from ${routesPath}\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
