import { readFile } from "node:fs/promises";
import { z } from "zod";
import { METHODS } from "../http/types.js";
import { createRouteTable, isResultType, type RouteTable } from "./types.js";

const RouteEntrySchema = z.object({
  path: z.string(),
  method: z.enum(METHODS),
  headers: z.array(z.string()).optional(),
  queries: z.array(z.string()).optional(),
  status_code: z.number().int().optional(),
  result_type: z.string(),
  result: z.string(),
  result_headers: z.array(z.string()).optional(),
});

export const RouteConfigSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  routes: z.array(RouteEntrySchema),
});

export type RouteConfigFile = z.infer<typeof RouteConfigSchema>;

export interface RouteConfig {
  host?: string;
  port?: number;
  routes: RouteTable;
  /** Problems that do not stop the server from starting. */
  warnings: string[];
}

export class RouteConfigError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Invalid route config ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "RouteConfigError";
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Validate an already-parsed route config and freeze its routes.
 */
export function parseRouteConfig(
  value: unknown,
  source = "<inline>",
): RouteConfig {
  const parsed = RouteConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new RouteConfigError(source, parsed.error.issues.map(formatIssue));
  }

  const warnings: string[] = [];
  const seen = new Set<string>();
  parsed.data.routes.forEach((route, index) => {
    if (!isResultType(route.result_type)) {
      warnings.push(
        `routes.${index}: unknown result_type "${route.result_type}", responses will have an empty body`,
      );
    }
    if (seen.has(route.path)) {
      warnings.push(
        `routes.${index}: path "${route.path}" is already routed by an earlier entry and will never match`,
      );
    }
    seen.add(route.path);
  });

  const routes = createRouteTable(
    parsed.data.routes.map((route) => ({
      path: route.path,
      method: route.method,
      headers: route.headers,
      queries: route.queries,
      statusCode: route.status_code,
      resultType: route.result_type,
      result: route.result,
      resultHeaders: route.result_headers,
    })),
  );

  return {
    host: parsed.data.host,
    port: parsed.data.port,
    routes,
    warnings,
  };
}

/**
 * Read a JSON route file from disk.
 *
 * @example
 * ```json
 * {
 *   "port": 3000,
 *   "routes": [
 *     { "path": "/hello", "method": "GET", "result_type": "direct", "result": "hi" }
 *   ]
 * }
 * ```
 */
export async function loadRouteConfig(filePath: string): Promise<RouteConfig> {
  const content = await readFile(filePath, "utf-8");

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RouteConfigError(filePath, [`invalid JSON: ${reason}`]);
  }

  return parseRouteConfig(value, filePath);
}
