/**
 * Stdio MCP server lifecycle for the code-graph packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  /** Server name and version announced to clients; the name also prefixes log lines */
  config: ServerConfig;

  /** Throwing or rejecting aborts startup */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tools are registered, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs once on the first SIGTERM or SIGINT, before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/** Signals that stop the server */
const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Build services, register tools and connect over stdio.
 * Resolves with the connected server.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "code-graph:graph", version: "0.1.0" },
 *   createServices: () => ({ graph: openGraph() }),
 *   registerTools: (server, services) => registerGraphTools(server, services.graph),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, onStartup } = options;

  const services = await options.createServices();
  const server = new McpServer({ name: config.name, version: config.version });
  options.registerTools(server, services);

  let stopping: Promise<void> | null = null;
  const stop = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    console.error(`[${config.name}] ${signal} received, shutting down`);
    stopping = closeServer(server, services, options.onShutdown).then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[${config.name}] Shutdown failed:`, error);
        process.exit(1);
      }
    );
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, stop);
  }

  await onStartup?.(services);
  await server.connect(new StdioServerTransport());
  return server;
}

async function closeServer<S>(
  server: McpServer,
  services: S,
  onShutdown: ServerBootstrapOptions<S>["onShutdown"]
): Promise<void> {
  await onShutdown?.(services);
  await server.close();
}

/**
 * Entry point for a server process: any startup failure is logged to
 * stderr and exits with status 1. Stdout carries the protocol.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
