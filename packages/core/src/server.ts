/**
 * MCP server bootstrap shared by the tool packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  /** Defaults to stdio */
  createTransport?: () => Transport;
}

/**
 * Create services, register tools, install SIGTERM/SIGINT handlers and
 * connect the transport. Resolves with the connected server.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "skeleton-extract:declarations", version: "0.1.0" },
 *   createServices: () => ({ declarations: new DeclarationService(parser, fs, cache) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = options.createTransport?.() ?? new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await onStartup?.(services);

  await server.connect(transport);
  return server;
}

/**
 * Entry point for server binaries: bootstrap and exit 1 on a fatal error.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
