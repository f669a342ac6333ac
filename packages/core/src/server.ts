/**
 * Process lifecycle and MCP server bootstrap shared by the entry points.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { errorMessage } from "./result.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Optional callback when server is starting (before connect) */
  onStartup?: (services: S) => Promise<void> | void;

  /** Optional callback when server is shutting down */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Run `handler` once on the first SIGTERM or SIGINT, then exit.
 * Exit code 0 if the handler succeeds, 1 if it throws.
 */
export function onShutdownSignal(handler: () => Promise<void> | void): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`Received ${signal}, shutting down`);

    Promise.resolve()
      .then(handler)
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Shutdown failed:", errorMessage(error));
          process.exit(1);
        }
      );
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

/**
 * Bootstrap an MCP server on stdio.
 *
 * Creates services, registers tools, installs signal handlers, runs the
 * startup hook, then connects the transport.
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  onShutdownSignal(async () => {
    await onShutdown?.(services);
    await server.close();
  });

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * Run `main` and exit non-zero with its error if it rejects.
 * The preferred way to start any entry point.
 */
export function runMain(main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error));
    process.exit(1);
  });
}

/**
 * bootstrapServer with standard fatal-error handling.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  runMain(() => bootstrapServer(options));
}
