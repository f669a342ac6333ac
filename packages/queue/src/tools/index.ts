/**
 * MCP tool registration for the job queue.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { JobQueue } from "../core/services/JobQueue.js";

import { registerAdd } from "./add.js";
import { registerStatus } from "./status.js";
import { registerRemove } from "./remove.js";
import { registerStop } from "./stop.js";
import { registerClear } from "./clear.js";
import { registerLogs } from "./logs.js";
import { registerOutput } from "./output.js";

export interface Services {
  queue: JobQueue;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { queue } = services;

  registerAdd(server, queue);
  registerStatus(server, queue);
  registerRemove(server, queue);
  registerStop(server, queue);
  registerClear(server, queue);
  registerLogs(server, queue);
  registerOutput(server, queue);
}
