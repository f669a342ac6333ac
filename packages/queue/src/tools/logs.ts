/**
 * job_logs - Tail the queue's audit log.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, textResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";

const InputSchema = {
  lines: z.number().int().positive().max(10_000).optional().describe("Number of lines (default: 20)"),
};

export function registerLogs(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_logs",
    {
      title: "Queue log",
      description: `Show the most recent queue events: jobs added, started, finished, stopped and removed.`,
      inputSchema: InputSchema,
    },
    async ({ lines }) => {
      try {
        const entries = queue.logs(lines ?? 20);
        return textResponse(entries.length > 0 ? entries.join("\n") : "(log is empty)");
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
