/**
 * job_clear - Forget finished jobs.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, successResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";

export function registerClear(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_clear",
    {
      title: "Clear finished jobs",
      description: `Remove completed, failed and stopped jobs from the queue. Pending and running jobs are kept.`,
      inputSchema: {},
    },
    async () => {
      try {
        const cleared = await queue.clear();
        return successResponse(`Cleared ${cleared} finished job(s)`, { cleared });
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
