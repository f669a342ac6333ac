/**
 * job_remove - Drop a pending job.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, textResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";
import { removeFailure } from "./messages.js";

const InputSchema = {
  id: z.string().min(1).describe("Job ID"),
};

export function registerRemove(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_remove",
    {
      title: "Remove job",
      description: `Remove a job that has not started yet. Running and finished jobs cannot be removed.`,
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      try {
        if (await queue.remove(id)) {
          return textResponse(`Removed job ${id}`);
        }
        return errorResponse(removeFailure(queue, id));
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
