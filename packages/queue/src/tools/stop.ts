/**
 * job_stop - Terminate a running job.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, textResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";
import { stopFailure } from "./messages.js";

const InputSchema = {
  id: z.string().min(1).describe("Job ID"),
};

export function registerStop(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_stop",
    {
      title: "Stop job",
      description: `Stop a running job and its child processes.

Sends SIGTERM, then SIGKILL after a grace period. Waits until the job is
recorded as stopped.`,
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      try {
        if (await queue.stop(id)) {
          return textResponse(`Stopped job ${id}`);
        }
        return errorResponse(stopFailure(queue, id));
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
