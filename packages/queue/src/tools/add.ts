/**
 * job_add - Queue a shell command.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, resultToResponse, successResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";

const InputSchema = {
  command: z.string().min(1).describe("Shell command to run"),
  name: z.string().optional().describe("Display name (default: derived from the command)"),
  cwd: z.string().optional().describe("Working directory (default: the worker's)"),
};

export function registerAdd(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_add",
    {
      title: "Add job",
      description: `Queue a shell command for the worker.

Jobs run one at a time in the order they were added.
Returns the new job's ID immediately; use job_status to follow it.`,
      inputSchema: InputSchema,
    },
    async ({ command, name, cwd }) => {
      try {
        const result = await queue.add(command, { name, cwd });
        return resultToResponse(result, (job) =>
          successResponse(`Added job ${job.id}: ${job.name}`, { id: job.id, name: job.name })
        );
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
