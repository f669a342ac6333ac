/**
 * job_output - Read a job's captured output.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, textResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";
import { formatOutput } from "./format.js";
import { notFound } from "./messages.js";

const InputSchema = {
  id: z.string().min(1).describe("Job ID"),
  tail: z.number().int().positive().optional().describe("Only the last N lines"),
};

export function registerOutput(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_output",
    {
      title: "Job output",
      description: `Get a job's combined stdout/stderr, cleaned of ANSI codes and progress noise.
Works while the job is running.`,
      inputSchema: InputSchema,
    },
    async ({ id, tail }) => {
      try {
        const output = queue.output(id, { tail });
        if (output === null) {
          return errorResponse(notFound(id));
        }
        return textResponse(formatOutput(output));
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
