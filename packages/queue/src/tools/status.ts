/**
 * job_status - Inspect one job or the whole queue.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, errorResponse, textResponse } from "@jobq/core";
import type { JobQueue } from "../core/services/JobQueue.js";
import { formatJob, formatJobList } from "./format.js";
import { notFound } from "./messages.js";

const InputSchema = {
  id: z.string().optional().describe("Job ID (omit to list every job)"),
};

export function registerStatus(server: McpServer, queue: JobQueue): void {
  server.registerTool(
    "job_status",
    {
      title: "Job status",
      description: `Show a job's details, or list all jobs oldest first.`,
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      try {
        if (id) {
          const job = queue.get(id);
          return job ? textResponse(formatJob(job)) : errorResponse(notFound(id));
        }

        const stats = queue.stats();
        const summary = `${stats.total} job(s): ${stats.pending} pending, ${stats.running} running, ${stats.completed} completed, ${stats.failed} failed, ${stats.stopped} stopped`;
        return textResponse(`${summary}\n\n${formatJobList(queue.status())}`);
      } catch (e) {
        return errorResponse(errorMessage(e));
      }
    }
  );
}
