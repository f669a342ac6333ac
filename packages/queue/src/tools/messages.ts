/**
 * Failure text shared by the MCP tools and the CLI.
 */

import type { JobQueue } from "../core/services/JobQueue.js";

export function notFound(id: string): string {
  return `Job not found: ${id}`;
}

/**
 * Why remove() returned false for `id`.
 */
export function removeFailure(queue: JobQueue, id: string): string {
  const job = queue.get(id);
  if (!job) return notFound(id);
  return `Job ${id} is ${job.status}; only pending jobs can be removed`;
}

/**
 * Why stop() returned false for `id`.
 */
export function stopFailure(queue: JobQueue, id: string): string {
  const job = queue.get(id);
  if (!job) return notFound(id);
  if (job.status === "running") {
    return `Job ${id} is still running; the worker did not acknowledge the stop request in time`;
  }
  return `Job ${id} is ${job.status}; only running jobs can be stopped`;
}
