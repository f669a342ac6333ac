/**
 * Shared formatting for tool and CLI output.
 */

import type { Job, JobStatus } from "../core/model.js";

/**
 * Format job metadata as markdown.
 */
export function formatJob(job: Job, now: Date = new Date()): string {
  const lines: string[] = [];

  lines.push(`## Job: ${job.id}`);
  lines.push("");
  lines.push(`**Name:** ${job.name}`);
  lines.push(`**Command:** \`${job.command}\``);
  lines.push(`**Status:** ${formatStatus(job.status)}`);

  if (job.exitCode !== null) {
    lines.push(`**Exit code:** ${job.exitCode}`);
  }

  lines.push(`**Created:** ${job.createdAt}`);

  if (job.startedAt) {
    lines.push(`**Started:** ${job.startedAt}`);
    const startedAt = new Date(job.startedAt);
    if (job.completedAt) {
      lines.push(`**Completed:** ${job.completedAt}`);
      lines.push(`**Duration:** ${formatDuration(startedAt, new Date(job.completedAt))}`);
    } else {
      lines.push(`**Running for:** ${formatDuration(startedAt, now)}`);
    }
  }

  if (job.cwd) {
    lines.push(`**Working dir:** ${job.cwd}`);
  }

  if (job.pid !== null) {
    lines.push(`**PID:** ${job.pid}`);
  }

  if (job.stopRequestedAt && job.status === "running") {
    lines.push(`**Stop requested:** ${job.stopRequestedAt}`);
  }

  return lines.join("\n");
}

/**
 * One line per job, oldest first.
 */
export function formatJobList(jobs: readonly Job[]): string {
  if (jobs.length === 0) {
    return "No jobs in queue";
  }

  return jobs
    .map((job) => {
      const exit = job.exitCode === null ? "" : ` (exit ${job.exitCode})`;
      return `${job.id}  ${job.status.padEnd(9)}  ${job.name}${exit}`;
    })
    .join("\n");
}

/**
 * Format captured output. Long output keeps its head and tail.
 */
export function formatOutput(output: string): string {
  if (output.trim() === "") {
    return "### Output\n\n(no output)";
  }

  const lines = output.split("\n");
  const maxLines = 100;

  if (lines.length <= maxLines) {
    return `### Output\n\n\`\`\`\n${output}\n\`\`\``;
  }

  const head = lines.slice(0, 30).join("\n");
  const tail = lines.slice(-60).join("\n");
  const omitted = lines.length - 90;

  return `### Output\n\n\`\`\`\n${head}\n\n... (${omitted} lines omitted) ...\n\n${tail}\n\`\`\``;
}

function formatStatus(status: JobStatus): string {
  switch (status) {
    case "pending":
      return "⏳ Pending";
    case "running":
      return "🔄 Running";
    case "completed":
      return "✅ Completed";
    case "failed":
      return "❌ Failed";
    case "stopped":
      return "🛑 Stopped";
  }
}

/**
 * Format duration between two dates.
 */
export function formatDuration(start: Date, end: Date): string {
  const ms = end.getTime() - start.getTime();

  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600_000) {
    const mins = Math.floor(ms / 60_000);
    const secs = Math.floor((ms % 60_000) / 1000);
    return `${mins}m ${secs}s`;
  }

  const hours = Math.floor(ms / 3600_000);
  const mins = Math.floor((ms % 3600_000) / 60_000);
  return `${hours}h ${mins}m`;
}
