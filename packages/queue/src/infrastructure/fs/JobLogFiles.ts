import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type { Job } from "../../core/model.js";
import type { JobLogReadOptions, JobLogStore } from "../../core/ports/JobLogStore.js";
import { readOutput } from "./fileUtils.js";

const RULE = "=".repeat(50);

/**
 * `logs/job_<id>.log`: a metadata header, the raw combined stdout/stderr,
 * then a footer with the final status.
 */
export class JobLogFiles implements JobLogStore {
  constructor(private readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  pathFor(jobId: string): string {
    return join(this.dir, `job_${jobId}.log`);
  }

  exists(jobId: string): boolean {
    return existsSync(this.pathFor(jobId));
  }

  writeHeader(job: Job): void {
    const lines = [
      `Job ID: ${job.id}`,
      `Name: ${job.name}`,
      `Command: ${job.command}`,
      `Working dir: ${job.cwd ?? process.cwd()}`,
      `Created: ${job.createdAt}`,
      `Started: ${job.startedAt ?? "-"}`,
      RULE,
    ];
    writeFileSync(job.logFile, lines.join("\n") + "\n");
  }

  appendNote(job: Job, note: string): void {
    appendFileSync(job.logFile, `[jobq] ${note}\n`);
  }

  writeFooter(job: Job): void {
    const lines = [
      RULE,
      `Status: ${job.status}`,
      `Exit Code: ${job.exitCode ?? "-"}`,
      `Completed: ${job.completedAt ?? "-"}`,
    ];
    appendFileSync(job.logFile, lines.join("\n") + "\n");
  }

  read(job: Job, options: JobLogReadOptions = {}): string | null {
    return readOutput(job.logFile, options);
  }
}
