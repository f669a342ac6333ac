import type { Job } from "../model.js";

export interface JobLogReadOptions {
  /** Only the last N lines */
  tail?: number;
}

/**
 * Per-job captured-output logs, named deterministically by job id.
 */
export interface JobLogStore {
  pathFor(jobId: string): string;
  exists(jobId: string): boolean;

  /** Start a fresh log with the job's metadata. */
  writeHeader(job: Job): void;

  /** Append a line written by the worker rather than the job. */
  appendNote(job: Job, note: string): void;

  /** Close the log with the job's final state. */
  writeFooter(job: Job): void;

  /** Cleaned output, or null if the job never produced a log. */
  read(job: Job, options?: JobLogReadOptions): string | null;
}
