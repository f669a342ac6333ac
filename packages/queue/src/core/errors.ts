import type { JobStatus } from "./model.js";

/**
 * The persisted queue could not be read as a job list.
 * Fatal: the queue is never reset behind the operator's back.
 */
export class StoreCorruptionError extends Error {
  constructor(
    readonly file: string,
    detail: string
  ) {
    super(`Queue file is corrupt (${file}): ${detail}`);
    this.name = "StoreCorruptionError";
  }
}

export class LockTimeoutError extends Error {
  constructor(
    readonly lockFile: string,
    readonly ownerPid: number | null
  ) {
    super(
      ownerPid === null
        ? `Timed out waiting for queue lock ${lockFile}`
        : `Timed out waiting for queue lock ${lockFile} (held by PID ${ownerPid})`
    );
    this.name = "LockTimeoutError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}
