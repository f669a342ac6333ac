/**
 * Core domain model for the job queue.
 *
 * Design principles:
 * - One JSON document is the single source of truth for job state
 * - Every mutation is a locked read-modify-write of that document
 * - Output lives in per-job log files, never in the document
 * - The live child process belongs to the worker; only its effects are persisted
 */

/**
 * Job lifecycle status.
 *
 * - pending: Queued, waiting for the worker
 * - running: Claimed by the worker, child process executing
 * - completed: Child exited with code 0
 * - failed: Child exited non-zero, could not be spawned, or was orphaned
 * - stopped: Terminated on request
 */
export type JobStatus = "pending" | "running" | "completed" | "failed" | "stopped";

export const JOB_STATUSES: readonly JobStatus[] = [
  "pending",
  "running",
  "completed",
  "failed",
  "stopped",
] as const;

export type TerminalStatus = Extract<JobStatus, "completed" | "failed" | "stopped">;

/**
 * Legal forward transitions. Anything not listed here is rejected.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ["running"],
  running: ["completed", "failed", "stopped"],
  completed: [],
  failed: [],
  stopped: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/** Exit code recorded for a job stopped on request. */
export const STOPPED_EXIT_CODE = -15;

/** Exit code recorded when the child process could not be started. */
export const SPAWN_FAILED_EXIT_CODE = -1;

/** Exit code recorded for a job found running with no live worker. */
export const ORPHANED_EXIT_CODE = -2;

/**
 * A queued shell command and its lifecycle metadata.
 * Persisted to queue.json in insertion order.
 */
export interface Job {
  /** Unique identifier, never reused */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** The shell command to execute */
  readonly command: string;

  /** Working directory for execution (null = worker's cwd) */
  readonly cwd: string | null;

  status: JobStatus;

  /** ISO timestamps, each set exactly once */
  readonly createdAt: string;
  startedAt: string | null;
  completedAt: string | null;

  /** Null until the job reaches a terminal status */
  exitCode: number | null;

  /** Child process ID while running */
  pid: number | null;

  /** PID of the worker that claimed the job */
  workerPid: number | null;

  /** When the claiming worker process started, if known */
  workerStartedAt: string | null;

  /** Set by a stop request, serviced by the worker */
  stopRequestedAt: string | null;

  /** Path to the per-job output log */
  readonly logFile: string;
}

/**
 * Options for adding a job.
 */
export interface AddOptions {
  /** Human-readable name. Default: derived from the command */
  name?: string;

  /** Working directory */
  cwd?: string;
}

/**
 * How a running job ended, as decided by the worker.
 */
export interface JobOutcome {
  status: TerminalStatus;
  exitCode: number;
}

export interface QueueStats {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  stopped: number;
}

/**
 * Configuration shared by the queue, the worker and the entry points.
 */
export interface QueueConfig {
  /** Directory holding queue.json, the audit log and per-job logs. Default: ".jobq" */
  dataDir?: string;

  /** Worker idle poll interval, also used for stop polling (ms). Default: 1000 */
  pollIntervalMs?: number;

  /** How long a stop request waits for the worker (ms). Default: 15000 */
  stopTimeoutMs?: number;

  /** Grace period between SIGTERM and SIGKILL (ms). Default: 5000 */
  killGraceMs?: number;

  /** How long to wait for the queue lock (ms). Default: 10000 */
  lockTimeoutMs?: number;

  /** Delay between lock attempts (ms). Default: 25 */
  lockRetryMs?: number;

  /** A lock held longer than this is considered abandoned (ms). Default: 30000 */
  staleLockMs?: number;

  /** Shell used to run commands. Default: "/bin/sh" */
  shell?: string;
}

export const DEFAULT_CONFIG: Required<QueueConfig> = {
  dataDir: ".jobq",
  pollIntervalMs: 1000,
  stopTimeoutMs: 15_000,
  killGraceMs: 5000,
  lockTimeoutMs: 10_000,
  lockRetryMs: 25,
  staleLockMs: 30_000,
  shell: "/bin/sh",
};

/**
 * Well-known file locations inside the data directory.
 */
export interface QueuePaths {
  queueFile: string;
  lockFile: string;
  auditLog: string;
  logsDir: string;
  workerLock: string;
}
