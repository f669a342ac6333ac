import { customAlphabet } from "nanoid";
import { Err, Ok, type Result } from "@jobq/core";

import {
  ORPHANED_EXIT_CODE,
  STOPPED_EXIT_CODE,
  canTransition,
  isTerminal,
  type AddOptions,
  type Job,
  type JobOutcome,
  type JobStatus,
  type QueueStats,
} from "../model.js";
import { InvalidTransitionError } from "../errors.js";
import { deriveName } from "../naming.js";
import { sleep } from "../async.js";
import { timestampNotBefore } from "../time.js";
import type { AuditLog } from "../ports/AuditLog.js";
import type { JobLogReadOptions, JobLogStore } from "../ports/JobLogStore.js";
import type { JobStore } from "../ports/JobStore.js";
import type { ProcessSupervisor } from "../ports/ProcessSupervisor.js";

const newId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 12);

/** How often a stop request re-reads the store while waiting for the worker. */
const STOP_POLL_MS = 100;

export interface JobQueueOptions {
  /** How long stop() waits for the worker to act (ms) */
  stopTimeoutMs: number;

  /** SIGTERM-to-SIGKILL grace when stopping an orphaned child (ms) */
  killGraceMs: number;
}

/**
 * Queue operations over the shared store.
 *
 * Every mutation is one critical section of the store, so any number of
 * processes can call these concurrently.
 */
export class JobQueue {
  constructor(
    private readonly store: JobStore,
    private readonly audit: AuditLog,
    private readonly jobLogs: JobLogStore,
    private readonly supervisor: ProcessSupervisor,
    private readonly options: JobQueueOptions
  ) {}

  async add(command: string, options: AddOptions = {}): Promise<Result<Job, string>> {
    const trimmed = command.trim();
    if (!trimmed) return Err("Command cannot be empty");

    const name = options.name?.trim() || deriveName(trimmed);

    const job = await this.store.transact((jobs) => {
      const id = this.allocateId(jobs);
      const created: Job = {
        id,
        name,
        command: trimmed,
        cwd: options.cwd ?? null,
        status: "pending",
        createdAt: new Date().toISOString(),
        startedAt: null,
        completedAt: null,
        exitCode: null,
        pid: null,
        workerPid: null,
        workerStartedAt: null,
        stopRequestedAt: null,
        logFile: this.jobLogs.pathFor(id),
      };
      return { value: created, jobs: [...jobs, created] };
    });

    this.audit.append(`Added job ${job.id}: ${job.name}`);
    return Ok(job);
  }

  get(id: string): Job | null {
    return this.store.read().find((job) => job.id === id) ?? null;
  }

  /**
   * All jobs, oldest first.
   */
  status(): Job[] {
    return this.store.read();
  }

  /**
   * Remove a pending job. False if it doesn't exist or isn't pending.
   */
  async remove(id: string): Promise<boolean> {
    const removed = await this.store.transact<boolean>((jobs) => {
      const index = jobs.findIndex((job) => job.id === id && job.status === "pending");
      if (index === -1) return { value: false };
      return { value: true, jobs: jobs.filter((_, i) => i !== index) };
    });

    if (removed) {
      this.audit.append(`Removed job ${id}`);
    }
    return removed;
  }

  /**
   * Stop a running job. True once its process is gone and it is recorded as stopped.
   *
   * The child belongs to the worker, so a live worker is asked through the
   * store and this call waits for it. Without a live worker the recorded
   * process group is terminated here.
   */
  async stop(id: string): Promise<boolean> {
    const requested = await this.store.transact<Job | null>((jobs) => {
      const job = jobs.find((j) => j.id === id);
      if (!job || job.status !== "running") return { value: null };
      job.stopRequestedAt ??= new Date().toISOString();
      return { value: { ...job }, jobs };
    });
    if (!requested) return false;

    if (
      requested.workerPid !== null &&
      this.supervisor.isAlive(requested.workerPid, requested.workerStartedAt ?? undefined)
    ) {
      return this.awaitWorkerStop(id);
    }
    return this.stopUnsupervised(requested);
  }

  /**
   * Discard all finished jobs. Returns how many were removed.
   */
  async clear(): Promise<number> {
    const cleared = await this.store.transact<number>((jobs) => {
      const kept = jobs.filter((job) => !isTerminal(job.status));
      const count = jobs.length - kept.length;
      return count === 0 ? { value: 0 } : { value: count, jobs: kept };
    });

    this.audit.append(`Cleared ${cleared} finished job(s)`);
    return cleared;
  }

  /**
   * Last lines of the audit log.
   */
  logs(lines = 20): string[] {
    return this.audit.tail(lines);
  }

  /**
   * Captured output of a job. Null if the job is unknown.
   * Empty string if it never started.
   */
  output(id: string, options: JobLogReadOptions = {}): string | null {
    const job = this.get(id);
    if (!job) return null;
    return this.jobLogs.read(job, options) ?? "";
  }

  stats(): QueueStats {
    const jobs = this.store.read();
    const count = (status: JobStatus): number => jobs.filter((j) => j.status === status).length;
    return {
      total: jobs.length,
      pending: count("pending"),
      running: count("running"),
      completed: count("completed"),
      failed: count("failed"),
      stopped: count("stopped"),
    };
  }

  // ============================================================
  // Worker-facing operations
  // ============================================================

  /**
   * Move the oldest pending job to running on behalf of `workerPid`.
   * `workerStartedAt` lets stop() tell the worker from a process that reused its PID.
   */
  async claimNext(workerPid: number, workerStartedAt: string | null = null): Promise<Job | null> {
    return this.store.transact<Job | null>((jobs) => {
      const job = jobs.find((j) => j.status === "pending");
      if (!job) return { value: null };

      transition(job, "running");
      job.startedAt = timestampNotBefore(job.createdAt);
      job.workerPid = workerPid;
      job.workerStartedAt = workerStartedAt;
      return { value: { ...job }, jobs };
    });
  }

  async attachPid(id: string, pid: number): Promise<void> {
    await this.store.transact((jobs) => {
      const job = jobs.find((j) => j.id === id);
      if (!job || job.status !== "running") return { value: undefined };
      job.pid = pid;
      return { value: undefined, jobs };
    });
  }

  /**
   * Record how a running job ended.
   * Returns null, changing nothing, if the job is no longer running.
   */
  async finish(id: string, outcome: JobOutcome): Promise<Job | null> {
    return this.store.transact<Job | null>((jobs) => {
      const job = jobs.find((j) => j.id === id);
      if (!job || job.status !== "running") return { value: null };

      transition(job, outcome.status);
      job.completedAt = timestampNotBefore(job.startedAt);
      job.exitCode = outcome.exitCode;
      job.pid = null;
      return { value: { ...job }, jobs };
    });
  }

  isStopRequested(id: string): boolean {
    const job = this.get(id);
    return job !== null && job.stopRequestedAt !== null;
  }

  /**
   * Fail every job left running. Only call while holding the worker lease
   * and before claiming anything: no other worker can own a running job.
   */
  async recoverOrphans(): Promise<Job[]> {
    const stale = this.store.read().filter((job) => job.status === "running");

    for (const job of stale) {
      if (job.pid !== null && job.startedAt !== null && this.supervisor.isAlive(job.pid, job.startedAt)) {
        await this.supervisor.terminatePid(job.pid, this.options.killGraceMs);
      }
    }

    const staleIds = new Set(stale.map((job) => job.id));
    const recovered = await this.store.transact<Job[]>((jobs) => {
      const failed: Job[] = [];
      for (const job of jobs) {
        if (!staleIds.has(job.id) || job.status !== "running") continue;
        transition(job, "failed");
        job.completedAt = timestampNotBefore(job.startedAt);
        job.exitCode = ORPHANED_EXIT_CODE;
        job.pid = null;
        failed.push({ ...job });
      }
      return failed.length === 0 ? { value: failed } : { value: failed, jobs };
    });

    for (const job of recovered) {
      this.jobLogs.appendNote(job, "Worker exited while this job was running");
      this.jobLogs.writeFooter(job);
      this.audit.append(`Job ${job.id} orphaned by a previous worker`);
    }
    return recovered;
  }

  // ============================================================
  // Private methods
  // ============================================================

  private allocateId(jobs: readonly Job[]): string {
    const taken = new Set(jobs.map((job) => job.id));
    let id = newId();
    while (taken.has(id) || this.jobLogs.exists(id)) {
      id = newId();
    }
    return id;
  }

  private async awaitWorkerStop(id: string): Promise<boolean> {
    const deadline = Date.now() + this.options.stopTimeoutMs;

    for (;;) {
      const job = this.get(id);
      if (!job) return false;
      if (job.status === "stopped") return true;
      if (isTerminal(job.status)) return false;
      if (Date.now() >= deadline) {
        console.error(`[jobq] Worker did not stop job ${id} within ${this.options.stopTimeoutMs}ms`);
        return false;
      }
      await sleep(STOP_POLL_MS);
    }
  }

  private async stopUnsupervised(job: Job): Promise<boolean> {
    if (job.pid !== null && job.startedAt !== null && this.supervisor.isAlive(job.pid, job.startedAt)) {
      await this.supervisor.terminatePid(job.pid, this.options.killGraceMs);
    }

    const stopped = await this.finish(job.id, { status: "stopped", exitCode: STOPPED_EXIT_CODE });
    if (!stopped) return false;

    this.jobLogs.appendNote(stopped, "Job was stopped by user");
    this.jobLogs.writeFooter(stopped);
    this.audit.append(
      job.pid === null ? `Stopped job ${job.id}` : `Stopped job ${job.id} (PID ${job.pid})`
    );
    return true;
  }
}

function transition(job: Job, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
  job.status = to;
}
