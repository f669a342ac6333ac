/**
 * Worker - executes queued jobs one at a time.
 *
 * Loop:
 * 1. Claim the oldest pending job (or sleep for the poll interval)
 * 2. Spawn it, combined output appended to its per-job log
 * 3. While it runs, poll the store for a stop request
 * 4. Record completed / failed / stopped and move on
 *
 * A single job's failure never ends the loop. A corrupt store does.
 */

import { constants } from "node:os";

import {
  SPAWN_FAILED_EXIT_CODE,
  STOPPED_EXIT_CODE,
  type Job,
  type JobOutcome,
} from "../model.js";
import { LockTimeoutError, StoreCorruptionError } from "../errors.js";
import { settlesWithin, sleep } from "../async.js";
import { processStartedAt } from "../time.js";
import type { AuditLog } from "../ports/AuditLog.js";
import type { JobLogStore } from "../ports/JobLogStore.js";
import type { Lease } from "../ports/Lease.js";
import type { ExitOutcome, ProcessSupervisor, SupervisedProcess } from "../ports/ProcessSupervisor.js";
import type { JobQueue } from "./JobQueue.js";

const SIGNAL_NUMBERS: Readonly<Record<string, number>> = { ...constants.signals };

export interface WorkerOptions {
  /** Idle poll interval, also the stop-request poll while a job runs (ms) */
  pollIntervalMs: number;

  /** SIGTERM-to-SIGKILL grace when stopping a job (ms) */
  killGraceMs: number;

  /** PID recorded on claimed jobs. Default: process.pid */
  pid?: number;
}

export class Worker {
  private readonly pid: number;
  private readonly startedAt: string | null;
  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly queue: JobQueue,
    private readonly supervisor: ProcessSupervisor,
    private readonly logs: JobLogStore,
    private readonly audit: AuditLog,
    private readonly lease: Lease,
    private readonly options: WorkerOptions
  ) {
    this.pid = options.pid ?? process.pid;
    this.startedAt = options.pid === undefined ? processStartedAt() : null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Take the worker lease, fail jobs orphaned by a previous worker, then run
   * until stop() is called. Rejects if another worker holds the lease or the
   * store is corrupt.
   */
  start(): Promise<void> {
    if (this.loop) return this.loop;

    const holder = this.lease.tryAcquire();
    if (holder !== null) {
      return Promise.reject(
        new Error(
          holder === -1
            ? "Another jobq worker is running"
            : `Another jobq worker is running (PID ${holder})`
        )
      );
    }

    this.running = true;
    this.loop = this.run().finally(() => {
      this.running = false;
      this.loop = null;
      this.lease.release();
    });
    return this.loop;
  }

  /**
   * End the loop. A job still running is terminated and recorded as
   * stopped. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    await this.loop;
  }

  /**
   * Run at most one job. Returns false if nothing was pending.
   */
  async runOnce(): Promise<boolean> {
    const job = await this.queue.claimNext(this.pid, this.startedAt);
    if (!job) return false;

    this.audit.append(`Starting job ${job.id}: ${job.name}`);
    try {
      await this.execute(job);
    } catch (e) {
      if (e instanceof StoreCorruptionError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[jobq] Error running job ${job.id}: ${message}`);
      const failed = await this.untilUnlocked(() =>
        this.queue.finish(job.id, { status: "failed", exitCode: SPAWN_FAILED_EXIT_CODE })
      );
      if (failed) {
        this.audit.append(`Job ${job.id} failed: ${message}`);
      }
    }
    return true;
  }

  // ============================================================
  // Private methods
  // ============================================================

  private async run(): Promise<void> {
    const orphans = await this.queue.recoverOrphans();
    if (orphans.length > 0) {
      console.error(`[jobq] Marked ${orphans.length} orphaned job(s) as failed`);
    }
    this.audit.append(`Worker started (PID ${this.pid})`);

    while (this.running) {
      let ran = false;
      try {
        ran = await this.runOnce();
      } catch (e) {
        // Another process sat on the queue lock; try again next poll
        if (!(e instanceof LockTimeoutError)) throw e;
        console.error(`[jobq] ${e.message}`);
      }
      if (!ran && this.running) {
        await this.idle();
      }
    }

    this.audit.append("Worker stopped");
  }

  private async execute(job: Job): Promise<void> {
    this.logs.writeHeader(job);

    let child: SupervisedProcess;
    try {
      child = this.supervisor.spawn({ command: job.command, cwd: job.cwd }, job.logFile);
    } catch (e) {
      await this.recordSpawnFailure(job, e instanceof Error ? e.message : String(e));
      return;
    }

    // Past this point the child may be running: nothing may finish the job
    // until it has exited.
    let stopRequested: boolean;
    try {
      const pid = child.pid;
      if (pid !== null) {
        await this.untilUnlocked(() => this.queue.attachPid(job.id, pid));
      }
      stopRequested = await this.superviseUntilExit(job, child);
    } catch (e) {
      await child.terminate(this.options.killGraceMs);
      throw e;
    }
    const exit = await child.exited;

    if (exit.kind === "spawn_error") {
      await this.recordSpawnFailure(job, exit.message);
      return;
    }

    const outcome: JobOutcome = stopRequested
      ? { status: "stopped", exitCode: STOPPED_EXIT_CODE }
      : outcomeOf(exit);

    const finished = await this.untilUnlocked(() => this.queue.finish(job.id, outcome));
    if (!finished) return;

    if (finished.status === "stopped") {
      this.logs.appendNote(
        finished,
        this.running ? "Job was stopped by user" : "Worker shut down while this job was running"
      );
    }
    this.logs.writeFooter(finished);
    this.audit.append(describeOutcome(finished));
  }

  /**
   * Wait for the child to exit, terminating it if a stop is requested or the
   * worker is shutting down. Returns true if it was terminated.
   */
  private async superviseUntilExit(job: Job, child: SupervisedProcess): Promise<boolean> {
    for (;;) {
      if (await settlesWithin(child.exited, this.options.pollIntervalMs)) {
        return false;
      }
      if (!this.running || this.queue.isStopRequested(job.id)) {
        return child.terminate(this.options.killGraceMs);
      }
    }
  }

  private async recordSpawnFailure(job: Job, message: string): Promise<void> {
    this.logs.appendNote(job, `Failed to start: ${message}`);
    const failed = await this.untilUnlocked(() =>
      this.queue.finish(job.id, { status: "failed", exitCode: SPAWN_FAILED_EXIT_CODE })
    );
    if (!failed) return;

    this.logs.writeFooter(failed);
    this.audit.append(`Job ${job.id} failed to start: ${message}`);
  }

  /**
   * Run a store operation, retrying while another process holds the queue lock.
   */
  private async untilUnlocked<T>(operation: () => Promise<T>): Promise<T> {
    for (;;) {
      try {
        return await operation();
      } catch (e) {
        if (!(e instanceof LockTimeoutError)) throw e;
        console.error(`[jobq] ${e.message}`);
        await sleep(this.options.pollIntervalMs);
      }
    }
  }

  private idle(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.options.pollIntervalMs);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}

/**
 * Map a natural exit to a terminal status.
 * Death by signal is reported shell-style as 128 + signal number.
 */
export function outcomeOf(exit: Extract<ExitOutcome, { kind: "exited" }>): JobOutcome {
  if (exit.code !== null) {
    return { status: exit.code === 0 ? "completed" : "failed", exitCode: exit.code };
  }
  const signalNumber = exit.signal ? (SIGNAL_NUMBERS[exit.signal] ?? 0) : 0;
  return { status: "failed", exitCode: 128 + signalNumber };
}

function describeOutcome(job: Job): string {
  switch (job.status) {
    case "completed":
      return `Job ${job.id} completed successfully`;
    case "stopped":
      return `Stopped job ${job.id}`;
    default:
      return `Job ${job.id} failed with exit code ${job.exitCode}`;
  }
}
