/**
 * Shared fixtures for queue tests.
 */

import { spawnSync } from "node:child_process";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Job } from "../src/core/model.js";
import type {
  CommandSpec,
  ProcessSupervisor,
  SupervisedProcess,
} from "../src/core/ports/ProcessSupervisor.js";
import { sleep } from "../src/core/async.js";

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "jobq-test-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  const id = overrides.id ?? "job000000001";
  return {
    id,
    name: "echo:hi",
    command: "echo hi",
    cwd: null,
    status: "pending",
    createdAt: "2024-01-01T00:00:00.000Z",
    startedAt: null,
    completedAt: null,
    exitCode: null,
    pid: null,
    workerPid: null,
    workerStartedAt: null,
    stopRequestedAt: null,
    logFile: `/tmp/job_${id}.log`,
    ...overrides,
  };
}

/**
 * PID of a process that has already exited and been reaped.
 */
export function deadPid(): number {
  const result = spawnSync("true");
  if (result.pid === undefined) throw new Error("could not spawn `true`");
  return result.pid;
}

/**
 * Poll `predicate` until it holds, failing after `timeoutMs`.
 */
export async function waitUntil(
  predicate: () => boolean,
  timeoutMs = 10_000,
  intervalMs = 20
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() >= deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await sleep(intervalMs);
  }
}

/**
 * Supervisor that never starts anything. Liveness comes from `alive`;
 * PIDs in `reused` fail any start-time check.
 */
export class FakeSupervisor implements ProcessSupervisor {
  readonly alive = new Set<number>();
  readonly reused = new Set<number>();
  readonly terminated: Array<{ pid: number; graceMs: number }> = [];

  spawn(spec: CommandSpec): SupervisedProcess {
    throw new Error(`FakeSupervisor cannot run ${spec.command}`);
  }

  async terminatePid(pid: number, graceMs: number): Promise<boolean> {
    this.terminated.push({ pid, graceMs });
    return this.alive.delete(pid);
  }

  isAlive(pid: number, startedAt?: string): boolean {
    if (startedAt !== undefined && this.reused.has(pid)) return false;
    return this.alive.has(pid);
  }
}
