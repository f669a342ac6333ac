import { spawn, type ChildProcess } from "node:child_process";
import { closeSync, openSync } from "node:fs";

import { settlesWithin } from "../../core/async.js";
import type {
  CommandSpec,
  ExitOutcome,
  ProcessSupervisor,
  SupervisedProcess,
} from "../../core/ports/ProcessSupervisor.js";
import { isPidAlive, isProcessAlive, signalGroup, waitForPidExit } from "./processUtils.js";

/** How long to wait for the kernel to reap a SIGKILLed group. */
const KILL_WAIT_MS = 2000;

class ShellProcessHandle implements SupervisedProcess {
  readonly exited: Promise<ExitOutcome>;
  private done = false;

  constructor(
    private readonly proc: ChildProcess,
    logFd: number
  ) {
    this.exited = new Promise<ExitOutcome>((resolve) => {
      const settle = (outcome: ExitOutcome): void => {
        if (this.done) return;
        this.done = true;
        closeSync(logFd);
        resolve(outcome);
      };

      proc.on("error", (err) => {
        // Errors after a successful spawn (a failed kill) do not end the process
        if (proc.pid === undefined) {
          settle({ kind: "spawn_error", message: err.message });
        }
      });

      proc.on("close", (code, signal) => {
        if (proc.pid === undefined) return;
        settle({ kind: "exited", code, signal });
      });
    });
  }

  get pid(): number | null {
    return this.proc.pid ?? null;
  }

  async terminate(graceMs: number): Promise<boolean> {
    const pid = this.proc.pid;
    if (pid === undefined || this.done) return false;

    signalGroup(pid, "SIGTERM");
    if (await settlesWithin(this.exited, graceMs)) return true;

    signalGroup(pid, "SIGKILL");
    await settlesWithin(this.exited, KILL_WAIT_MS);
    return true;
  }
}

/**
 * Runs job commands through one fixed shell.
 *
 * Children are detached into their own process group so that stopping a job
 * also stops whatever the shell started. Output goes straight to the log file
 * descriptor.
 */
export class ShellProcessSupervisor implements ProcessSupervisor {
  constructor(private readonly shell: string = "/bin/sh") {}

  spawn(spec: CommandSpec, logFile: string): SupervisedProcess {
    const logFd = openSync(logFile, "a");

    let proc: ChildProcess;
    try {
      proc = spawn(this.shell, ["-c", spec.command], {
        cwd: spec.cwd ?? undefined,
        detached: true,
        stdio: ["ignore", logFd, logFd],
      });
    } catch (e) {
      closeSync(logFd);
      throw e;
    }

    return new ShellProcessHandle(proc, logFd);
  }

  async terminatePid(pid: number, graceMs: number): Promise<boolean> {
    if (!isPidAlive(pid)) return false;

    signalGroup(pid, "SIGTERM");
    if (await waitForPidExit(pid, graceMs)) return true;

    signalGroup(pid, "SIGKILL");
    await waitForPidExit(pid, KILL_WAIT_MS);
    return true;
  }

  isAlive(pid: number, startedAt?: string): boolean {
    return startedAt === undefined ? isPidAlive(pid) : isProcessAlive(pid, startedAt);
  }
}
