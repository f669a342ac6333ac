/**
 * Wait for an unrelated process to exit, then run a follow-up command.
 * Shares nothing with the queue beyond the supervisor and log formats.
 */

import { join } from "node:path";

import { errorMessage } from "@jobq/core";

import { sleep } from "./core/async.js";
import type { AuditLog } from "./core/ports/AuditLog.js";
import type { ProcessSupervisor } from "./core/ports/ProcessSupervisor.js";
import { outcomeOf } from "./core/services/Worker.js";
import { SPAWN_FAILED_EXIT_CODE } from "./core/model.js";

export interface WaitPidOptions {
  /** Process to wait for */
  pid: number;

  /** Shell command to run once it has exited */
  command: string;

  /** Working directory for the command (null = current) */
  cwd?: string | null;

  /** Liveness check interval (ms). Default: 1000 */
  pollMs?: number;

  /** Interval between "still waiting" log lines (ms). Default: 60000 */
  heartbeatMs?: number;
}

/**
 * `waitpid-YYYYMMDD-HHMMSS.log` in `dir`, stamped with local time.
 */
export function waitPidLogPath(dir: string, now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}-` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(dir, `waitpid-${stamp}.log`);
}

/**
 * Poll until `pid` is gone, then run the command with its output appended
 * to `logFile`. Resolves with the command's exit code.
 */
export async function waitThenRun(
  options: WaitPidOptions,
  supervisor: ProcessSupervisor,
  log: AuditLog,
  logFile: string
): Promise<number> {
  const { pid, command } = options;
  const pollMs = options.pollMs ?? 1000;
  const heartbeatMs = options.heartbeatMs ?? 60_000;

  log.append(`Waiting for PID ${pid} to exit, then running: ${command}`);

  const waitStarted = Date.now();
  let nextHeartbeat = waitStarted + heartbeatMs;
  while (supervisor.isAlive(pid)) {
    await sleep(pollMs);
    if (Date.now() >= nextHeartbeat) {
      const minutes = Math.floor((Date.now() - waitStarted) / 60_000);
      log.append(`Still waiting for PID ${pid} (${minutes}m elapsed)`);
      nextHeartbeat += heartbeatMs;
    }
  }

  log.append(`PID ${pid} has exited. Running command: ${command}`);

  let exitCode = SPAWN_FAILED_EXIT_CODE;
  try {
    const exit = await supervisor.spawn({ command, cwd: options.cwd ?? null }, logFile).exited;
    if (exit.kind === "spawn_error") {
      log.append(`Command failed to start: ${exit.message}`);
    } else {
      exitCode = outcomeOf(exit).exitCode;
    }
  } catch (e) {
    log.append(`Command failed to start: ${errorMessage(e)}`);
  }

  log.append(`Command finished with exit code ${exitCode}`);
  return exitCode;
}
