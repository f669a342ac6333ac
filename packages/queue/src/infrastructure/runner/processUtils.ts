/**
 * Process management utilities.
 */
import { readFileSync } from "node:fs";

import { sleep } from "../../core/async.js";

export function isPidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0); // Signal 0 = check existence
    return true;
  } catch (e) {
    // EPERM: exists but owned by someone else
    return isErrnoException(e) && e.code === "EPERM";
  }
}

/**
 * Signal a whole process group, falling back to the single PID.
 * Returns false if neither exists any more.
 */
export function signalGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal);
    return true;
  } catch {
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Poll until `pid` is gone or `timeoutMs` elapses. Resolves true if it is gone.
 */
export async function waitForPidExit(
  pid: number,
  timeoutMs: number,
  intervalMs = 50
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (isPidAlive(pid)) {
    if (Date.now() >= deadline) return false;
    await sleep(intervalMs);
  }
  return true;
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Get the start time of a process in ms since epoch (Linux only).
 */
export function getProcessStartTime(pid: number): number {
  // Field 22 of /proc/{pid}/stat is starttime in clock ticks since boot
  const stat = readFileSync(`/proc/${pid}/stat`, "utf-8");
  // The command name (field 2) may contain spaces; count from after its ")"
  const fields = stat.slice(stat.lastIndexOf(")") + 2).split(" ");
  const startTimeTicks = parseInt(fields[19], 10);
  const uptimeSeconds = parseFloat(readFileSync("/proc/uptime", "utf-8").split(" ")[0]);
  const bootTime = Date.now() - uptimeSeconds * 1000;
  const ticksPerSecond = 100; // Usually 100 on Linux
  return bootTime + (startTimeTicks / ticksPerSecond) * 1000;
}

/**
 * Check if a process is alive AND started around `expectedStartTime`.
 * Handles PID reuse by comparing start times.
 */
export function isProcessAlive(pid: number, expectedStartTime: string): boolean {
  if (!isPidAlive(pid)) {
    return false;
  }

  try {
    const procStartTime = getProcessStartTime(pid);
    const expected = new Date(expectedStartTime).getTime();
    // Allow 5 second tolerance for start time comparison
    return Math.abs(procStartTime - expected) < 5000;
  } catch {
    // Can't get start time - assume it's our process if PID exists
    return true;
  }
}
