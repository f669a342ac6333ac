import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { spawn } from "node:child_process";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { waitPidLogPath, waitThenRun } from "../src/waitpid.js";
import { AuditLogFile } from "../src/infrastructure/fs/AuditLogFile.js";
import { ShellProcessSupervisor } from "../src/infrastructure/runner/ShellProcessSupervisor.js";
import { deadPid, makeTempDir, removeTempDir } from "./helpers.js";

const TIMESTAMP = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] /;

describe("waitThenRun", () => {
  let dir: string;
  let logFile: string;
  const supervisor = new ShellProcessSupervisor();

  const logLines = (): string[] =>
    readFileSync(logFile, "utf-8")
      .trimEnd()
      .split("\n")
      .map((line) => line.replace(TIMESTAMP, ""));

  beforeEach(() => {
    dir = makeTempDir();
    logFile = join(dir, "waitpid.log");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("names the log after the local start time", () => {
    expect(waitPidLogPath("/data", new Date(2024, 2, 5, 7, 8, 9))).toBe(
      "/data/waitpid-20240305-070809.log"
    );
  });

  it("runs the command at once when the process is already gone", async () => {
    const pid = deadPid();
    const code = await waitThenRun(
      { pid, command: "echo after; exit 3" },
      supervisor,
      new AuditLogFile(logFile),
      logFile
    );

    expect(code).toBe(3);
    expect(logLines()).toEqual([
      `Waiting for PID ${pid} to exit, then running: echo after; exit 3`,
      `PID ${pid} has exited. Running command: echo after; exit 3`,
      "after",
      "Command finished with exit code 3",
    ]);
  });

  it("waits for a live process and logs heartbeats", async () => {
    const target = spawn("sleep", ["0.5"]);
    const pid = target.pid;
    if (pid === undefined) throw new Error("no pid");
    const exited = new Promise((resolve) => target.on("exit", resolve));

    const started = Date.now();
    const code = await waitThenRun(
      { pid, command: "true", pollMs: 50, heartbeatMs: 100 },
      supervisor,
      new AuditLogFile(logFile),
      logFile
    );
    await exited;

    expect(code).toBe(0);
    expect(Date.now() - started).toBeGreaterThanOrEqual(400);
    const lines = logLines();
    expect(lines.some((line) => line.startsWith(`Still waiting for PID ${pid}`))).toBe(true);
    expect(lines.at(-1)).toBe("Command finished with exit code 0");
  });
});
