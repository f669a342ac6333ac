#!/usr/bin/env node
/**
 * jobq-waitpid <pid> <command...>
 */

import { mkdirSync } from "node:fs";

import { runMain } from "@jobq/core";
import { configFromEnv } from "./config.js";
import { DEFAULT_CONFIG } from "./core/model.js";
import { AuditLogFile } from "./infrastructure/fs/AuditLogFile.js";
import { ShellProcessSupervisor } from "./infrastructure/runner/ShellProcessSupervisor.js";
import { waitPidLogPath, waitThenRun } from "./waitpid.js";

async function main(): Promise<void> {
  const [rawPid, ...commandParts] = process.argv.slice(2);
  const pid = Number(rawPid);
  const command = commandParts.join(" ").trim();

  if (!Number.isInteger(pid) || pid <= 0 || command === "") {
    console.error("Usage: jobq-waitpid <pid> <command...>");
    process.exitCode = 1;
    return;
  }

  const config = { ...DEFAULT_CONFIG, ...configFromEnv() };
  mkdirSync(config.dataDir, { recursive: true });

  const logFile = waitPidLogPath(config.dataDir);
  const log = new AuditLogFile(logFile, (line) => console.error(line));
  console.error(`[jobq-waitpid] Watcher PID ${process.pid}, logging to ${logFile}`);

  process.exitCode = await waitThenRun(
    { pid, command },
    new ShellProcessSupervisor(config.shell),
    log,
    logFile
  );
}

runMain(main);
