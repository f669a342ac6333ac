/**
 * Wire the file-backed queue for a data directory.
 */

import { join } from "node:path";

import { DEFAULT_CONFIG, type QueueConfig, type QueuePaths } from "./core/model.js";
import { JobQueue } from "./core/services/JobQueue.js";
import { Worker } from "./core/services/Worker.js";
import { AuditLogFile } from "./infrastructure/fs/AuditLogFile.js";
import { JobLogFiles } from "./infrastructure/fs/JobLogFiles.js";
import { JsonJobStore } from "./infrastructure/json/JsonJobStore.js";
import { FileLock } from "./infrastructure/lock/FileLock.js";
import { ShellProcessSupervisor } from "./infrastructure/runner/ShellProcessSupervisor.js";

export interface QueueServices {
  config: Required<QueueConfig>;
  paths: QueuePaths;
  queue: JobQueue;

  /** A worker bound to this data directory. Call start() to run it. */
  createWorker(options?: { pid?: number }): Worker;
}

export function resolvePaths(dataDir: string): QueuePaths {
  return {
    queueFile: join(dataDir, "queue.json"),
    lockFile: join(dataDir, "queue.lock"),
    auditLog: join(dataDir, "jobq.log"),
    logsDir: join(dataDir, "logs"),
    workerLock: join(dataDir, "worker.lock"),
  };
}

export function createQueue(
  options: QueueConfig = {},
  hooks: { onAudit?: (line: string) => void } = {}
): QueueServices {
  const config: Required<QueueConfig> = { ...DEFAULT_CONFIG, ...options };
  const paths = resolvePaths(config.dataDir);

  const lock = new FileLock(paths.lockFile, {
    retryMs: config.lockRetryMs,
    timeoutMs: config.lockTimeoutMs,
    staleMs: config.staleLockMs,
  });
  const store = new JsonJobStore(paths.queueFile, lock);
  const audit = new AuditLogFile(paths.auditLog, hooks.onAudit);
  const logs = new JobLogFiles(paths.logsDir);
  const supervisor = new ShellProcessSupervisor(config.shell);

  const queue = new JobQueue(store, audit, logs, supervisor, {
    stopTimeoutMs: config.stopTimeoutMs,
    killGraceMs: config.killGraceMs,
  });

  return {
    config,
    paths,
    queue,
    createWorker: (workerOptions = {}) =>
      new Worker(queue, supervisor, logs, audit, new FileLock(paths.workerLock), {
        pollIntervalMs: config.pollIntervalMs,
        killGraceMs: config.killGraceMs,
        pid: workerOptions.pid,
      }),
  };
}
