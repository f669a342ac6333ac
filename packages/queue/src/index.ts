/**
 * @jobq/queue - a single-machine sequential job queue.
 */

// Domain
export type {
  Job,
  JobStatus,
  TerminalStatus,
  AddOptions,
  JobOutcome,
  QueueStats,
  QueueConfig,
  QueuePaths,
} from "./core/model.js";
export {
  JOB_STATUSES,
  ALLOWED_TRANSITIONS,
  DEFAULT_CONFIG,
  STOPPED_EXIT_CODE,
  SPAWN_FAILED_EXIT_CODE,
  ORPHANED_EXIT_CODE,
  canTransition,
  isTerminal,
} from "./core/model.js";
export { StoreCorruptionError, LockTimeoutError, InvalidTransitionError } from "./core/errors.js";
export { deriveName } from "./core/naming.js";

// Ports
export type {
  JobStore,
  Mutation,
  AuditLog,
  JobLogStore,
  JobLogReadOptions,
  Lease,
  ProcessSupervisor,
  SupervisedProcess,
  CommandSpec,
  ExitOutcome,
} from "./core/ports/index.js";

// Services
export { JobQueue, type JobQueueOptions } from "./core/services/JobQueue.js";
export { Worker, outcomeOf, type WorkerOptions } from "./core/services/Worker.js";

// Infrastructure
export { JsonJobStore } from "./infrastructure/json/JsonJobStore.js";
export { InMemoryJobStore } from "./infrastructure/memory/InMemoryJobStore.js";
export { FileLock, type FileLockOptions } from "./infrastructure/lock/FileLock.js";
export { AuditLogFile } from "./infrastructure/fs/AuditLogFile.js";
export { JobLogFiles } from "./infrastructure/fs/JobLogFiles.js";
export { cleanOutput } from "./infrastructure/fs/cleanOutput.js";
export { ShellProcessSupervisor } from "./infrastructure/runner/ShellProcessSupervisor.js";

// Wiring
export { configFromEnv } from "./config.js";
export { createQueue, resolvePaths, type QueueServices } from "./createQueue.js";
export { waitThenRun, waitPidLogPath, type WaitPidOptions } from "./waitpid.js";
