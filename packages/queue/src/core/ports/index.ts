export type { JobStore, Mutation } from "./JobStore.js";
export type { AuditLog } from "./AuditLog.js";
export type { JobLogStore, JobLogReadOptions } from "./JobLogStore.js";
export type { Lease } from "./Lease.js";
export type {
  ProcessSupervisor,
  SupervisedProcess,
  CommandSpec,
  ExitOutcome,
} from "./ProcessSupervisor.js";
