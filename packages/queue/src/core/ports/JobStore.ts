import type { Job } from "../model.js";

/**
 * Outcome of a critical section: the value handed back to the caller,
 * and the new job list when the section changed it.
 */
export interface Mutation<T> {
  value: T;
  jobs?: Job[];
}

export interface JobStore {
  /** Snapshot of all jobs in insertion order. Safe without the lock. */
  read(): Job[];

  /**
   * Run `fn` as one locked read-modify-write.
   * `fn` receives a private copy; the store is written only if it returns `jobs`.
   */
  transact<T>(fn: (jobs: Job[]) => Mutation<T>): Promise<T>;
}
