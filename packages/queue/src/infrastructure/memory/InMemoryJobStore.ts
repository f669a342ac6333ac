import type { Job } from "../../core/model.js";
import type { JobStore, Mutation } from "../../core/ports/JobStore.js";

/**
 * Single-process store for tests. Critical sections are chained on a promise.
 */
export class InMemoryJobStore implements JobStore {
  private jobs: Job[] = [];
  private tail: Promise<unknown> = Promise.resolve();

  read(): Job[] {
    return this.jobs.map((job) => ({ ...job }));
  }

  transact<T>(fn: (jobs: Job[]) => Mutation<T>): Promise<T> {
    const run = this.tail.then(() => {
      const { value, jobs } = fn(this.read());
      if (jobs) {
        this.jobs = jobs.map((job) => ({ ...job }));
      }
      return value;
    });
    this.tail = run.catch(() => undefined);
    return run;
  }
}
