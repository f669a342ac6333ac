/**
 * JSON file persistence for the job list.
 *
 * - queue.json holds `{ version: 1, jobs: [...] }` in insertion order
 * - Writes are atomic (temp file + rename), so readers never see a torn file
 * - Mutations run under a FileLock shared with every other process
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as z from "zod/v4";

import type { Job } from "../../core/model.js";
import type { JobStore, Mutation } from "../../core/ports/JobStore.js";
import { StoreCorruptionError } from "../../core/errors.js";
import type { FileLock } from "../lock/FileLock.js";

const JobSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  command: z.string().min(1),
  cwd: z.string().nullable(),
  status: z.enum(["pending", "running", "completed", "failed", "stopped"]),
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  exitCode: z.number().int().nullable(),
  pid: z.number().int().nullable(),
  workerPid: z.number().int().nullable(),
  workerStartedAt: z.string().nullable().default(null),
  stopRequestedAt: z.string().nullable(),
  logFile: z.string(),
});

const QueueDocumentSchema = z.object({
  version: z.literal(1),
  jobs: z.array(JobSchema),
});

type QueueDocument = z.infer<typeof QueueDocumentSchema>;

let tmpCounter = 0;

export class JsonJobStore implements JobStore {
  constructor(
    private readonly queueFile: string,
    private readonly lock: FileLock
  ) {
    mkdirSync(dirname(queueFile), { recursive: true });
  }

  read(): Job[] {
    if (!existsSync(this.queueFile)) {
      return [];
    }

    const raw = readFileSync(this.queueFile, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new StoreCorruptionError(this.queueFile, message);
    }

    const parsed = QueueDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreCorruptionError(this.queueFile, z.prettifyError(parsed.error));
    }
    return parsed.data.jobs;
  }

  async transact<T>(fn: (jobs: Job[]) => Mutation<T>): Promise<T> {
    return this.lock.withLock(() => {
      const { value, jobs } = fn(this.read());
      if (jobs) {
        this.write(jobs);
      }
      return value;
    });
  }

  /**
   * Atomic full-file replace. Callers must hold the lock.
   */
  private write(jobs: Job[]): void {
    const doc: QueueDocument = { version: 1, jobs };
    const tmpFile = `${this.queueFile}.${process.pid}.${tmpCounter++}.tmp`;
    writeFileSync(tmpFile, JSON.stringify(doc, null, 2) + "\n");
    renameSync(tmpFile, this.queueFile); // Atomic on POSIX
  }
}
