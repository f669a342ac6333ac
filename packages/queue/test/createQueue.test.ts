import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { join } from "node:path";

import { createQueue, resolvePaths } from "../src/createQueue.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

describe("createQueue", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("lays out the data directory", () => {
    expect(resolvePaths("/data")).toEqual({
      queueFile: "/data/queue.json",
      lockFile: "/data/queue.lock",
      auditLog: "/data/jobq.log",
      logsDir: "/data/logs",
      workerLock: "/data/worker.lock",
    });
  });

  it("fills in defaults and creates the directories", () => {
    const { config } = createQueue({ dataDir: dir, pollIntervalMs: 10 });

    expect(config.pollIntervalMs).toBe(10);
    expect(config.stopTimeoutMs).toBe(15_000);
    expect(config.shell).toBe("/bin/sh");
    expect(existsSync(join(dir, "logs"))).toBe(true);
  });

  it("keeps every add from concurrent queue instances", async () => {
    const instances = [createQueue({ dataDir: dir }), createQueue({ dataDir: dir })];

    const results = await Promise.all(
      instances.flatMap(({ queue }, q) =>
        Array.from({ length: 15 }, (_, i) => queue.add(`echo ${q}-${i}`))
      )
    );

    expect(results.every((result) => result.ok)).toBe(true);
    const jobs = createQueue({ dataDir: dir }).queue.status();
    expect(jobs).toHaveLength(30);
    expect(new Set(jobs.map((job) => job.id)).size).toBe(30);
    expect(existsSync(join(dir, "queue.lock"))).toBe(false);
  });
});
