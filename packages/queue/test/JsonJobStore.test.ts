import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { JsonJobStore } from "../src/infrastructure/json/JsonJobStore.js";
import { FileLock } from "../src/infrastructure/lock/FileLock.js";
import { StoreCorruptionError } from "../src/core/errors.js";
import { makeJob, makeTempDir, removeTempDir } from "./helpers.js";

describe("JsonJobStore", () => {
  let dir: string;
  let queueFile: string;
  let lockFile: string;

  const openStore = (): JsonJobStore =>
    new JsonJobStore(queueFile, new FileLock(lockFile, { retryMs: 5 }));

  beforeEach(() => {
    dir = makeTempDir();
    queueFile = join(dir, "queue.json");
    lockFile = join(dir, "queue.lock");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("reads an absent file as an empty queue", () => {
    expect(openStore().read()).toEqual([]);
  });

  it("persists a versioned document", async () => {
    const store = openStore();
    const job = makeJob({ id: "aaaaaaaaaaaa" });

    const value = await store.transact((jobs) => ({ value: jobs.length, jobs: [...jobs, job] }));

    expect(value).toBe(0);
    expect(JSON.parse(readFileSync(queueFile, "utf-8"))).toEqual({ version: 1, jobs: [job] });
    expect(openStore().read()).toEqual([job]);
  });

  it("leaves only the queue file behind", async () => {
    await openStore().transact((jobs) => ({ value: undefined, jobs: [...jobs, makeJob()] }));
    expect(readdirSync(dir)).toEqual(["queue.json"]);
  });

  it("does not write when the mutation returns no jobs", async () => {
    await openStore().transact(() => ({ value: null }));
    expect(existsSync(queueFile)).toBe(false);
  });

  it("refuses a file that is not JSON", async () => {
    writeFileSync(queueFile, "{not json");
    const store = openStore();

    expect(() => store.read()).toThrow(StoreCorruptionError);
    await expect(store.transact(() => ({ value: 1 }))).rejects.toBeInstanceOf(StoreCorruptionError);
    expect(existsSync(lockFile)).toBe(false);
    expect(readFileSync(queueFile, "utf-8")).toBe("{not json");
  });

  it("refuses a document with the wrong shape", () => {
    writeFileSync(queueFile, JSON.stringify({ version: 2, jobs: [] }));
    expect(() => openStore().read()).toThrow(StoreCorruptionError);

    writeFileSync(queueFile, JSON.stringify({ version: 1, jobs: [{ id: "x" }] }));
    expect(() => openStore().read()).toThrow(/Queue file is corrupt/);
  });

  it("loses no update under concurrent writers", async () => {
    const stores = [openStore(), openStore(), openStore()];

    await Promise.all(
      stores.flatMap((store, s) =>
        Array.from({ length: 10 }, (_, i) =>
          store.transact((jobs) => ({
            value: undefined,
            jobs: [...jobs, makeJob({ id: `s${s}-${i}` })],
          }))
        )
      )
    );

    const ids = openStore().read().map((job) => job.id);
    expect(ids).toHaveLength(30);
    expect(new Set(ids).size).toBe(30);
  });
});
