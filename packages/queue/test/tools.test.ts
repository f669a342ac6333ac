import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { createQueue, type QueueServices } from "../src/createQueue.js";
import { registerAllTools } from "../src/tools/index.js";
import { makeTempDir, removeTempDir, waitUntil } from "./helpers.js";

interface ToolText {
  text: string;
  isError: boolean;
}

describe("MCP tools", () => {
  let dir: string;
  let services: QueueServices;
  let client: Client;
  let server: McpServer;

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolText> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content
      .map((item) => (item.type === "text" ? item.text : ""))
      .join("\n");
    return { text, isError: result.isError === true };
  }

  beforeEach(async () => {
    dir = makeTempDir();
    services = createQueue({ dataDir: dir, pollIntervalMs: 50, killGraceMs: 500 });

    server = new McpServer({ name: "jobq:test", version: "0.0.0" });
    registerAllTools(server, { queue: services.queue });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    removeTempDir(dir);
  });

  it("lists every queue tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "job_add",
      "job_clear",
      "job_logs",
      "job_output",
      "job_remove",
      "job_status",
      "job_stop",
    ]);
  });

  it("adds a job and reports it", async () => {
    const added = await call("job_add", { command: "npm run build" });
    expect(added.isError).toBe(false);

    const [job] = services.queue.status();
    expect(added.text).toBe(`Added job ${job.id}: npm:build`);

    const status = await call("job_status", { id: job.id });
    expect(status.text).toContain(`## Job: ${job.id}`);
    expect(status.text).toContain("**Status:** ⏳ Pending");
  });

  it("rejects an empty command", async () => {
    const result = await call("job_add", { command: "   " });
    expect(result).toEqual({ text: "Error: Command cannot be empty", isError: true });
  });

  it("lists the queue with a summary", async () => {
    await call("job_add", { command: "make" });
    const { text } = await call("job_status");
    const [job] = services.queue.status();

    expect(text.split("\n")).toEqual([
      "1 job(s): 1 pending, 0 running, 0 completed, 0 failed, 0 stopped",
      "",
      `${job.id}  pending    make`,
    ]);
  });

  it("explains why a job cannot be removed or stopped", async () => {
    expect(await call("job_remove", { id: "missing" })).toEqual({
      text: "Error: Job not found: missing",
      isError: true,
    });

    await call("job_add", { command: "sleep 1" });
    const [job] = services.queue.status();
    expect(await call("job_stop", { id: job.id })).toEqual({
      text: `Error: Job ${job.id} is pending; only running jobs can be stopped`,
      isError: true,
    });

    expect(await call("job_remove", { id: job.id })).toEqual({
      text: `Removed job ${job.id}`,
      isError: false,
    });
  });

  it("stops a job the worker is running", async () => {
    const worker = services.createWorker();
    const running = worker.start();

    await call("job_add", { command: "sleep 30" });
    const [job] = services.queue.status();
    await waitUntil(() => (services.queue.get(job.id)?.pid ?? null) !== null);

    expect(await call("job_stop", { id: job.id })).toEqual({
      text: `Stopped job ${job.id}`,
      isError: false,
    });
    expect(services.queue.get(job.id)?.status).toBe("stopped");

    await worker.stop();
    await running;
  });

  it("clears finished jobs and tails the log", async () => {
    const cleared = await call("job_clear");
    expect(cleared.text).toBe("Cleared 0 finished job(s)");

    const logs = await call("job_logs", { lines: 1 });
    expect(logs.text).toMatch(/^\[[\d-]+ [\d:]+\] Cleared 0 finished job\(s\)$/);
  });

  it("reports output for known jobs only", async () => {
    expect((await call("job_output", { id: "missing" })).isError).toBe(true);

    await call("job_add", { command: "echo hi" });
    const [job] = services.queue.status();
    expect((await call("job_output", { id: job.id })).text).toBe("### Output\n\n(no output)");
  });
});
