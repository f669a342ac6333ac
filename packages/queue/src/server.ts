#!/usr/bin/env node
/**
 * MCP server for the job queue.
 *
 * Exposes queue management as tools. Jobs are executed by a separate
 * `jobq worker` process sharing the same data directory.
 */

import { runServer } from "@jobq/core";
import { configFromEnv } from "./config.js";
import { createQueue } from "./createQueue.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "jobq:queue",
    version: "0.1.0",
  },
  createServices: () => {
    const { queue } = createQueue(configFromEnv());
    return { queue };
  },
  registerTools: registerAllTools,
  onStartup: (services) => {
    const { running, pending } = services.queue.stats();
    console.error(`[jobq] Ready. ${pending} pending, ${running} running`);
  },
  onShutdown: () => {
    console.error("[jobq] Shutting down...");
  },
});
