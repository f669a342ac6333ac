#!/usr/bin/env node
/**
 * jobq - command-line interface to the job queue.
 */

import { runMain } from "@jobq/core";
import { runCli } from "./commands.js";
import { configFromEnv } from "./config.js";
import { createQueue } from "./createQueue.js";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const services = createQueue(configFromEnv(), {
    // The worker echoes its audit trail to the terminal
    onAudit: argv[0] === "worker" ? (line) => console.error(line) : undefined,
  });

  process.exitCode = await runCli(argv, services);
}

runMain(main);
