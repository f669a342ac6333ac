/**
 * CLI command definitions, separate from the entry point so they can run in-process.
 */

import { resolve } from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";

import { onShutdownSignal } from "@jobq/core";
import type { QueueServices } from "./createQueue.js";
import { formatJob, formatJobList } from "./tools/format.js";
import { notFound, removeFailure, stopFailure } from "./tools/messages.js";

const ENVIRONMENT = `
Environment:
  JOBQ_DATA_DIR          Data directory (default: .jobq)
  JOBQ_POLL_INTERVAL_MS  Worker poll interval (default: 1000)
  JOBQ_STOP_TIMEOUT_MS   How long stop waits for the worker (default: 15000)
  JOBQ_KILL_GRACE_MS     SIGTERM-to-SIGKILL grace period (default: 5000)
  JOBQ_SHELL             Shell for commands (default: /bin/sh)`;

export interface CliContext {
  out: (line: string) => void;
  err: (line: string) => void;

  /** Install the worker's shutdown handler. Default: on SIGTERM/SIGINT */
  onShutdown: (handler: () => Promise<void>) => void;
}

const defaultContext: CliContext = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  onShutdown: onShutdownSignal,
};

interface AddFlags {
  name?: string;
  cwd?: string;
}

interface LinesFlag {
  lines?: number;
}

/**
 * Run one CLI command. Returns the process exit code.
 * Help exits 0; usage errors are reported through `err` and exit 1.
 */
export async function runCli(
  argv: string[],
  services: QueueServices,
  context: Partial<CliContext> = {}
): Promise<number> {
  const ctx: CliContext = { ...defaultContext, ...context };
  let exitCode = 0;
  const program = buildProgram(services, ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return exitCode;
}

function buildProgram(
  services: QueueServices,
  ctx: CliContext,
  setExitCode: (code: number) => void
): Command {
  const { queue } = services;
  const program = new Command();

  // Subcommands copy these settings when they are created
  program
    .name("jobq")
    .description("Queue shell commands and run them one at a time")
    .exitOverride()
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (text) => ctx.out(text.replace(/\n$/, "")),
      writeErr: (text) => ctx.err(text.replace(/\n$/, "")),
    })
    .addHelpText("after", ENVIRONMENT);

  program
    .command("add")
    .description("Queue a shell command")
    .argument("[command...]", "command line to run")
    .option("--name <name>", "display name (default: derived from the command)")
    .option("--cwd <dir>", "working directory (default: the worker's)")
    .passThroughOptions()
    .action(async (words: string[], flags: AddFlags) => {
      const result = await queue.add(words.join(" "), {
        name: flags.name,
        cwd: flags.cwd === undefined ? undefined : resolve(flags.cwd),
      });
      if (!result.ok) {
        ctx.err(result.error);
        setExitCode(1);
        return;
      }
      ctx.out(result.value.id);
    });

  program
    .command("status")
    .description("Show one job or list all")
    .argument("[id]", "job ID")
    .action((id: string | undefined) => {
      if (id === undefined) {
        ctx.out(formatJobList(queue.status()));
        return;
      }
      const job = queue.get(id);
      if (!job) {
        ctx.err(notFound(id));
        setExitCode(1);
        return;
      }
      ctx.out(formatJob(job));
    });

  program
    .command("remove")
    .description("Remove a pending job")
    .argument("<id>", "job ID")
    .action(async (id: string) => {
      if (await queue.remove(id)) {
        ctx.out(`Removed job ${id}`);
        return;
      }
      ctx.err(removeFailure(queue, id));
      setExitCode(1);
    });

  program
    .command("stop")
    .description("Stop a running job")
    .argument("<id>", "job ID")
    .action(async (id: string) => {
      if (await queue.stop(id)) {
        ctx.out(`Stopped job ${id}`);
        return;
      }
      ctx.err(stopFailure(queue, id));
      setExitCode(1);
    });

  program
    .command("clear")
    .description("Remove finished jobs")
    .action(async () => {
      const cleared = await queue.clear();
      ctx.out(`Cleared ${cleared} finished job(s)`);
    });

  program
    .command("logs")
    .description("Show the queue log")
    .option("-n, --lines <count>", "number of lines", lineCount, 20)
    .action((flags: LinesFlag) => {
      for (const line of queue.logs(flags.lines)) ctx.out(line);
    });

  program
    .command("output")
    .description("Show a job's output")
    .argument("<id>", "job ID")
    .option("-n, --lines <count>", "only the last N lines", lineCount)
    .action((id: string, flags: LinesFlag) => {
      const output = queue.output(id, { tail: flags.lines });
      if (output === null) {
        ctx.err(notFound(id));
        setExitCode(1);
        return;
      }
      if (output !== "") ctx.out(output);
    });

  program
    .command("worker")
    .description("Run jobs until interrupted")
    .action(async () => {
      const worker = services.createWorker();
      ctx.onShutdown(() => worker.stop());
      ctx.err(`[jobq] Worker running (PID ${process.pid}). Data directory: ${services.config.dataDir}`);
      await worker.start();
    });

  return program;
}

function lineCount(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}
