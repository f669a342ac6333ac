/**
 * What to run. The shell is a property of the supervisor, not of the job.
 */
export interface CommandSpec {
  command: string;
  cwd: string | null;
}

export type ExitOutcome =
  | { kind: "exited"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "spawn_error"; message: string };

export interface SupervisedProcess {
  readonly pid: number | null;

  /** Settles once: on exit, or on a spawn error. Never rejects. */
  readonly exited: Promise<ExitOutcome>;

  /**
   * SIGTERM the process group, SIGKILL after `graceMs`.
   * Resolves false if the process had already exited.
   */
  terminate(graceMs: number): Promise<boolean>;
}

export interface ProcessSupervisor {
  /** Start `spec`, appending combined stdout/stderr to `logFile`. */
  spawn(spec: CommandSpec, logFile: string): SupervisedProcess;

  /** Terminate a process group we hold no handle for. */
  terminatePid(pid: number, graceMs: number): Promise<boolean>;

  /**
   * Whether `pid` exists. With `startedAt`, also require the process to have
   * started around that time, so a reused PID is not mistaken for ours.
   */
  isAlive(pid: number, startedAt?: string): boolean;
}
