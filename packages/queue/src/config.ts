/**
 * Configuration from the environment, for the entry points.
 */

import type { QueueConfig } from "./core/model.js";

type Env = Record<string, string | undefined>;

/**
 * Read overrides from the environment. Unset variables fall back to defaults.
 *
 * - JOBQ_DATA_DIR
 * - JOBQ_POLL_INTERVAL_MS
 * - JOBQ_STOP_TIMEOUT_MS
 * - JOBQ_KILL_GRACE_MS
 * - JOBQ_SHELL
 */
export function configFromEnv(env: Env = process.env): QueueConfig {
  const config: QueueConfig = {};

  if (env.JOBQ_DATA_DIR) config.dataDir = env.JOBQ_DATA_DIR;
  if (env.JOBQ_SHELL) config.shell = env.JOBQ_SHELL;

  const pollIntervalMs = positiveInt(env, "JOBQ_POLL_INTERVAL_MS");
  if (pollIntervalMs !== undefined) config.pollIntervalMs = pollIntervalMs;

  const stopTimeoutMs = positiveInt(env, "JOBQ_STOP_TIMEOUT_MS");
  if (stopTimeoutMs !== undefined) config.stopTimeoutMs = stopTimeoutMs;

  const killGraceMs = positiveInt(env, "JOBQ_KILL_GRACE_MS");
  if (killGraceMs !== undefined) config.killGraceMs = killGraceMs;

  return config;
}

function positiveInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}
