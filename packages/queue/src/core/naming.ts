/**
 * Derive a short job name from its command.
 *
 *   "npm run build"          -> "npm:build"
 *   "python3 -m pytest -x"   -> "python:pytest"
 *   "./scripts/train.sh 3"   -> "train.sh:3"
 *   "make"                   -> "make"
 */
export function deriveName(command: string): string {
  const parts = command.trim().split(/\s+/);
  const cmd = basename(parts[0] ?? "");
  const arg = parts[1];

  if (["npm", "pnpm", "yarn"].includes(cmd) && arg === "run") {
    return `${cmd}:${parts[2] ?? "run"}`;
  }

  if (["python", "python3"].includes(cmd) && arg === "-m") {
    return `python:${parts[2] ?? "module"}`;
  }

  if (["node", "tsx", "python", "python3", "bash", "sh"].includes(cmd) && arg && !arg.startsWith("-")) {
    return `${cmd}:${basename(arg)}`;
  }

  if (arg) {
    return `${cmd}:${arg.replace(/^-+/, "").slice(0, 12)}`;
  }

  return cmd;
}

function basename(path: string): string {
  return path.replace(/^.*\//, "");
}
