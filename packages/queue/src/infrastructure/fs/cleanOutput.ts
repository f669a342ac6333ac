/**
 * Output cleaning for captured job logs.
 * Strips ANSI codes, resolves carriage-return redraws, drops spinner noise.
 */

import stripAnsi from "strip-ansi";

/**
 * Lines that carry no information once the terminal is gone.
 */
const NOISE_PATTERNS = [
  // Progress bars - [====>    ] 50%
  /^\s*\[[\s#=\->░▓█]+\]\s*\d*%?\s*$/,

  // Spinner frames
  /^[\s⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏◐◓◑◒|\\/-]+$/,

  // Bare counters - 12/40
  /^\s*[[(]?\d+\/\d+[\])]?\s*$/,
];

const MAX_CONSECUTIVE_EMPTY = 1;

/**
 * A line redrawn with \r shows only its last frame on a terminal.
 */
function lastFrame(line: string): string {
  const frames = line.split("\r").filter((frame) => frame.trim() !== "");
  return frames.length > 0 ? frames[frames.length - 1] : "";
}

function cleanLine(line: string): string | null {
  const cleaned = lastFrame(stripAnsi(line)).trimEnd();
  if (cleaned.trim() === "") return "";

  for (const pattern of NOISE_PATTERNS) {
    if (pattern.test(cleaned)) return null;
  }
  return cleaned;
}

/**
 * Clean raw output for display.
 */
export function cleanOutput(output: string): string {
  const cleaned: string[] = [];
  let consecutiveEmpty = 0;

  for (const line of output.split("\n")) {
    const cleanedLine = cleanLine(line);
    if (cleanedLine === null) continue;

    if (cleanedLine === "") {
      consecutiveEmpty++;
      if (consecutiveEmpty <= MAX_CONSECUTIVE_EMPTY) {
        cleaned.push("");
      }
    } else {
      consecutiveEmpty = 0;
      cleaned.push(cleanedLine);
    }
  }

  while (cleaned.length > 0 && cleaned[0] === "") cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === "") cleaned.pop();

  return cleaned.join("\n");
}
