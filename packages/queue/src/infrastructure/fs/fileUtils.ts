/**
 * File utilities for audit and per-job logs.
 */
import { closeSync, existsSync, openSync, readFileSync, readSync, statSync } from "node:fs";

import { cleanOutput } from "./cleanOutput.js";

/**
 * Read the last N lines of a file. Missing file = no lines.
 */
export function tailLines(filePath: string, lines: number): string[] {
  if (lines <= 0 || !existsSync(filePath)) return [];

  const allLines = readFileSync(filePath, "utf-8").split("\n");
  // Remove trailing empty string if file ends with newline
  if (allLines.length > 0 && allLines[allLines.length - 1] === "") {
    allLines.pop();
  }
  return allLines.slice(-lines);
}

/**
 * Read the last N bytes of a file, starting at a line boundary when the
 * window holds one, otherwise at a character boundary.
 */
export function tailBytes(filePath: string, bytes: number): string {
  const size = statSync(filePath).size;
  if (size <= bytes) {
    return readFileSync(filePath, "utf-8");
  }

  const fd = openSync(filePath, "r");
  try {
    const buffer = Buffer.alloc(bytes);
    readSync(fd, buffer, 0, bytes, size - bytes);
    return buffer.subarray(firstWholeLine(buffer)).toString("utf-8");
  } finally {
    closeSync(fd);
  }
}

function firstWholeLine(buffer: Buffer): number {
  const newline = buffer.indexOf(0x0a);
  if (newline !== -1 && newline < buffer.length - 1) return newline + 1;

  // Skip UTF-8 continuation bytes (10xxxxxx)
  let start = 0;
  while (start < buffer.length && (buffer[start] & 0xc0) === 0x80) start++;
  return start;
}

export interface ReadOutputOptions {
  /** Only the last N lines */
  tail?: number;

  /** Cap on bytes read from the end of the file. Default: 1MB */
  maxBytes?: number;
}

/**
 * Read captured job output, cleaned for display.
 * Returns null if the log file does not exist.
 */
export function readOutput(filePath: string, options: ReadOutputOptions = {}): string | null {
  if (!existsSync(filePath)) return null;

  const { tail, maxBytes = 1024 * 1024 } = options;

  if (tail !== undefined) {
    return cleanOutput(tailLines(filePath, tail).join("\n"));
  }

  if (statSync(filePath).size > maxBytes) {
    return "[Output truncated. Use tail for more.]\n\n" + cleanOutput(tailBytes(filePath, maxBytes));
  }
  return cleanOutput(readFileSync(filePath, "utf-8"));
}
