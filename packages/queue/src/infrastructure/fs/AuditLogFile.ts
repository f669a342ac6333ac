/**
 * Append-only audit log: one `[YYYY-MM-DD HH:MM:SS] message` line per event.
 * Never rewritten, so appends need no lock.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import type { AuditLog } from "../../core/ports/AuditLog.js";
import { tailLines } from "./fileUtils.js";

export class AuditLogFile implements AuditLog {
  constructor(
    private readonly file: string,
    private readonly echo?: (line: string) => void
  ) {
    mkdirSync(dirname(file), { recursive: true });
  }

  append(message: string): void {
    const line = `[${formatLogTimestamp(new Date())}] ${message}`;
    appendFileSync(this.file, line + "\n");
    this.echo?.(line);
  }

  tail(lines: number): string[] {
    return tailLines(this.file, lines);
  }
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatLogTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
