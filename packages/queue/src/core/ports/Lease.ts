/**
 * Exclusive ownership held for a process's lifetime (the worker lease).
 */
export interface Lease {
  /** Null when acquired, otherwise the holder's PID (-1 if unknown). */
  tryAcquire(): number | null;
  release(): void;
}
