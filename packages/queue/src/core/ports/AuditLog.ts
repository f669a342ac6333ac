export interface AuditLog {
  append(message: string): void;
  tail(lines: number): string[];
}
