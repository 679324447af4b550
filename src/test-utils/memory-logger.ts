import { AuditLogger, type LogEntry, type LogLevel, type LogTransport } from "../logging/logger.js";

export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

export function createMemoryLogger(level: LogLevel = "trace") {
  const transport = new MemoryTransport();
  const logger = new AuditLogger({ subsystem: "test", level, transports: [transport] });
  return { logger, transport };
}
