/**
 * Audit Logging
 *
 * Structured, levelled logging for diagnostics. Everything goes to stderr
 * (and optionally a file) so the report on stdout stays machine-readable.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { finished } from "node:stream/promises";

import { SetupError, describeError, toError } from "../errors.js";

// =============================================================================
// Logger Types
// =============================================================================

/**
 * `warn` is the most severe level: diagnostics the audit emits at `warn`
 * cannot be filtered out by the level setting.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  namespace?: string;
  pod?: string;
  error?: {
    name: string;
    message: string;
  };
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  /** Acquire resources up front so failures surface before the run. */
  open?(): Promise<void>;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  open(): Promise<void>;
  close(): Promise<void>;
}

export type LogContext = {
  namespace?: string;
  pod?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.namespace) contextParts.push(`namespace=${entry.namespace}`);
    if (entry.pod) contextParts.push(`pod=${entry.pod}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/** Minimal writable surface; `process.stderr` satisfies it. */
export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Writes every entry to stderr, whatever its level.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private sink: LineSink;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel; sink?: LineSink }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
    this.sink = options?.sink ?? process.stderr;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    this.sink.write(`${this.formatter(entry)}\n`);
  }
}

/**
 * Appends entries to a file. The stream opens lazily on the first write.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private filePath: string;
  private stream: WriteStream | null = null;
  /** First stream error; later writes are dropped and `close()` rejects. */
  private failure: Error | null = null;

  constructor(options: { filePath: string; formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ?? createDefaultFormatter({ colors: false, timestamps: true, includeMetadata: true });
    this.minLevel = options.minLevel ?? "trace";
  }

  /** Open the file now instead of on the first write. */
  async open(): Promise<void> {
    if (this.stream) return;
    let handle: FileHandle;
    try {
      handle = await open(this.filePath, "a");
    } catch (err) {
      throw new SetupError(`unable to open log file ${this.filePath}: ${describeError(err)}`, { cause: err });
    }
    this.stream = this.watch(handle.createWriteStream());
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel) || this.failure) return;
    if (!this.stream) {
      this.stream = this.watch(createWriteStream(this.filePath, { flags: "a" }));
    }
    this.stream.write(`${this.formatter(entry)}\n`);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (stream) {
      stream.end();
      try {
        await finished(stream);
      } catch (err) {
        this.failure ??= toError(err);
      }
    }
    if (this.failure) {
      throw new SetupError(`unable to write log file ${this.filePath}: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
  }

  private watch(stream: WriteStream): WriteStream {
    stream.on("error", (err) => {
      this.failure ??= err;
    });
    return stream;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class AuditLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "warn";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }


  child(name: string): Logger {
    return new AuditLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): Logger {
    return new AuditLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  async open(): Promise<void> {
    for (const transport of this.transports) {
      await transport.open?.();
    }
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const { err, rest } = splitError(meta);
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: rest ? this.redactObject(rest) : undefined,
      namespace: this.context.namespace && this.redact(this.context.namespace),
      pod: this.context.pod && this.redact(this.context.pod),
      error: err ? { name: err.name, message: this.redact(err.message) } : undefined,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pull an `err` field out of metadata into the entry's error slot. */
function splitError(meta?: Record<string, unknown>): { err?: Error; rest?: Record<string, unknown> } {
  if (!meta) return {};
  const { err, ...rest } = meta;
  if (err instanceof Error) {
    return { err, rest: Object.keys(rest).length > 0 ? rest : undefined };
  }
  return { rest: meta };
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggingOptions = {
  level: LogLevel;
  file?: string;
  colors?: boolean;
  redactPatterns?: string[];
  sink?: LineSink;
};

export function createLogger(subsystem: string, options: LoggingOptions): Logger {
  const transports: LogTransport[] = [
    new ConsoleTransport({
      sink: options.sink,
      formatter: createDefaultFormatter({ colors: options.colors, timestamps: false }),
    }),
  ];
  if (options.file) {
    transports.push(new FileTransport({ filePath: options.file }));
  }

  return new AuditLogger({
    subsystem,
    level: options.level,
    transports,
    redactPatterns: options.redactPatterns,
  });
}

/** A logger that drops everything; handy default for library callers. */
export function createSilentLogger(subsystem = "sock-audit"): Logger {
  return new AuditLogger({ subsystem, level: "warn", transports: [] });
}
