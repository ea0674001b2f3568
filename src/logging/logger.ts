/**
 * Reconciler Logging
 *
 * Structured logging with levels, pluggable transports, child loggers per
 * subsystem, contextual fields (run, resource) and redaction of secrets.
 */

import type { ReconcilerConfig } from "../config.js";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  resource?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export type LogContext = {
  runId?: string;
  resource?: string;
};

export interface ReconcilerLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): ReconcilerLogger;
  withContext(context: LogContext): ReconcilerLogger;
  /** A logger that also scrubs these literal values from messages and metadata. */
  withRedactions(values: readonly string[]): ReconcilerLogger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
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
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
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

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.resource) contextParts.push(`resource=${entry.resource}`);
    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes to stderr so stdout stays free for machine-readable reports.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    console.error(this.formatter(entry));
  }
}

/** Keeps entries in memory. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

const REDACTED = "[REDACTED]";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class ReconcilerLoggerImpl implements ReconcilerLogger {
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
    redactPatterns?: RegExp[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = options.redactPatterns ?? [];
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

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): ReconcilerLogger {
    return this.derive({ subsystem: `${this.subsystem}/${name}` });
  }

  withContext(context: LogContext): ReconcilerLogger {
    return this.derive({ context: { ...this.context, ...context } });
  }

  withRedactions(values: readonly string[]): ReconcilerLogger {
    const extra = values
      .filter((v) => v.length > 0)
      // longest first so a value containing another is scrubbed whole
      .sort((a, b) => b.length - a.length)
      .map((v) => new RegExp(escapeRegExp(v), "g"));
    return this.derive({ redactPatterns: [...this.redactPatterns, ...extra] });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(overrides: { subsystem?: string; context?: LogContext; redactPatterns?: RegExp[] }): ReconcilerLogger {
    return new ReconcilerLoggerImpl({
      subsystem: overrides.subsystem ?? this.subsystem,
      level: this.level,
      transports: this.transports,
      context: overrides.context ?? this.context,
      redactPatterns: overrides.redactPatterns ?? this.redactPatterns,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      runId: this.context.runId,
      resource: this.context.resource,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        console.error(`log transport "${transport.name}" failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, REDACTED);
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createReconcilerLogger(
  subsystem: string,
  config?: Partial<ReconcilerConfig["logging"]>,
  transports?: LogTransport[],
): ReconcilerLogger {
  const level = config?.level ?? "info";
  return new ReconcilerLoggerImpl({
    subsystem: `infragraph/${subsystem}`,
    level,
    transports: transports ?? [
      new ConsoleTransport({
        formatter: createDefaultFormatter({ colors: config?.colors, timestamps: config?.timestamps }),
      }),
    ],
  });
}

/** A logger that drops everything. */
export function createSilentLogger(): ReconcilerLogger {
  return new ReconcilerLoggerImpl({ subsystem: "silent", level: "fatal", transports: [] });
}
