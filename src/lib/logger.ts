export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, line: string) => void;

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(input: string | undefined): LogLevel {
  const normalized = (input ?? "info").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

function sanitize(value: unknown): unknown {
  if (value instanceof Error) {
    const output: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    if (value.cause !== undefined) {
      output.cause = sanitize(value.cause);
    }
    return output;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item));
  }
  if (value && typeof value === "object") {
    const output: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      output[key] = sanitize(nested);
    }
    return output;
  }
  return value;
}

interface LogRecord {
  ts: string;
  level: LogLevel;
  scope: string;
  message: string;
  metadata?: unknown;
}

function formatLine(level: LogLevel, scope: string, message: string, metadata?: Record<string, unknown>): string {
  const record: LogRecord = { ts: new Date().toISOString(), level, scope, message };
  if (metadata) {
    record.metadata = sanitize(metadata);
  }
  return JSON.stringify(record);
}

/* eslint-disable no-console */
const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};
/* eslint-enable no-console */

const consoleSink: LogSink = (level, line) => consoleWriters[level](line);

export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly scope: string,
    configuredLevel: string | undefined,
    private readonly sink: LogSink = consoleSink
  ) {
    this.minLevel = parseLogLevel(configuredLevel);
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}.${scope}`, this.minLevel, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeight[level] >= levelWeight[this.minLevel];
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.sink(level, formatLine(level, this.scope, message, metadata));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.emit("error", message, metadata);
  }
}

export interface CapturedLogLine {
  level: LogLevel;
  scope: string;
  message: string;
  metadata?: Record<string, unknown>;
}

/**
 * In-memory logger for tests and diagnostics. Lines are parsed back so callers
 * can assert on event names and metadata.
 */
export function createCapturingLogger(scope = "test", level: LogLevel = "debug"): {
  logger: Logger;
  lines: CapturedLogLine[];
} {
  const lines: CapturedLogLine[] = [];
  const logger = new Logger(scope, level, (lineLevel, line) => {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === "object" && "message" in parsed && "scope" in parsed) {
      const metadata = "metadata" in parsed && parsed.metadata && typeof parsed.metadata === "object"
        ? Object.fromEntries(Object.entries(parsed.metadata))
        : undefined;
      lines.push({
        level: lineLevel,
        scope: String(parsed.scope),
        message: String(parsed.message),
        ...(metadata ? { metadata } : {})
      });
    }
  });
  return { logger, lines };
}
