/**
 * Structured JSON logging.
 *
 * Every entry carries the context of the logger that wrote it; pipeline runs
 * log through child loggers holding taskId, round and runId. Context keys
 * that name a credential are redacted before the entry reaches the handler.
 * Tests and embedders swap the sink with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

const CREDENTIAL_KEY = /secret|token|password|authorization|api[-_]?key/i;
export const REDACTED = '[REDACTED]';

/** One JSON object per line; warnings and errors go to stderr. */
const jsonLineHandler: LogHandler = ({ level, timestamp, message, context }) => {
  const line = JSON.stringify({ level, ts: timestamp, msg: message, ...context });
  if (SEVERITY[level] >= SEVERITY[LogLevel.Warn]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

let handler: LogHandler = jsonLineHandler;
let threshold: LogLevel = LogLevel.Info;

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Restore the JSON line handler. */
export function resetLogHandler(): void {
  handler = jsonLineHandler;
}

/** Entries below `level` are dropped. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Copy of `context` with credential-named keys blanked and errors flattened. */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    if (CREDENTIAL_KEY.test(key)) {
      out[key] = REDACTED;
    } else if (value instanceof Error) {
      out[key] = { name: value.name, message: value.message };
    } else {
      out[key] = value;
    }
  }
  return out;
}

class ContextLogger implements Logger {
  constructor(private readonly base: Record<string, unknown>) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ContextLogger({ ...this.base, ...context });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    handler({
      level,
      message,
      context: redactContext({ ...this.base, ...context }),
      timestamp: new Date().toISOString(),
    });
  }
}

/** Logger whose entries all carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return new ContextLogger(baseContext);
}

/** Root logger instance. */
export const logger = createLogger({ component: 'pagewright' });
