// Scoped console logger. A sink can be swapped in for tests or embedding apps.

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

export type LogSink = (level: EmitLevel, line: string, extra?: Record<string, unknown>) => void;

export interface Logger {
  trace(message: string, extra?: Record<string, unknown>): void;
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line, extra) => {
  const write =
    level === "error" ? console.error
    : level === "warn" ? console.warn
    : level === "info" ? console.info
    : console.debug;
  if (extra) {
    write(line, extra);
  } else {
    write(line);
  }
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? consoleSink;
  let sinkFailed = false;

  const emit = (level: EmitLevel, message: string, extra?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    try {
      sink(level, `[protect][${scope}] ${message}`, extra);
    } catch (err) {
      // reported once, then dropped
      if (!sinkFailed) {
        sinkFailed = true;
        console.error(`[protect][${scope}] log sink failed, further sink errors are dropped:`, err);
      }
    }
  };

  return {
    trace: (message, extra) => emit("trace", message, extra),
    debug: (message, extra) => emit("debug", message, extra),
    info: (message, extra) => emit("info", message, extra),
    warn: (message, extra) => emit("warn", message, extra),
    error: (message, extra) => emit("error", message, extra),
  };
}
