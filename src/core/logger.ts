export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  level: LogLevel;
  scope: string;
  message: string;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: LogSink = (record) => {
  const line = `[${record.level.toUpperCase()}] ${record.scope}: ${record.message}`;
  if (record.level === "error") {
    console.error(line);
  } else if (record.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let activeSink: LogSink = consoleSink;
let threshold: LogLevel = process.env.VNSCRIPT_LOG_LEVEL === "debug" ? "debug" : "warn";
const listeners = new Set<LogSink>();

/** Replaces the output sink; pass null to restore console output. Returns the previous sink. */
export const setLogSink = (sink: LogSink | null): LogSink => {
  const previous = activeSink;
  activeSink = sink ?? consoleSink;
  return previous;
};

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

/** Listeners see every record regardless of the level threshold. */
export const onLog = (listener: LogSink): (() => void) => {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
};

export const createLogger = (scope: string): Logger => {
  const emit = (level: LogLevel, message: string): void => {
    const record: LogRecord = { level, scope, message };
    for (const listener of listeners) {
      listener(record);
    }
    if (LEVEL_RANK[level] >= LEVEL_RANK[threshold]) {
      activeSink(record);
    }
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
};
