export type LogLevel = "debug" | "info" | "warn" | "error";
export type ConfigLogLevel = LogLevel | "none";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (event: string, meta?: LogMeta) => void;
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
}

export interface LogSink {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const consoleSink: LogSink = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

export function createLogger(level: ConfigLogLevel, sink: LogSink = consoleSink): Logger {
  const shouldLog = (candidate: LogLevel): boolean => {
    if (level === "none") return false;
    return levelOrder[candidate] >= levelOrder[level];
  };

  const emit = (candidate: LogLevel, event: string, meta?: LogMeta): void => {
    if (!shouldLog(candidate)) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: candidate,
      event,
      ...(meta ?? {})
    });

    if (candidate === "error") {
      sink.error(line);
      return;
    }
    if (candidate === "warn") {
      sink.warn(line);
      return;
    }
    sink.log(line);
  };

  return {
    debug: (event, meta) => emit("debug", event, meta),
    info: (event, meta) => emit("info", event, meta),
    warn: (event, meta) => emit("warn", event, meta),
    error: (event, meta) => emit("error", event, meta)
  };
}

export const silentLogger: Logger = createLogger("none");
