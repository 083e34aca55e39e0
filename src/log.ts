export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export type LogSink = Pick<Console, "log" | "warn" | "error">;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
}

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const scope = options.scope ?? "read-loop";
  const sink = options.sink ?? console;

  const write = (at: LogLevel, message: string, details: unknown[]) => {
    if (rank(at) < rank(level)) return;
    const line = `[${scope}] ${message}`;
    switch (at) {
      case "error":
        sink.error(line, ...details);
        break;
      case "warn":
        sink.warn(line, ...details);
        break;
      default:
        sink.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
    child: (child) => createLogger({ level, sink, scope: `${scope}:${child}` }),
  };
}

export const silentLogger: Logger = createLogger({
  level: "error",
  sink: { log: () => {}, warn: () => {}, error: () => {} },
});
