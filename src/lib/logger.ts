import { getConfig, type LogLevel } from "@/lib/config";

type LoggedLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function write(level: LoggedLevel, tag: string, message: string, context?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < LEVEL_RANK[getConfig().logLevel]) {
    return;
  }

  const line = `[${tag}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    console[level](line, context);
  } else {
    console[level](line);
  }
}

export function createLogger(tag: string): Logger {
  return {
    debug: (message, context) => write("debug", tag, message, context),
    info: (message, context) => write("info", tag, message, context),
    warn: (message, context) => write("warn", tag, message, context),
    error: (message, context) => write("error", tag, message, context)
  };
}
