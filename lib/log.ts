export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
};

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

// Console logger with a "[scope]" prefix, as used across the pipeline.
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const on = (l: Exclude<LogLevel, "silent">) => ORDER[l] >= ORDER[level];
  const tag = `[${scope}]`;
  return {
    debug: (msg, ...args) => { if (on("debug")) console.debug(tag, msg, ...args); },
    info: (msg, ...args) => { if (on("info")) console.info(tag, msg, ...args); },
    warn: (msg, ...args) => { if (on("warn")) console.warn(tag, msg, ...args); },
    error: (msg, ...args) => { if (on("error")) console.error(tag, msg, ...args); },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
