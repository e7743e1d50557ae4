export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export function formatMessage(
  level: LogLevel,
  component: string,
  message: string,
  now: Date = new Date(),
): string {
  return `${now.toISOString()} [${level.toUpperCase()}] [${component}] ${message}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

// Everything goes to stderr; stdout carries query results only.
export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown) => {
    if (!shouldLog(level)) return;
    const line = formatMessage(level, component, message);
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(line, data);
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}
