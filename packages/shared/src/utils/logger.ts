export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(
  level: LogLevel,
  component: string,
  message: string
): string {
  const timestamp = new Date().toISOString();
  return `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

// Everything goes to stderr: stdout is reserved for command output.
export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, message: string, data?: unknown) => {
    if (!shouldLog(level)) return;
    const line = formatMessage(level, component, message);
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(line, data);
    }
  };

  return {
    debug(message: string, data?: unknown) {
      emit("debug", message, data);
    },
    info(message: string, data?: unknown) {
      emit("info", message, data);
    },
    warn(message: string, data?: unknown) {
      emit("warn", message, data);
    },
    error(message: string, data?: unknown) {
      emit("error", message, data);
    },
  };
}
