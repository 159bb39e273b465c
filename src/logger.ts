export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}:`;
    // Everything goes to stderr so stdout stays clean for the plan output.
    console.error(prefix, message, ...args);
  }

  return {
    debug: (message, ...args) => log("debug", message, args),
    info: (message, ...args) => log("info", message, args),
    warn: (message, ...args) => log("warn", message, args),
    error: (message, ...args) => log("error", message, args),
  };
}

function levelFromEnv(): LogLevel {
  const raw = process.env.DEDUPE_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "warn";
}

export const defaultLogger: Logger = createLogger(levelFromEnv());

export const silentLogger: Logger = createLogger("silent");
