export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(scope: string): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = parseLevel(process.env.STRATUM_LOG_LEVEL) ?? "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${level.toUpperCase()}] (${scope})` : `[${level.toUpperCase()}]`;
  const base = `${ts} ${prefix} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", scope, msg, data));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", scope, msg, data));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", scope, msg, data));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", scope, msg, data));
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const log: Logger = createLogger();
