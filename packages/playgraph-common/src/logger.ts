type LogMethod = (message: string, ...args: unknown[]) => void;

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function parseBooleanEnv(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_WEIGHT, value);
}

/**
 * Reads the threshold from `PLAYGRAPH_DEBUG` / `PLAYGRAPH_LOG_LEVEL`.
 * `trace` and `verbose` are accepted as aliases of `debug`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (parseBooleanEnv(env.PLAYGRAPH_DEBUG)) {
    return "debug";
  }

  const configured = env.PLAYGRAPH_LOG_LEVEL?.trim().toLowerCase();
  if (configured) {
    if (configured === "trace" || configured === "verbose") {
      return "debug";
    }
    if (isLogLevel(configured)) {
      return configured;
    }
  }

  return "info";
}

export interface PlaygraphLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerOptions {
  level?: LogLevel;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): PlaygraphLogger {
  const prefix = `[${namespace}]`;
  const threshold = options.level ?? resolveLogLevel();

  const wrap = (level: LogLevel, emit: () => LogMethod): LogMethod => {
    return (message: string, ...args: unknown[]) => {
      if (LEVEL_WEIGHT[level] > LEVEL_WEIGHT[threshold]) {
        return;
      }
      // looked up per call so console replacements in tests are honoured
      emit()(`${prefix} ${message}`, ...args);
    };
  };

  return {
    debug: wrap("debug", () => console.debug),
    info: wrap("info", () => console.info),
    warn: wrap("warn", () => console.warn),
    error: wrap("error", () => console.error),
  };
}

/** Logger that drops everything; handy default for library callers. */
export const silentLogger: PlaygraphLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
