import pino from "pino";
import { variables, resolveLogLevel } from "./environment";
import { logCounter, errorLogCounter } from "./metrics";

const namespaces = ["buffer", "worker", "transform"] as const;
const logLevels = ["info", "warn", "debug", "error"] as const;

type Namespace = (typeof namespaces)[number];
type LogLevel = (typeof logLevels)[number];
type LogMeta = Record<string, unknown>;
type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;

const pinoLogger = pino({
  level: resolveLogLevel(variables),
  transport:
    variables.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
});

function recordLogMetrics(
  namespace: Namespace,
  level: LogLevel,
  error?: Error,
): void {
  logCounter.labels(namespace, level).inc();

  if (level === "error" && error) {
    errorLogCounter
      .labels(namespace, error.constructor.name || "UnknownError")
      .inc();
  }
}

function createLogger(namespace: Namespace, level: LogLevel): LogFn {
  return (message, meta, error) => {
    recordLogMetrics(namespace, level, error);

    const logObj: LogMeta = {
      namespace,
      ...meta,
    };

    if (error) {
      logObj.error = {
        message: error.message,
        stack: error.stack,
        name: error.name,
      };
    }

    pinoLogger[level](logObj, message);
  };
}

function namespaceLogger(namespace: Namespace): Record<LogLevel, LogFn> {
  return {
    info: createLogger(namespace, "info"),
    warn: createLogger(namespace, "warn"),
    debug: createLogger(namespace, "debug"),
    error: createLogger(namespace, "error"),
  };
}

export const logger: Record<Namespace, Record<LogLevel, LogFn>> = {
  buffer: namespaceLogger("buffer"),
  worker: namespaceLogger("worker"),
  transform: namespaceLogger("transform"),
};

/**
 * Namespaced logger that also counts every message in the package registry.
 */
export class StructuredLogger {
  constructor(private namespace: Namespace) {}

  info(message: string, meta?: LogMeta) {
    logger[this.namespace].info(message, meta);
  }

  warn(message: string, meta?: LogMeta, error?: Error) {
    logger[this.namespace].warn(message, meta, error);
  }

  debug(message: string, meta?: LogMeta) {
    logger[this.namespace].debug(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta) {
    logger[this.namespace].error(message, meta, error);
  }

  get debugEnabled(): boolean {
    return pinoLogger.isLevelEnabled("debug");
  }
}

export function createStructuredLogger(namespace: Namespace): StructuredLogger {
  return new StructuredLogger(namespace);
}

export { namespaces, logLevels };
export type { Namespace, LogLevel };
