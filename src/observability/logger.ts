import { isTruthyFlag, readTraceModeEnv } from "./flags.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  collection?: string | null;
}

export type LogFields = Record<string, unknown>;

type LogFn = (event: string, context: CorrelationContext, fields?: LogFields) => void;

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

const SINKS: Record<LogLevel, (line: string) => void> = {
  trace: (line) => console.info(line),
  debug: (line) => console.info(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

const isLogLevel = (value: string): value is LogLevel => LEVELS.some((level) => level === value);

/**
 * BACKEND_LOG_LEVEL (or LOG_LEVEL) wins when set. Otherwise request tracing
 * lowers the floor so its events are not filtered out.
 */
export const resolveLogLevel = (): LogLevel => {
  const explicit = (process.env.BACKEND_LOG_LEVEL ?? process.env.LOG_LEVEL)?.trim().toLowerCase();
  if (explicit) {
    return isLogLevel(explicit) ? explicit : "info";
  }

  const traceMode = readTraceModeEnv();
  if (traceMode === "trace") {
    return "trace";
  }
  return traceMode === "debug" || isTruthyFlag(process.env.BACKEND_REQUEST_TRACE) ? "debug" : "info";
};

const threshold = LEVELS.indexOf(resolveLogLevel());

export const isLogLevelEnabled = (level: LogLevel): boolean => LEVELS.indexOf(level) >= threshold;

const loggerFor =
  (level: LogLevel): LogFn =>
  (event, context, fields = {}) => {
    if (!isLogLevelEnabled(level)) {
      return;
    }
    SINKS[level](
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        request_id: context.requestId ?? null,
        collection: context.collection ?? null,
        ...fields
      })
    );
  };

export const logTrace = loggerFor("trace");
export const logDebug = loggerFor("debug");
export const logInfo = loggerFor("info");
export const logWarn = loggerFor("warn");
export const logError = loggerFor("error");

export interface ScopedLogger {
  readonly context: CorrelationContext;
  trace(event: string, fields?: LogFields): void;
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

/** Binds a request's correlation ids so pipeline stages log without threading them through. */
export const createScopedLogger = (context: CorrelationContext): ScopedLogger => ({
  context,
  trace: (event, fields) => logTrace(event, context, fields),
  debug: (event, fields) => logDebug(event, context, fields),
  info: (event, fields) => logInfo(event, context, fields),
  warn: (event, fields) => logWarn(event, context, fields),
  error: (event, fields) => logError(event, context, fields)
});
