type LogLevel = "info" | "warn" | "error";

export type LogContext = {
  runId?: string;
  extractType?: string;
  fileName?: string;
  fund?: string;
  referenceDate?: string;
  status?: string;
  attempt?: number;
  durationMs?: number;
  recordCount?: number;
  insertedCount?: number;
  rejectedCount?: number;
  errorName?: string;
};

const allowedKeys = new Set<string>([
  "runId",
  "extractType",
  "fileName",
  "fund",
  "referenceDate",
  "status",
  "attempt",
  "durationMs",
  "recordCount",
  "insertedCount",
  "rejectedCount",
  "errorName"
]);

const sanitizeContext = (context?: LogContext): Record<string, string | number | boolean> => {
  if (!context) {
    return {};
  }

  const sanitized: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(context)) {
    if (!allowedKeys.has(key) || value === undefined || value === null) {
      continue;
    }
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      sanitized[key] = value;
    }
  }

  return sanitized;
};

const writeLog = (level: LogLevel, event: string, context?: LogContext) => {
  const payload = {
    level,
    event,
    timestamp: new Date().toISOString(),
    ...sanitizeContext(context)
  };
  const line = `${JSON.stringify(payload)}\n`;
  const stream = level === "error" ? process.stderr : process.stdout;
  stream.write(line);
};

export const logInfo = (event: string, context?: LogContext) =>
  writeLog("info", event, context);

export const logWarn = (event: string, context?: LogContext) =>
  writeLog("warn", event, context);

export const logError = (event: string, context?: LogContext) =>
  writeLog("error", event, context);

export const formatErrorName = (error: unknown): string => {
  if (error instanceof Error && error.name) {
    return error.name;
  }
  return "Error";
};

export const startSpan = (event: string, context?: LogContext) => {
  const startedAt = Date.now();
  logInfo(`${event}_STARTED`, context);

  return {
    end: (extra?: LogContext) => {
      logInfo(`${event}_COMPLETED`, {
        ...context,
        ...extra,
        durationMs: Date.now() - startedAt
      });
    },
    fail: (error: unknown, extra?: LogContext) => {
      logError(`${event}_FAILED`, {
        ...context,
        ...extra,
        durationMs: Date.now() - startedAt,
        errorName: formatErrorName(error)
      });
    }
  };
};

export type RetryOptions = {
  attempts?: number;
  delayMs?: number;
  event: string;
  context?: LogContext;
  shouldRetry?: (error: unknown) => boolean;
};

export const withRetry = async <T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const attempts = options.attempts ?? 3;
  const delayMs = options.delayMs ?? 200;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      logInfo(`${options.event}_ATTEMPT`, {
        ...options.context,
        attempt
      });
      return await operation();
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      const isLast = attempt === attempts || !retryable;
      const log = isLast ? logError : logWarn;
      log(`${options.event}_FAILED`, {
        ...options.context,
        attempt,
        errorName: formatErrorName(error)
      });

      if (isLast) {
        throw error;
      }

      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  throw new Error("Retry attempts exhausted.");
};

export type RunLogger = {
  info: (event: string, extra?: LogContext) => void;
  warn: (event: string, extra?: LogContext) => void;
  startSpan: (event: string, extra?: LogContext) => ReturnType<typeof startSpan>;
  withRetry: <T>(operation: () => Promise<T>, options: RetryOptions) => Promise<T>;
  child: (extra: LogContext) => RunLogger;
};

/** Every event written through the returned logger carries the bound context. */
export const createRunLogger = (context: LogContext): RunLogger => {
  const merge = (extra?: LogContext): LogContext => ({ ...context, ...extra });
  return {
    info: (event, extra) => logInfo(event, merge(extra)),
    warn: (event, extra) => logWarn(event, merge(extra)),
    startSpan: (event, extra) => startSpan(event, merge(extra)),
    withRetry: (operation, options) =>
      withRetry(operation, { ...options, context: merge(options.context) }),
    child: (extra) => createRunLogger(merge(extra))
  };
};
