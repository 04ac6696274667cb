type Severity = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export type LogFields = Record<string, unknown>;

export type LogSink = (line: string) => void;

type LogParams = {
  message: string;
  severity?: Severity;
  component?: string;
  data?: LogFields;
  labels?: Record<string, string>;
  sink?: LogSink;
};

const defaultSink: LogSink = (line) => console.log(line);

/**
 * Writes one JSON object per line. Values JSON cannot carry (bigint,
 * Error) are rendered as strings.
 */
export function logStructured({
  message,
  severity = "INFO",
  component,
  data = {},
  labels,
  sink = defaultSink,
}: LogParams) {
  const entry: LogFields = {
    severity,
    message,
    component,
    labels,
    ...data,
  };

  try {
    sink(JSON.stringify(entry, replaceUnserializable));
  } catch (err) {
    // circular data: keep the message, drop the payload
    sink(
      JSON.stringify({
        severity: "ERROR",
        message: "Failed to log structured entry",
        component,
        originalMessage: message,
        error: String(err),
      }),
    );
  }
}

function replaceUnserializable(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  return value;
}

export type StructuredLogger = {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields): void;
  with(context: LogFields): StructuredLogger;
};

export type CreateStructuredLoggerOptions = {
  component?: string;
  defaultContext?: LogFields;
  labels?: Record<string, string>;
  sink?: LogSink;
};

function createLoggerWithContext(
  options: CreateStructuredLoggerOptions,
  inheritedContext: LogFields = {},
): StructuredLogger {
  const { component, defaultContext = {}, labels, sink } = options;
  const baseContext = { ...defaultContext, ...inheritedContext };

  const logAt = (severity: Severity) => (message: string, data?: LogFields) =>
    logStructured({
      message,
      severity,
      component,
      data: { ...baseContext, ...(data ?? {}) },
      labels,
      sink,
    });

  return {
    debug: logAt("DEBUG"),
    info: logAt("INFO"),
    warn: logAt("WARNING"),
    error: logAt("ERROR"),
    with: (context: LogFields) => createLoggerWithContext(options, { ...baseContext, ...context }),
  };
}

/**
 * Structured logger bound to a component name. `logger.with({ fn })`
 * derives a logger carrying extra context on every line.
 */
export function createStructuredLogger(
  options: CreateStructuredLoggerOptions = {},
): StructuredLogger {
  return createLoggerWithContext(options);
}
