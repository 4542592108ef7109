export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  error: (fields: LogFields, message?: string) => void;
  warn: (fields: LogFields, message?: string) => void;
  info: (fields: LogFields, message?: string) => void;
  debug: (fields: LogFields, message?: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY
};

type EmitLevel = "error" | "warn" | "info" | "debug";

export interface LoggerSink {
  error: (line: string) => void;
  warn: (line: string) => void;
  info: (line: string) => void;
  debug: (line: string) => void;
}

export function serializeError(error: unknown): LogFields {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return { value: String(error) };
}

export function createLogger(
  level: LogLevel,
  options: { sink?: LoggerSink; now?: () => Date; base?: LogFields } = {}
): Logger {
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const threshold = LEVEL_RANK[level];

  const emit = (emitLevel: EmitLevel) => (fields: LogFields, message?: string) => {
    if (LEVEL_RANK[emitLevel] < threshold) {
      return;
    }

    sink[emitLevel](
      JSON.stringify({
        level: emitLevel,
        time: now().toISOString(),
        ...options.base,
        ...fields,
        ...(message ? { msg: message } : {})
      })
    );
  };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug")
  };
}

export const silentLogger: Logger = createLogger("silent");
