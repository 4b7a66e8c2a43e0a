export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  fields: LogFields;
}

type ConsoleSink = Pick<Console, "log" | "warn" | "error">;

function serializeFields(fields: LogFields): LogFields {
  const serialized: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    serialized[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return serialized;
}

export function createConsoleLogger(
  scope: string,
  sink: ConsoleSink = console,
): Logger {
  function write(level: LogLevel, message: string, fields: LogFields = {}): void {
    const envelope = { type: "log", level, scope, message };
    // fields never replace envelope keys
    const line = JSON.stringify({
      ...envelope,
      ...serializeFields(fields),
      ...envelope,
    });

    if (level === "error") sink.error(line);
    else if (level === "warn") sink.warn(line);
    else sink.log(line);
  }

  return {
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(scope = "test"): RecordingLogger {
  const entries: LogEntry[] = [];

  const push =
    (level: LogLevel) =>
    (message: string, fields: LogFields = {}): void => {
      entries.push({ level, scope, message, fields });
    };

  return {
    entries,
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    messages(level: LogLevel): string[] {
      return entries
        .filter((entry) => entry.level === level)
        .map((entry) => entry.message);
    },
  };
}
