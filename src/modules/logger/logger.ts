export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function formatFields(fields?: LogFields): string {
  if (!fields || Object.keys(fields).length === 0) return "";
  return ` ${JSON.stringify(fields, (_key, value: unknown) =>
    value instanceof Error ? value.message : value
  )}`;
}

/**
 * Console logger with a level threshold and a bracketed scope prefix,
 * e.g. `[jobs] Job 42 completed`.
 */
export function createLogger(level: LogLevel = "info", scope?: string): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = scope ? `[${scope}] ` : "";

  const emit = (
    messageLevel: Exclude<LogLevel, "silent">,
    message: string,
    fields?: LogFields
  ) => {
    if (LEVEL_RANK[messageLevel] < threshold) return;
    const line = `${prefix}${message}${formatFields(fields)}`;
    switch (messageLevel) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (childScope) =>
      createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

export const silentLogger: Logger = createLogger("silent");
