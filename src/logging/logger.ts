export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Context keys whose values are credentials and must never be written out. */
const SECRET_KEYS: ReadonlySet<string> = new Set([
  "apikey",
  "apikeys",
  "authorization",
  "credential",
  "token",
]);

const REDACTED = "[redacted]";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL;
  if (explicit && isLogLevel(explicit)) {
    return explicit;
  }
  if (process.env.NODE_ENV === "development") {
    return "debug";
  }
  return "info";
}

function redact(context: Record<string, unknown>): Record<string, unknown> {
  const clean: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    clean[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : value;
  }
  return clean;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger that stamps `bindings` onto every entry. */
  child(bindings: Record<string, unknown>): Logger;
}

export function createLogger(name: string, bindings: Record<string, unknown> = {}): Logger {
  function emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const minLevel = resolveMinLevel();
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) {
      return;
    }

    const entry: Record<string, unknown> = {
      level,
      name,
      msg: message,
      timestamp: new Date().toISOString(),
      ...redact({ ...bindings, ...context }),
    };

    process.stdout.write(JSON.stringify(entry) + "\n");
  }

  return {
    debug: (msg, ctx) => emit("debug", msg, ctx),
    info: (msg, ctx) => emit("info", msg, ctx),
    warn: (msg, ctx) => emit("warn", msg, ctx),
    error: (msg, ctx) => emit("error", msg, ctx),
    child: (extra) => createLogger(name, { ...bindings, ...extra }),
  };
}

export const log = createLogger("switchyard");
