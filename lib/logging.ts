import { redact } from "./utils";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// Donor contact data never reaches the log stream in clear text.
const SENSITIVE_KEY = /email|phone|birth|address/;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

function currentThreshold(): number {
  const envLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.info;
}

export type LogContext = {
  batchId?: string;
  component?: string;
  mode?: "preview" | "execute";
  tags?: string[];
};

export type Logger = {
  child(childContext?: LogContext): Logger;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
};

export function sanitize(payload: unknown): unknown {
  if (!payload) {
    return payload;
  }
  if (typeof payload === "string") {
    return redact(payload);
  }
  if (Array.isArray(payload)) {
    return payload.map((item) => sanitize(item));
  }
  if (payload instanceof Error) {
    return { name: payload.name, message: payload.message };
  }
  if (typeof payload === "object") {
    return Object.fromEntries(
      Object.entries(payload).map(([key, value]) => {
        if (typeof value === "string" && SENSITIVE_KEY.test(key.toLowerCase())) {
          return [key, redact(value)];
        }
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
          return [key, value];
        }
        return [key, sanitize(value)];
      })
    );
  }
  return payload;
}

function toRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return { ...value };
  }
  return null;
}

export function createLogger(context: LogContext = {}): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVELS[level] < currentThreshold()) {
      return;
    }

    const sanitizedMeta = sanitize(meta);
    const metaRecord = toRecord(sanitizedMeta) ?? undefined;

    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...context,
      ...(metaRecord ?? {})
    };

    if (!metaRecord && sanitizedMeta !== undefined) {
      record.meta = sanitizedMeta;
    }

    switch (level) {
      case "debug":
        console.debug(JSON.stringify(record));
        break;
      case "info":
        console.info(JSON.stringify(record));
        break;
      case "warn":
        console.warn(JSON.stringify(record));
        break;
      case "error":
        console.error(JSON.stringify(record));
        break;
      default:
        console.log(JSON.stringify(record));
    }
  }

  return {
    child(childContext: LogContext = {}) {
      return createLogger({ ...context, ...childContext });
    },
    debug(message: string, meta?: Record<string, unknown>) {
      log("debug", message, meta);
    },
    info(message: string, meta?: Record<string, unknown>) {
      log("info", message, meta);
    },
    warn(message: string, meta?: Record<string, unknown>) {
      log("warn", message, meta);
    },
    error(message: string, meta?: Record<string, unknown>) {
      log("error", message, meta);
    }
  };
}
