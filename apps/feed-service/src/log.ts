type LogMeta = Record<string, unknown>;
type LogLevel = "info" | "warn" | "error";

const SERVICE_NAME = "feed-service";

// api-key is the only credential this service sees; the rest guard stray headers.
const SENSITIVE_KEY = /api[_-]?key|apikey|secret|password|token|authorization|bearer|cookie/i;

const redactString = (value: string) =>
  value.toLowerCase().startsWith("bearer ") ? "Bearer [redacted]" : value;

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

export const formatLogLine = (level: LogLevel, event: string, meta?: LogMeta) => {
  const safeMeta = meta ? redact(meta) : undefined;
  return JSON.stringify({
    level,
    service: SERVICE_NAME,
    event,
    ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
  });
};

const write = (level: LogLevel, event: string, meta?: LogMeta) => {
  const line = formatLogLine(level, event, meta);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

export const log = {
  info: (event: string, meta?: LogMeta) => write("info", event, meta),
  warn: (event: string, meta?: LogMeta) => write("warn", event, meta),
  error: (event: string, meta?: LogMeta) => write("error", event, meta)
};
