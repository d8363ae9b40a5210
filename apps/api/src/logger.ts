import { getLogContext } from "./log-context";
import { trace } from "@opentelemetry/api";

type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, unknown>;

const REDACT_KEY_PATTERN = /(password|token|secret|signature|authorization|cookie|national_?id|email|phone|mobile|photo)/i;
const MAX_REDACTION_DEPTH = 6;

function redactValue(value: unknown, depth = 0): unknown {
  if (depth >= MAX_REDACTION_DEPTH) return "[MAX_DEPTH]";
  if (value == null) return value;
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (typeof value === "object") {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (REDACT_KEY_PATTERN.test(key)) {
        output[key] = "[REDACTED]";
      } else {
        output[key] = redactValue(entry, depth + 1);
      }
    }
    return output;
  }
  return value;
}

function redactFields(fields: LogFields): LogFields {
  const output: LogFields = {};
  for (const [key, entry] of Object.entries(fields)) {
    output[key] = REDACT_KEY_PATTERN.test(key) ? "[REDACTED]" : redactValue(entry, 1);
  }
  return output;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  const context = getLogContext();
  const spanContext = trace.getActiveSpan()?.spanContext();
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId ?? null,
    actor: context?.actor ?? null,
    traceId: spanContext?.traceId ?? null,
    spanId: spanContext?.spanId ?? null,
    ...(fields ? redactFields(fields) : {}),
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logInfo(message: string, fields?: LogFields): void {
  write("info", message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
  write("warn", message, fields);
}

export function logError(message: string, fields?: LogFields): void {
  write("error", message, fields);
}
