import pino, { type Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`invalid log level: ${normalized}`);
}

// stderr keeps stdout free for reports and JSON.
export function createCliLogger(params: { level: LogLevel; bindings?: Record<string, unknown> }): Logger {
  const logger = pino(
    {
      name: "secretplan",
      level: params.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.destination(2),
  );
  return params.bindings ? logger.child(params.bindings) : logger;
}
