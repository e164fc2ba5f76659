import pino from "pino";

type LogContext = Record<string, unknown>;

const root = pino({
  name: "spreadlock",
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Converts bigints to strings so log lines stay valid JSON */
function serialize(context?: LogContext): LogContext {
  if (!context) return {};
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

export const log = {
  debug(message: string, context?: LogContext): void {
    root.debug(serialize(context), message);
  },
  info(message: string, context?: LogContext): void {
    root.info(serialize(context), message);
  },
  warn(message: string, context?: LogContext): void {
    root.warn(serialize(context), message);
  },
  error(message: string, context?: LogContext): void {
    root.error(serialize(context), message);
  },
};

export function setLogLevel(level: string): void {
  root.level = level;
}
