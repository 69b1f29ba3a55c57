/**
 * Structured logger: one JSON object per line, `{ level, msg, ts, ...context }`.
 *
 * The minimum level is process-wide and set once at startup from
 * `AppConfig.logLevel`; until then everything from `info` up is written.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogContext = Record<string, unknown>;

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

let threshold = LOG_LEVELS.indexOf("info");

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS.indexOf(level);
}

function write(level: LogLevel, msg: string, context?: LogContext): void {
  if (LOG_LEVELS.indexOf(level) < threshold) return;
  sinks[level](JSON.stringify({ level, msg, ts: new Date().toISOString(), ...context }));
}

export const logger = {
  debug: (msg: string, context?: LogContext) => write("debug", msg, context),
  info: (msg: string, context?: LogContext) => write("info", msg, context),
  warn: (msg: string, context?: LogContext) => write("warn", msg, context),
  error: (msg: string, context?: LogContext) => write("error", msg, context),
};

/** Message, class name and stack of a thrown value, for a log context. */
export function errorContext(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error: err.message, error_name: err.name, stack: err.stack };
  }
  return { error: String(err) };
}
