/**
 * Structured JSON-line logger.
 *
 * Everything goes to stderr: in stdio mode stdout carries the JSON-RPC
 * stream and must not see log output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

let threshold: LogLevel = "info";
let sink: (line: string) => void = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Redirect output, e.g. to capture lines in tests. Returns the previous sink. */
export function setLogSink(
  next: (line: string) => void
): (line: string) => void {
  const previous = sink;
  sink = next;
  return previous;
}

function write(
  level: LogLevel,
  scope: string,
  msg: string,
  fields?: LogFields
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  sink(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      scope,
      msg,
      ...fields,
    })
  );
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, fields) => write("debug", scope, msg, fields),
    info: (msg, fields) => write("info", scope, msg, fields),
    warn: (msg, fields) => write("warn", scope, msg, fields),
    error: (msg, fields) => write("error", scope, msg, fields),
  };
}
