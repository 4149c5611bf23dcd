export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields & { error?: unknown }): void;
}

const TRUTHY = new Set(["1", "true", "yes", "y", "t"]);

function flag(name: string): boolean {
  return TRUTHY.has(String(process.env[name] || "").trim().toLowerCase());
}

export function isDebugEnabled(): boolean {
  return flag("DEBUG_RAG_API");
}

function describeException(error: unknown): string | undefined {
  if (error === undefined) { return undefined; }
  if (error instanceof Error) { return error.stack || `${error.name}: ${error.message}`; }
  return String(error);
}

function formatText(timestamp: string, scope: string, level: LogLevel, message: string, fields: LogFields): string {
  const { error, ...rest } = fields;
  const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
  const exception = describeException(error);
  return `${timestamp} - ${scope} - ${level.toUpperCase()} - ${message}${extra}${exception ? `\n${exception}` : ""}`;
}

function formatJson(timestamp: string, scope: string, level: LogLevel, message: string, fields: LogFields): string {
  const { error, ...rest } = fields;
  const exception = describeException(error);
  try {
    return JSON.stringify({ timestamp, level, scope, message, ...rest, ...(exception ? { exception } : {}) });
  } catch {
    return JSON.stringify({ timestamp, level, scope, message, ...(exception ? { exception } : {}) });
  }
}

export function writeLog(scope: string, level: LogLevel, message: string, fields: LogFields = {}): void {
  if (process.env.NODE_ENV === "test") { return; }
  if (level === "debug" && !isDebugEnabled()) { return; }

  const timestamp = new Date().toISOString();
  const line = flag("CONSOLE_JSON")
    ? formatJson(timestamp, scope, level, message, fields)
    : formatText(timestamp, scope, level, message, fields);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, fields) => writeLog(scope, "debug", message, fields),
    info: (message, fields) => writeLog(scope, "info", message, fields),
    warn: (message, fields) => writeLog(scope, "warn", message, fields),
    error: (message, fields) => writeLog(scope, "error", message, fields),
  };
}
