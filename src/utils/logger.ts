/**
 * stderr-only logger.
 * CRITICAL: Never use console.log(). stdout carries the MCP JSON-RPC stream,
 * so every line goes to stderr.
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error, default
 * info) and can be changed at run time with setLogLevel.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const PREFIX = "[risk-monitor]";

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value === "debug" || value === "warn" || value === "error" ? value : "info";
}

let threshold = SEVERITY[parseLevel(process.env.LOG_LEVEL)];

export function setLogLevel(level: LogLevel): void {
  threshold = SEVERITY[level];
}

function emit(level: LogLevel, message: string): void {
  if (SEVERITY[level] < threshold) return;
  const tag = level === "info" ? "" : `${level.toUpperCase()}: `;
  console.error(`${new Date().toISOString()} ${PREFIX} ${tag}${message}`);
}

/** Error message, followed by its cause when the cause says something new. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const { cause } = error;
  if (cause instanceof Error && cause.message !== error.message) {
    return `${error.message} (caused by ${cause.name}: ${cause.message})`;
  }
  return error.message;
}

export function logDebug(message: string): void {
  emit("debug", message);
}

export function log(message: string): void {
  emit("info", message);
}

export function logWarn(message: string): void {
  emit("warn", message);
}

export function logError(message: string, error?: unknown): void {
  emit("error", error === undefined ? message : `${message}: ${describeError(error)}`);
}
