/**
 * Level-filtered logging to stderr.
 *
 * stdout carries the MCP stdio transport, so nothing here may write to it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function write(level: LogLevel, message: string, extra: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;
  const stamp = new Date().toISOString();
  const tail = extra.length > 0 ? ` ${extra.map(formatExtra).join(" ")}` : "";
  process.stderr.write(
    `[${stamp}] ${level.toUpperCase()} ${message}${tail}\n`,
  );
}

function formatExtra(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function logDebug(message: string, ...extra: unknown[]): void {
  write("debug", message, extra);
}

export function logInfo(message: string, ...extra: unknown[]): void {
  write("info", message, extra);
}

export function logWarn(message: string, ...extra: unknown[]): void {
  write("warn", message, extra);
}

export function logError(message: string, ...extra: unknown[]): void {
  write("error", message, extra);
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
