type LogLevel = "INFO" | "WARN" | "ERROR";

function nowIso(): string {
  return new Date().toISOString();
}

function formatLine(level: LogLevel, message: string, scope?: string): string {
  return scope ? `[${nowIso()}] ${level} [${scope}] ${message}` : `[${nowIso()}] ${level} ${message}`;
}

export function logInfo(message: string, scope?: string): void {
  console.log(formatLine("INFO", message, scope));
}

export function logWarn(message: string, scope?: string): void {
  console.warn(formatLine("WARN", message, scope));
}

export function logError(message: string, scope?: string): void {
  console.error(formatLine("ERROR", message, scope));
}
