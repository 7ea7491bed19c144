type LogLevel = "info" | "warn" | "error";

const sinks: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function write(level: LogLevel, component: string, message: string): void {
  sinks[level](`[PROXY:${component}] ${message}`);
}

export function logProxyError(component: string, message: string, error?: unknown): void {
  write("error", component, error ? `${message}: ${describeError(error)}` : message);
}

export function logProxyWarn(component: string, message: string): void {
  write("warn", component, message);
}

export function logProxyInfo(component: string, message: string): void {
  write("info", component, message);
}
