export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Everything goes to stderr: stdout carries the MCP stdio stream.
 */
export function createLogger(
  scope: string,
  level: LogLevel = "info",
): Logger {
  const threshold = SEVERITY[level];

  const write =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (SEVERITY[messageLevel] < threshold) return;
      const label =
        messageLevel === "info" ? "" : ` ${messageLevel.toUpperCase()}`;
      const prefix = `[${scope}]${label}`;
      console.error(`${prefix} ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
