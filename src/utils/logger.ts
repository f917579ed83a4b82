export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

let currentLevel: LogLevel = parseLevel(process.env.CAMAPPER_LOG_LEVEL);

function parseLevel(value: string | undefined): LogLevel {
  return value === "error" ||
    value === "warn" ||
    value === "info" ||
    value === "debug"
    ? value
    : "info";
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Scoped logger. Everything goes to stderr: stdout carries the JSON map
 * and the MCP stdio transport.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] > LEVEL_RANK[currentLevel]) return;
    console.error(`[${scope}] ${level}: ${message}`);
  };

  return {
    error: (message) => write("error", message),
    warn: (message) => write("warn", message),
    info: (message) => write("info", message),
    debug: (message) => write("debug", message),
  };
}
