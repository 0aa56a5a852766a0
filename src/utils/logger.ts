export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, v);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let current: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel) {
  current = level;
}

function write(level: Exclude<LogLevel, "silent">, message: string) {
  if (LEVELS[level] < LEVELS[current]) return;

  const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (message: string) => write("debug", message),
  info: (message: string) => write("info", message),
  warn: (message: string) => write("warn", message),
  error: (message: string) => write("error", message),
};
