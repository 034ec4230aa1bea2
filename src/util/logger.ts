// stdout belongs to the MCP stdio transport, so every line goes to stderr.

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

export type Logger = {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
  child(scope: string): Logger;
};

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, v);
}

const envLevel = process.env.LED_LOG_LEVEL ?? "";
let threshold: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.info;

export function setLogLevel(level: LogLevel) {
  threshold = LEVELS[level];
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, extra: unknown[]) => {
    if (LEVELS[level] < threshold) return;
    console.error(`[${scope}] ${level} ${message}`, ...extra);
  };
  return {
    debug: (m, ...x) => write("debug", m, x),
    info: (m, ...x) => write("info", m, x),
    warn: (m, ...x) => write("warn", m, x),
    error: (m, ...x) => write("error", m, x),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}

/** Discards everything; handy where a component is built without a logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
