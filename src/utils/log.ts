export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let threshold = RANK.info;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/** Set once at process start. Accepts any case (`DEBUG`, `info`). */
export function setLogLevel(level: string) {
  const normalized = level.toLowerCase() === 'warning' ? 'warn' : level.toLowerCase();
  if (!isLogLevel(normalized)) throw new Error(`Unknown log level: ${level}`);
  threshold = RANK[normalized];
}

export function getLogLevel(): LogLevel {
  return LOG_LEVELS.find((l) => RANK[l] === threshold) ?? 'info';
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string) => {
    if (RANK[level] < threshold) return;
    const line = `${level.toUpperCase().padEnd(5)} [${scope}] ${msg}`;
    if (level === 'error' || level === 'warn') console.error(line);
    else console.log(line);
  };
  return {
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
  };
}
