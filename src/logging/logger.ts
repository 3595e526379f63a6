export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  details: unknown[];
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
};

/**
 * Console logger that prefixes every line with `[tag]`, e.g. `[timeline] clamped seek`.
 * Debug output is suppressed unless `level` is lowered to `'debug'`.
 */
export const createConsoleLogger = (tag: string, options: ConsoleLoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const emit = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `[${tag}] ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...details);
        break;
      case 'info':
        console.info(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      case 'error':
        console.error(line, ...details);
        break;
    }
  };
  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
};

export const createSilentLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

export type MemoryLogger = Logger & {
  readonly entries: readonly LogEntry[];
  clear(): void;
};

export const createMemoryLogger = (): MemoryLogger => {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    entries.push({ level, message, details });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    clear: () => {
      entries.length = 0;
    },
  };
};
