import type { LogLevel } from '../config/types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Component-scoped logger. Everything goes to stderr: stdout carries the
 * MCP stdio transport.
 */
export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
    const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    process.stderr.write(
      `${new Date().toISOString()} [${level.toUpperCase()}] [${component}] ${message}${extra}\n`,
    );
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
