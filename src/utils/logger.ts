/**
 * Leveled logger writing `[LEVEL] message` to stderr.
 * stdout belongs to the MCP protocol (and to the CLI's own output), so
 * nothing here ever writes there.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

let threshold: LogLevel = process.env.DEBUG ? 'debug' : 'info';

/**
 * Drop messages below level. DEBUG in the environment always wins.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = process.env.DEBUG ? 'debug' : level;
}

export function isLogLevelEnabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (isLogLevelEnabled(level)) {
    console.error(`[${level.toUpperCase()}] ${message}`, ...args);
  }
}

export const log = {
  debug: (message: string, ...args: unknown[]) => write('debug', message, args),
  info: (message: string, ...args: unknown[]) => write('info', message, args),
  warn: (message: string, ...args: unknown[]) => write('warn', message, args),
  error: (message: string, ...args: unknown[]) => write('error', message, args)
};
