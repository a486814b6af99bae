// Structured logger for the todo API

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[34m',    // blue
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';

let threshold: LogThreshold = 'info';

/**
 * Set the minimum level written by every logger. Called once at startup from
 * the loaded configuration.
 */
export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatTimestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

function log(level: LogLevel, context: string, message: string, data?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  const color = LOG_COLORS[level];
  const timestamp = formatTimestamp();
  const prefix = `${color}${timestamp} [${level.toUpperCase()}]${RESET} ${BOLD}${context}${RESET}`;
  const write = level === 'warn' || level === 'error' ? console.error : console.log;

  if (data) {
    write(`${prefix} ${message}`, data);
  } else {
    write(`${prefix} ${message}`);
  }
}

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

export function createLogger(context: string): Logger {
  return {
    debug: (message, data) => log('debug', context, message, data),
    info: (message, data) => log('info', context, message, data),
    warn: (message, data) => log('warn', context, message, data),
    error: (message, data) => log('error', context, message, data),
  };
}
