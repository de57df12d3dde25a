// =====================================================
// Simple Logger Utility
// =====================================================

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function isEnabled(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }
  if (level === 'debug') {
    return process.env.NODE_ENV !== 'production';
  }
  return true;
}

function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const color = LOG_COLORS[level];
  const reset = LOG_COLORS.reset;
  const levelUpper = level.toUpperCase().padEnd(5);

  return `${color}[${timestamp}] [${levelUpper}]${reset} ${message} ${args.length ? JSON.stringify(args, errorReplacer) : ''}`;
}

// Error instances serialize to {} by default
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Shorten a device or push token for log output.
 */
export function maskToken(token: string): string {
  return `${token.slice(0, 8)}...`;
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (isEnabled('debug')) {
      console.debug(formatMessage('debug', message, ...args));
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (isEnabled('info')) {
      console.info(formatMessage('info', message, ...args));
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (isEnabled('warn')) {
      console.warn(formatMessage('warn', message, ...args));
    }
  },

  error(message: string, ...args: unknown[]): void {
    console.error(formatMessage('error', message, ...args));
  },
};
