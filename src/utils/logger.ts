import pino from 'pino';

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
function getLogLevel(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL;
  if (level && isLevel(level)) {
    return level;
  }

  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }

  return 'info';
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Logger name (used for filtering and debugging)
 */
export function createLogger(name: string): pino.Logger {
  return pino({
    name,
    level: getLogLevel(),
  });
}
