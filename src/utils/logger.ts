import { Logger, LogLevel, consoleLogger, silentLogger, createLevelLogger } from '../types/logger.js';

/**
 * Log level requested through the DEBUG environment variable.
 * `DEBUG=freshgate` or `DEBUG=*` turns on debug output; anything else keeps
 * the cache quiet.
 */
export function detectLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | 'none' {
  const debug = env.DEBUG || '';
  if (debug.includes('freshgate') || debug.includes('*')) {
    return 'debug';
  }
  return 'none';
}

export function createDefaultLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = detectLogLevel(env);
  return level === 'none' ? silentLogger : createLevelLogger(consoleLogger, level);
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createDefaultLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger) {
  globalLogger = logger;
}
