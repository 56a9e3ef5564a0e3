import { LogManager, LogLevel } from './log-manager';

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

/**
 * Initialize the logger from the environment
 * - NODE_ENV=development logs everything and mirrors entries to the console
 * - WKT_LOG_LEVEL overrides the global level
 */
export function initializeLogger(env: NodeJS.ProcessEnv = process.env): LogManager {
  const logger = LogManager.getInstance();

  logger.clearLogs();
  logger.clearFilters();

  const development = env.NODE_ENV === 'development';
  logger.setConsoleOutput(development);
  logger.setLogLevel(parseLogLevel(env.WKT_LOG_LEVEL) ?? (development ? LogLevel.DEBUG : LogLevel.ERROR));

  logger.info('LogManager', 'Logger initialized', {
    environment: env.NODE_ENV,
    logLevel: logger.getLogLevel(),
    filters: logger.getFilters()
  });

  return logger;
}
