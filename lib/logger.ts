import pino from 'pino';

const logger = pino({
  name: 'disposable-domains',
  level: process.env.LOG_LEVEL || 'info',
  base: null,
});

/**
 * Adjust verbosity at runtime (CLI flags override LOG_LEVEL).
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}

export default logger;
