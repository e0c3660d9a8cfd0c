import pino from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  base: { service: 'orchestrator' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function moduleLogger(module: string): Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

/**
 * Change the level of the root logger and of every module logger created so far.
 * Child loggers copy the level at creation, so they are updated one by one.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
