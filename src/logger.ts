import pino, { type Logger } from 'pino';

export function createRootLogger(): Logger {
  const options = {
    name: 'risport',
    level: process.env.RISPORT_LOG_LEVEL || 'warn',
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return pino(options);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
